import type { ExecutionToken, ExecutionTokenInit } from '../executionToken';
import { InvalidOperationError, MappingError } from '../errors';
import type { LimitSpec } from '../operation';
import type { SqlBuilder, SqlBuilderEntry } from '../sqlBuilder';
import type { ParameterCollector } from './parameterCollector';
import { SqlDialect } from './sqlDialect';
import type { PagingClauses, RowWritePlan, SetWritePlan } from './sqlDialect';
import { MySQLEscaper } from './sqlEscaper';
import { SQLValidator } from './sqlValidator';

/** Largest LIMIT MySQL takes; it has no "no limit" value for use with OFFSET. */
const MAX_ROWS = '18446744073709551615';

/**
 * MySQL statement synthesis.
 * MySQL has no output clause, so every read-back is a SELECT chained before or after the write
 * on the same connection.
 */
export class MySQLDialect extends SqlDialect
{
	readonly name = 'mysql';
	readonly escaper = new MySQLEscaper();
	readonly placeholderStyle = 'positional';

	beginTransactionSql(): string
	{
		return 'START TRANSACTION;';
	}

	prepareInsert(plan: RowWritePlan): ExecutionToken
	{
		const { builder } = plan;
		const collector = this.createCollector();
		const write = this.writeToken(plan, `INSERT INTO ${plan.metadata.quotedName}${this.insertBody(builder, builder.getInsertColumns(), collector)};`, collector, false);
		if (!builder.hasReadColumns())
		{
			return this.finish(write);
		}
		return this.finish(write, this.selectInserted(plan));
	}

	prepareUpdate(plan: RowWritePlan): ExecutionToken
	{
		const { builder } = plan;
		const keys = builder.requireKeyColumns(plan.operationName);
		const sets = this.requireUpdateColumns(plan, builder.getUpdateColumns());
		const collector = this.createCollector();
		const statement = `UPDATE ${plan.metadata.quotedName} SET ${builder.buildAssignments(sets, collector)} WHERE ${builder.buildKeyWhereClause(keys, collector)};`;
		return this.chainedWrite(plan, statement, collector, () => this.selectByKey(plan, keys), plan.returnOldValues === true);
	}

	prepareUpdateSet(plan: SetWritePlan): ExecutionToken
	{
		const collector = this.createCollector();
		const set = this.setClause(plan, collector);
		const statement = `UPDATE ${plan.metadata.quotedName} SET ${set}${this.whereClause(plan, plan.filter, collector)};`;
		// a SELECT after the write would re-run a filter the SET may no longer match
		if (plan.builder.hasReadColumns() && plan.returnOldValues !== true)
		{
			throw new InvalidOperationError(`${plan.operationName}: MySQL cannot read back the new values of a set-based update; use ReturnOldValues or asNonQuery()`);
		}
		return this.chainedWrite(plan, statement, collector, () => this.selectWhere(plan), plan.returnOldValues === true);
	}

	prepareDelete(plan: RowWritePlan): ExecutionToken
	{
		const keys = plan.builder.requireKeyColumns(plan.operationName);
		const collector = this.createCollector();
		const statement = `DELETE FROM ${plan.metadata.quotedName} WHERE ${plan.builder.buildKeyWhereClause(keys, collector)};`;
		return this.chainedWrite(plan, statement, collector, () => this.selectByKey(plan, keys), true);
	}

	prepareDeleteSet(plan: SetWritePlan): ExecutionToken
	{
		const collector = this.createCollector();
		const statement = `DELETE FROM ${plan.metadata.quotedName}${this.whereClause(plan, plan.filter, collector)};`;
		return this.chainedWrite(plan, statement, collector, () => this.selectWhere(plan), true);
	}

	/**
	 * INSERT ... ON DUPLICATE KEY UPDATE. MySQL matches on any unique key of the table;
	 * the key columns decide which row is read back.
	 */
	prepareUpsert(plan: RowWritePlan): ExecutionToken
	{
		const { builder } = plan;
		const keys = this.requireUpsertKeys(plan);
		const inserts = builder.getUpsertInsertColumns();
		const updates = builder.getUpdateColumns();
		const collector = this.createCollector();

		const assignments = updates.length > 0
			? updates.map(u => `${u.column.quotedSqlName} = VALUES(${u.column.quotedSqlName})`).join(', ')
			: `${keys[0].column.quotedSqlName} = ${keys[0].column.quotedSqlName}`;
		const sql = `INSERT INTO ${plan.metadata.quotedName}${this.insertBody(builder, inserts, collector)} ON DUPLICATE KEY UPDATE ${assignments};`;
		// affected rows are 1 for an insert and 2 for an update, so there is nothing to check
		const write = this.writeToken({ ...plan, expectedRowCount: undefined }, sql, collector, false);
		if (!builder.hasReadColumns())
		{
			return this.finish(write);
		}

		const keyed = keys.every(k => k.hasValue && k.value !== null && k.value !== undefined);
		return this.finish(write, keyed ? this.selectByKey(plan, keys) : this.selectInserted(plan));
	}

	protected insertBody(builder: SqlBuilder, columns: readonly SqlBuilderEntry[], collector: ParameterCollector): string
	{
		if (columns.length === 0)
		{
			return ' () VALUES ()';
		}
		return super.insertBody(builder, columns, collector);
	}

	protected planPaging(limits: LimitSpec, _hasSort: boolean, collector: ParameterCollector): PagingClauses
	{
		switch (limits.strategy)
		{
			case 'none':
				return {};
			case 'rows':
				if (limits.skip === undefined)
				{
					return limits.take === undefined ? {} : { suffix: `LIMIT ${SQLValidator.integerLiteral(limits.take, 'take')}` };
				}
				return { suffix: `LIMIT ${limits.take === undefined ? MAX_ROWS : SQLValidator.integerLiteral(limits.take, 'take')} OFFSET ${SQLValidator.integerLiteral(limits.skip, 'skip')}` };
			case 'top':
				return { suffix: `LIMIT ${this.takeLiteral(limits)}` };
			case 'randomSample':
				return {
					orderBy: limits.seed === undefined ? 'RAND()' : `RAND(${collector.add('seed', limits.seed)})`,
					suffix: `LIMIT ${this.takeLiteral(limits)}`
				};
		}
	}

	/**
	 * Reads back the row an INSERT just wrote: by LAST_INSERT_ID() when the identity was
	 * generated, otherwise by the supplied key values.
	 */
	private selectInserted(plan: RowWritePlan): ExecutionTokenInit
	{
		const { builder, metadata } = plan;
		const identity = metadata.identityColumn;
		if (identity)
		{
			const supplied = builder.getParameterizedColumns().find(e => e.column === identity);
			if (!supplied || supplied.value === null || supplied.value === undefined)
			{
				const collector = this.createCollector();
				const sql = `SELECT ${builder.buildSelectClause()} FROM ${metadata.quotedName} WHERE ${identity.quotedSqlName} = LAST_INSERT_ID();`;
				return this.readToken(plan, sql, collector, false);
			}
		}

		const keys = builder.getKeyColumns();
		if (keys.length === 0 || keys.some(k => !k.hasValue))
		{
			throw new MappingError(`${plan.operationName}: ${metadata.name} has neither a generated identity nor supplied key values to read the row back by`);
		}
		return this.selectByKey(plan, keys);
	}

	private chainedWrite(plan: RowWritePlan, statement: string, collector: ParameterCollector, select: () => ExecutionTokenInit, readBefore: boolean): ExecutionToken
	{
		const write = this.writeToken(plan, statement, collector, false);
		if (!plan.builder.hasReadColumns())
		{
			return this.finish(write);
		}
		return readBefore ? this.finish(select(), write) : this.finish(write, select());
	}
}
