import { InvalidOperationError } from '../errors';
import type { ExecutionToken } from '../executionToken';
import type { LimitSpec } from '../operation';
import { SqlDialect } from './sqlDialect';
import type { PagingClauses, RowWritePlan, SetWritePlan } from './sqlDialect';
import { SqlServerEscaper } from './sqlEscaper';
import { SQLValidator } from './sqlValidator';

/**
 * SQL Server statement synthesis. Read-back uses OUTPUT Inserted./Deleted.; upserts use MERGE.
 */
export class SqlServerDialect extends SqlDialect
{
	readonly name = 'sqlserver';
	readonly escaper = new SqlServerEscaper();
	readonly placeholderStyle = 'named';
	protected readonly bracketIdentifiers = true;

	commitSql(): string
	{
		return 'COMMIT TRANSACTION;';
	}

	rollbackSql(): string
	{
		return 'ROLLBACK TRANSACTION;';
	}

	prepareInsert(plan: RowWritePlan): ExecutionToken
	{
		const { builder } = plan;
		const collector = this.createCollector();
		const columns = builder.getInsertColumns();
		const output = this.outputClause(plan, 'Inserted.');

		let sql = `INSERT INTO ${plan.metadata.quotedName}`;
		if (columns.length > 0)
		{
			sql += ` ${builder.buildInsertColumns(columns)}${output} VALUES ${builder.buildValuesClause(columns, collector)};`;
		}
		else
		{
			sql += `${output} DEFAULT VALUES;`;
		}
		return this.finish(this.writeToken(plan, sql, collector, output !== ''));
	}

	prepareUpdate(plan: RowWritePlan): ExecutionToken
	{
		const { builder } = plan;
		const keys = builder.requireKeyColumns(plan.operationName);
		const sets = this.requireUpdateColumns(plan, builder.getUpdateColumns());
		const collector = this.createCollector();
		const output = this.outputClause(plan, plan.returnOldValues ? 'Deleted.' : 'Inserted.');
		const sql = `UPDATE ${plan.metadata.quotedName} SET ${builder.buildAssignments(sets, collector)}${output} WHERE ${builder.buildKeyWhereClause(keys, collector)};`;
		return this.finish(this.writeToken(plan, sql, collector, output !== ''));
	}

	prepareUpdateSet(plan: SetWritePlan): ExecutionToken
	{
		const collector = this.createCollector();
		const set = this.setClause(plan, collector);
		const output = this.outputClause(plan, plan.returnOldValues ? 'Deleted.' : 'Inserted.');
		const sql = `UPDATE ${plan.metadata.quotedName} SET ${set}${output}${this.whereClause(plan, plan.filter, collector)};`;
		return this.finish(this.writeToken(plan, sql, collector, output !== ''));
	}

	prepareDelete(plan: RowWritePlan): ExecutionToken
	{
		const keys = plan.builder.requireKeyColumns(plan.operationName);
		const collector = this.createCollector();
		const output = this.outputClause(plan, 'Deleted.');
		const sql = `DELETE FROM ${plan.metadata.quotedName}${output} WHERE ${plan.builder.buildKeyWhereClause(keys, collector)};`;
		return this.finish(this.writeToken(plan, sql, collector, output !== ''));
	}

	prepareDeleteSet(plan: SetWritePlan): ExecutionToken
	{
		const collector = this.createCollector();
		const output = this.outputClause(plan, 'Deleted.');
		const sql = `DELETE FROM ${plan.metadata.quotedName}${output}${this.whereClause(plan, plan.filter, collector)};`;
		return this.finish(this.writeToken(plan, sql, collector, output !== ''));
	}

	/**
	 * MERGE INTO target USING (VALUES (...)) AS source (...) ON keys
	 * WHEN MATCHED THEN UPDATE ... WHEN NOT MATCHED THEN INSERT ...
	 */
	prepareUpsert(plan: RowWritePlan): ExecutionToken
	{
		const { builder } = plan;
		const keys = builder.requireKeyColumns(plan.operationName);
		const sources = builder.getParameterizedColumns();
		const inserts = builder.getInsertColumns();
		const updates = builder.getUpdateColumns();
		const collector = this.createCollector();

		let sql = `MERGE INTO ${plan.metadata.quotedName} AS target`;
		sql += ` USING (VALUES ${builder.buildValuesClause(sources, collector)}) AS source ${builder.buildInsertColumns(sources)}`;
		sql += ` ON ${keys.map(k => `target.${k.column.quotedSqlName} = source.${k.column.quotedSqlName}`).join(' AND ')}`;
		if (updates.length > 0)
		{
			sql += ` WHEN MATCHED THEN UPDATE SET ${updates.map(u => `${u.column.quotedSqlName} = source.${u.column.quotedSqlName}`).join(', ')}`;
		}
		sql += ` WHEN NOT MATCHED THEN INSERT ${builder.buildInsertColumns(inserts)} VALUES (${inserts.map(i => `source.${i.column.quotedSqlName}`).join(', ')})`;
		const output = this.outputClause(plan, 'Inserted.');
		sql += `${output};`;
		return this.finish(this.writeToken({ ...plan, expectedRowCount: undefined }, sql, collector, output !== ''));
	}

	protected planPaging(limits: LimitSpec, hasSort: boolean): PagingClauses
	{
		switch (limits.strategy)
		{
			case 'none':
				return {};
			case 'rows':
				if (limits.skip === undefined)
				{
					return limits.take === undefined ? {} : { top: `TOP (${SQLValidator.integerLiteral(limits.take, 'take')})` };
				}
				if (!hasSort)
				{
					throw new InvalidOperationError('Skipping rows requires a sort order on SQL Server');
				}
				return {
					suffix: `OFFSET ${SQLValidator.integerLiteral(limits.skip, 'skip')} ROWS`
						+ (limits.take === undefined ? '' : ` FETCH NEXT ${SQLValidator.integerLiteral(limits.take, 'take')} ROWS ONLY`)
				};
			case 'top':
				return { top: `TOP (${this.takeLiteral(limits)})` };
			case 'randomSample':
			{
				const take = this.takeLiteral(limits);
				const repeatable = limits.seed === undefined ? '' : ` REPEATABLE (${SQLValidator.integerLiteral(limits.seed, 'seed')})`;
				return { top: `TOP (${take})`, tableSample: `TABLESAMPLE SYSTEM (${take} ROWS)${repeatable}` };
			}
		}
	}

	private outputClause(plan: RowWritePlan, prefix: 'Inserted.' | 'Deleted.'): string
	{
		return plan.builder.hasReadColumns() ? ` OUTPUT ${plan.builder.buildSelectClause(prefix)}` : '';
	}
}
