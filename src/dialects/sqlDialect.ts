import type { LockMode } from '../concurrency/readerWriterLock';
import { InvalidOperationError, MappingError } from '../errors';
import { ExecutionToken } from '../executionToken';
import type { ExecutionTokenInit } from '../executionToken';
import { getLogger } from '../logger';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import type { SqlParameter } from '../nativeCommand';
import type { FilterSpec, LimitSpec, SortExpression, SqlArguments } from '../operation';
import type { SqlBuilder, SqlBuilderEntry } from '../sqlBuilder';
import { ParameterCollector } from './parameterCollector';
import type { PlaceholderStyle } from './parameterCollector';
import { bindRawSql, toRawArguments } from './rawSql';
import type { SQLEscaper } from './sqlEscaper';
import { SQLValidator } from './sqlValidator';

export type DialectName = 'sqlite' | 'postgresql' | 'mysql' | 'sqlserver';

/**
 * Pieces a dialect adds to a SELECT for its paging strategy.
 */
export interface PagingClauses
{
	/** Goes right after SELECT, e.g. `TOP (10)`. */
	top?: string;
	/** Goes right after the table name. */
	tableSample?: string;
	/** Ordering used when the caller gave no sort. */
	orderBy?: string;
	/** Goes after ORDER BY, e.g. `LIMIT 10 OFFSET 20`. */
	suffix?: string;
	/** A statement that must run on the same session first. */
	preamble?: { readonly commandText: string; readonly parameters: readonly SqlParameter[] };
}

interface PlanBase
{
	operationName: string;
	metadata: TableOrViewMetadata;
	builder: SqlBuilder;
}

export interface SelectPlan extends PlanBase
{
	filter: FilterSpec;
	sort: readonly SortExpression[];
	limits: LimitSpec;
	/** Replaces the column list, e.g. `COUNT(*)`. */
	selectExpression?: string;
}

export interface RowWritePlan extends PlanBase
{
	expectedRowCount?: number;
	/** Read back the values as they were before the write. */
	returnOldValues?: boolean;
}

export interface SetWritePlan extends RowWritePlan
{
	/** `none` means every row. */
	filter: FilterSpec;
	/** Raw SET text used instead of the builder's argument values. */
	setExpression?: { readonly text: string; readonly args?: SqlArguments };
}

/**
 * Statement synthesis shared by every dialect. The defaults write ANSI-style SQL with a
 * RETURNING clause for read-back; dialects override what they do differently.
 */
export abstract class SqlDialect
{
	abstract readonly name: DialectName;
	abstract readonly escaper: SQLEscaper;
	abstract readonly placeholderStyle: PlaceholderStyle;

	/** Lock a read asks for inside a locking execution context. */
	readonly readLockMode: LockMode = 'none';
	/** Lock a write asks for inside a locking execution context. */
	readonly writeLockMode: LockMode = 'none';

	protected readonly bracketIdentifiers: boolean = false;
	protected readonly logger = getLogger('SqlDialect');

	createCollector(): ParameterCollector
	{
		return new ParameterCollector(this.placeholderStyle);
	}

	quoteIdentifier(identifier: string): string
	{
		return this.escaper.quoteIdentifier(identifier);
	}

	beginTransactionSql(): string
	{
		return 'BEGIN TRANSACTION;';
	}

	commitSql(): string
	{
		return 'COMMIT;';
	}

	rollbackSql(): string
	{
		return 'ROLLBACK;';
	}

	/**
	 * Rewrites caller-written SQL into this dialect's placeholders.
	 */
	bindRaw(text: string, args: SqlArguments | undefined, builderOrTypes: Pick<SqlBuilder, 'types'>, collector: ParameterCollector): string
	{
		return bindRawSql(text, toRawArguments(args, builderOrTypes.types), collector, this.bracketIdentifiers);
	}

	/**
	 * Caller-written SQL. It may write anything, so it asks for the write lock.
	 */
	prepareSql(operationName: string, text: string, args: SqlArguments | undefined, types: Pick<SqlBuilder, 'types'>, readsRows: boolean): ExecutionToken
	{
		const collector = this.createCollector();
		const commandText = this.bindRaw(text, args, types, collector);
		return this.finish({
			operationName,
			commandText,
			parameters: collector.parameters,
			executionMode: readsRows ? 'query' : 'nonQuery',
			lockMode: this.writeLockMode
		});
	}

	prepareSelect(plan: SelectPlan): ExecutionToken
	{
		const { builder, metadata } = plan;
		const collector = this.createCollector();
		const select = plan.selectExpression ?? builder.buildSelectClause();
		if (!select)
		{
			throw new InvalidOperationError(`${plan.operationName} does not read any columns`);
		}

		const where = this.whereClause(plan, plan.filter, collector);
		const hasSort = plan.sort.length > 0;
		this.validateLimits(plan.limits, hasSort);
		const paging = this.planPaging(plan.limits, hasSort, collector, metadata);

		let sql = 'SELECT ';
		if (paging.top) sql += `${paging.top} `;
		sql += `${select} FROM ${metadata.quotedName}`;
		if (paging.tableSample) sql += ` ${paging.tableSample}`;
		sql += where;
		if (hasSort)
		{
			sql += ` ORDER BY ${builder.buildOrderByClause(plan.sort)}`;
		}
		else if (paging.orderBy)
		{
			sql += ` ORDER BY ${paging.orderBy}`;
		}
		if (paging.suffix) sql += ` ${paging.suffix}`;
		sql += ';';

		const read = this.readToken(plan, sql, collector, true);
		if (!paging.preamble)
		{
			return this.finish(read);
		}
		return this.finish({
			operationName: plan.operationName,
			commandText: paging.preamble.commandText,
			parameters: paging.preamble.parameters,
			executionMode: 'nonQuery',
			lockMode: this.readLockMode,
			primary: false
		}, read);
	}

	prepareInsert(plan: RowWritePlan): ExecutionToken
	{
		const { builder } = plan;
		const collector = this.createCollector();
		const reads = builder.hasReadColumns();

		let sql = `INSERT INTO ${plan.metadata.quotedName}${this.insertBody(builder, builder.getInsertColumns(), collector)}`;
		if (reads) sql += ` RETURNING ${builder.buildSelectClause()}`;
		sql += ';';
		return this.finish(this.writeToken(plan, sql, collector, reads));
	}

	prepareUpdate(plan: RowWritePlan): ExecutionToken
	{
		const { builder } = plan;
		const keys = builder.requireKeyColumns(plan.operationName);
		const sets = this.requireUpdateColumns(plan, builder.getUpdateColumns());
		const collector = this.createCollector();
		const statement = `UPDATE ${plan.metadata.quotedName} SET ${builder.buildAssignments(sets, collector)} WHERE ${builder.buildKeyWhereClause(keys, collector)}`;
		return this.returningWrite(plan, statement, collector, () => this.selectByKey(plan, keys));
	}

	prepareUpdateSet(plan: SetWritePlan): ExecutionToken
	{
		const collector = this.createCollector();
		const set = this.setClause(plan, collector);
		const statement = `UPDATE ${plan.metadata.quotedName} SET ${set}${this.whereClause(plan, plan.filter, collector)}`;
		return this.returningWrite(plan, statement, collector, () => this.selectWhere(plan));
	}

	prepareDelete(plan: RowWritePlan): ExecutionToken
	{
		const keys = plan.builder.requireKeyColumns(plan.operationName);
		const collector = this.createCollector();
		const statement = `DELETE FROM ${plan.metadata.quotedName} WHERE ${plan.builder.buildKeyWhereClause(keys, collector)}`;
		// RETURNING on a delete already yields the old values
		return this.returningWrite({ ...plan, returnOldValues: false }, statement, collector, () => this.selectByKey(plan, keys));
	}

	prepareDeleteSet(plan: SetWritePlan): ExecutionToken
	{
		const collector = this.createCollector();
		const statement = `DELETE FROM ${plan.metadata.quotedName}${this.whereClause(plan, plan.filter, collector)}`;
		return this.returningWrite({ ...plan, returnOldValues: false }, statement, collector, () => this.selectWhere(plan));
	}

	/**
	 * INSERT ... ON CONFLICT (keys) DO UPDATE, as PostgreSQL and SQLite write it.
	 */
	prepareUpsert(plan: RowWritePlan): ExecutionToken
	{
		const { builder } = plan;
		const keys = this.requireUpsertKeys(plan);
		const inserts = builder.getUpsertInsertColumns();
		const updates = builder.getUpdateColumns();
		const collector = this.createCollector();
		const reads = builder.hasReadColumns();

		let sql = `INSERT INTO ${plan.metadata.quotedName}${this.insertBody(builder, inserts, collector)}`;
		sql += ` ON CONFLICT (${keys.map(k => k.column.quotedSqlName).join(', ')}) `;
		sql += updates.length > 0
			? `DO UPDATE SET ${updates.map(u => `${u.column.quotedSqlName} = EXCLUDED.${u.column.quotedSqlName}`).join(', ')}`
			: 'DO NOTHING';
		if (reads) sql += ` RETURNING ${builder.buildSelectClause()}`;
		sql += ';';
		return this.finish(this.writeToken(plan, sql, collector, reads));
	}

	/**
	 * Paging clauses for an already validated limit descriptor.
	 */
	protected abstract planPaging(limits: LimitSpec, hasSort: boolean, collector: ParameterCollector, metadata: TableOrViewMetadata): PagingClauses;

	/**
	 * Rules every dialect shares; dialect-specific ones live in {@link planPaging}.
	 */
	protected validateLimits(limits: LimitSpec, hasSort: boolean): void
	{
		switch (limits.strategy)
		{
			case 'none':
			case 'rows':
				return;
			case 'top':
				if (limits.skip !== undefined)
				{
					throw new InvalidOperationError('Skip is not supported with the top limit strategy');
				}
				break;
			case 'randomSample':
				if (limits.skip !== undefined)
				{
					throw new InvalidOperationError('Skip is not supported with random sampling');
				}
				if (hasSort)
				{
					throw new InvalidOperationError('Sorting is not supported with random sampling');
				}
				break;
		}
		if (limits.take === undefined)
		{
			throw new InvalidOperationError(`The ${limits.strategy} limit strategy needs a take count`);
		}
	}

	/**
	 * Take count of a validated top or sampling limit, as literal text.
	 */
	protected takeLiteral(limits: LimitSpec): string
	{
		if (limits.take === undefined)
		{
			throw new InvalidOperationError(`The ${limits.strategy} limit strategy needs a take count`);
		}
		return SQLValidator.integerLiteral(limits.take, 'take');
	}

	/**
	 * ` (a, b) VALUES (?, ?)`, or the dialect's form for a row of defaults.
	 */
	protected insertBody(builder: SqlBuilder, columns: readonly SqlBuilderEntry[], collector: ParameterCollector): string
	{
		if (columns.length === 0)
		{
			return ' DEFAULT VALUES';
		}
		return ` ${builder.buildInsertColumns(columns)} VALUES ${builder.buildValuesClause(columns, collector)}`;
	}

	protected whereClause(plan: PlanBase, filter: FilterSpec, collector: ParameterCollector): string
	{
		switch (filter.kind)
		{
			case 'none':
				return '';
			case 'value':
				return ` WHERE ${plan.builder.applyFilterValue(filter.value, filter.options, collector)}`;
			case 'raw':
				return ` WHERE ${this.bindRaw(filter.where, filter.args, plan.builder, collector)}`;
		}
	}

	protected setClause(plan: SetWritePlan, collector: ParameterCollector): string
	{
		if (plan.setExpression)
		{
			return this.bindRaw(plan.setExpression.text, plan.setExpression.args, plan.builder, collector);
		}
		return plan.builder.buildAssignments(this.requireUpdateColumns(plan, plan.builder.getUpdateColumns(true)), collector);
	}

	protected requireUpdateColumns(plan: PlanBase, columns: SqlBuilderEntry[]): SqlBuilderEntry[]
	{
		if (columns.length === 0)
		{
			throw new MappingError(`${plan.operationName}: none of the supplied values map to an updatable column on ${plan.metadata.name}`);
		}
		return columns;
	}

	protected requireUpsertKeys(plan: RowWritePlan): SqlBuilderEntry[]
	{
		const keys = plan.builder.getKeyColumns();
		if (keys.length === 0)
		{
			throw new MappingError(`${plan.operationName}: ${plan.metadata.name} has no primary key. Use the object-defined key option or supply match columns.`);
		}
		return keys;
	}

	/**
	 * A write that reads back through RETURNING for new values, or through a SELECT
	 * chained in front of it for old values.
	 */
	protected returningWrite(plan: RowWritePlan, statement: string, collector: ParameterCollector, selectOld: () => ExecutionTokenInit): ExecutionToken
	{
		if (!plan.builder.hasReadColumns())
		{
			return this.finish(this.writeToken(plan, `${statement};`, collector, false));
		}
		if (plan.returnOldValues)
		{
			return this.finish(selectOld(), this.writeToken(plan, `${statement};`, collector, false));
		}
		return this.finish(this.writeToken(plan, `${statement} RETURNING ${plan.builder.buildSelectClause()};`, collector, true));
	}

	/**
	 * SELECT of the materialized columns of the row identified by the keys, with its own parameters.
	 */
	protected selectByKey(plan: PlanBase, keys: readonly SqlBuilderEntry[]): ExecutionTokenInit
	{
		const collector = this.createCollector();
		const sql = `SELECT ${plan.builder.buildSelectClause()} FROM ${plan.metadata.quotedName} WHERE ${plan.builder.buildKeyWhereClause(keys, collector)};`;
		return this.readToken(plan, sql, collector, false);
	}

	/**
	 * SELECT of the materialized columns of the rows a set-based write targets.
	 */
	protected selectWhere(plan: SetWritePlan): ExecutionTokenInit
	{
		const collector = this.createCollector();
		const sql = `SELECT ${plan.builder.buildSelectClause()} FROM ${plan.metadata.quotedName}${this.whereClause(plan, plan.filter, collector)};`;
		return this.readToken(plan, sql, collector, false);
	}

	protected readToken(plan: PlanBase, commandText: string, collector: ParameterCollector, primary: boolean): ExecutionTokenInit
	{
		return {
			operationName: plan.operationName,
			commandText,
			parameters: collector.parameters,
			executionMode: 'query',
			lockMode: this.readLockMode,
			primary
		};
	}

	protected writeToken(plan: RowWritePlan, commandText: string, collector: ParameterCollector, readsRows: boolean): ExecutionTokenInit
	{
		return {
			operationName: plan.operationName,
			commandText,
			parameters: collector.parameters,
			executionMode: readsRows ? 'query' : 'nonQuery',
			expectedRowCount: plan.expectedRowCount,
			lockMode: this.writeLockMode,
			primary: true
		};
	}

	protected finish(first: ExecutionTokenInit, ...rest: ExecutionTokenInit[]): ExecutionToken
	{
		const token = ExecutionToken.chain(first, ...rest);
		if (this.logger.isDebugEnabled())
		{
			for (const t of token.tokens())
			{
				this.logger.debug('Prepared command', { dialect: this.name, operation: t.operationName, sql: t.commandText, parameters: t.parameters.length });
			}
		}
		return token;
	}
}
