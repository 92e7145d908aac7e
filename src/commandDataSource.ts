import type { SqlDialect } from './dialects/sqlDialect';
import type { ExecutionToken } from './executionToken';
import type { CompiledBinderCache } from './materializers/compiledBinderCache';
import type { ExecuteOptions } from './materializers/materializer';
import type { DatabaseMetadataCache } from './metadata/databaseMetadataCache';
import type { TypeRegistry } from './metadata/typeDescriptor';
import type { RowCursor } from './rowCursor';

/**
 * What a chain handed back to its materializer.
 */
export interface ChainResult
{
	/** Rows of the last token that ran as a query. */
	cursor?: RowCursor;
	/** Affected rows reported for the primary token. */
	affectedRows?: number;
	lastInsertId?: number | bigint | string;
}

/**
 * The execution context command builders and materializers work against: a data source
 * or one of its transactions.
 */
export interface CommandDataSource
{
	readonly dialect: SqlDialect;
	readonly metadata: DatabaseMetadataCache;
	readonly types: TypeRegistry;
	readonly binders: CompiledBinderCache;
	/** Unknown desired columns and unmapped argument properties are errors. */
	readonly strictMode: boolean;

	/**
	 * Runs a token chain on one session and hands its result to the consumer,
	 * before the cursor is closed.
	 */
	execute<T>(token: ExecutionToken, consumer: (result: ChainResult) => T, options?: ExecuteOptions): Promise<T>;
}
