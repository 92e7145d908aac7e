import { DeleteCommand } from './commandBuilders/deleteCommand';
import { DeleteSetCommand } from './commandBuilders/deleteSetCommand';
import { InsertCommand } from './commandBuilders/insertCommand';
import { SqlCall } from './commandBuilders/sqlCall';
import { TableOrViewCommand } from './commandBuilders/tableOrViewCommand';
import { UpdateCommand } from './commandBuilders/updateCommand';
import { UpdateSetCommand } from './commandBuilders/updateSetCommand';
import type { UpdateSetValues } from './commandBuilders/updateSetCommand';
import { UpsertCommand } from './commandBuilders/upsertCommand';
import type { ChainResult, CommandDataSource } from './commandDataSource';
import type { LockMode, LockRelease, ReaderWriterLock } from './concurrency/readerWriterLock';
import type { ResolvedSettings } from './config';
import type { SqlDialect } from './dialects/sqlDialect';
import { MissingObjectError, OperationCanceledError } from './errors';
import type { ExecutionToken } from './executionToken';
import { getLogger } from './logger';
import type { ContextLogger } from './logger';
import type { CompiledBinderCache } from './materializers/compiledBinderCache';
import type { ExecuteOptions } from './materializers/materializer';
import type { DatabaseMetadataCache } from './metadata/databaseMetadataCache';
import type { TableOrViewMetadata } from './metadata/tableOrViewMetadata';
import type { TypeRegistry } from './metadata/typeDescriptor';
import type { NativeConnection, NativeResult, NativeSession } from './nativeCommand';
import type { DeleteOptions, SqlArguments, UpdateOptions, UpsertOptions } from './operation';
import type { RowCursor } from './rowCursor';

/**
 * Everything a data source shares with the transactions it starts.
 */
export interface DataSourceContext
{
	readonly connection: NativeConnection;
	readonly dialect: SqlDialect;
	readonly metadata: DatabaseMetadataCache;
	readonly types: TypeRegistry;
	readonly binders: CompiledBinderCache;
	readonly lock: ReaderWriterLock;
	readonly settings: ResolvedSettings;
}

const noRelease: LockRelease = () => { };

function throwIfAborted(signal: AbortSignal | undefined): void
{
	if (signal?.aborted)
	{
		throw new OperationCanceledError(undefined, { cause: signal.reason });
	}
}

/**
 * Command factories and the token-chain executor shared by data sources and transactions.
 */
export abstract class DataSourceBase implements CommandDataSource
{
	readonly dialect: SqlDialect;
	readonly metadata: DatabaseMetadataCache;
	readonly types: TypeRegistry;
	readonly binders: CompiledBinderCache;
	readonly strictMode: boolean;
	protected readonly logger: ContextLogger;

	constructor(protected readonly context: DataSourceContext)
	{
		this.dialect = context.dialect;
		this.metadata = context.metadata;
		this.types = context.types;
		this.binders = context.binders;
		this.strictMode = context.settings.strictMode;
		this.logger = getLogger(new.target.name);
	}

	/**
	 * SELECT from a table or view.
	 */
	async from(tableOrViewName: string): Promise<TableOrViewCommand>
	{
		return new TableOrViewCommand(this, await this.resolveTable(tableOrViewName));
	}

	async insert(tableName: string, argumentValue: object): Promise<InsertCommand>
	{
		return new InsertCommand(this, await this.resolveTable(tableName), argumentValue);
	}

	async update(tableName: string, argumentValue: object, options?: UpdateOptions): Promise<UpdateCommand>
	{
		return new UpdateCommand(this, await this.resolveTable(tableName), argumentValue, options);
	}

	/**
	 * UPDATE of many rows; chain `withFilter(...)` or `all()` before running it.
	 */
	async updateSet(tableName: string, newValues: UpdateSetValues, options?: UpdateOptions): Promise<UpdateSetCommand>
	{
		return new UpdateSetCommand(this, await this.resolveTable(tableName), newValues, options);
	}

	async upsert(tableName: string, argumentValue: object, options?: UpsertOptions): Promise<UpsertCommand>
	{
		return new UpsertCommand(this, await this.resolveTable(tableName), argumentValue, options);
	}

	async delete(tableName: string, argumentValue: object, options?: DeleteOptions): Promise<DeleteCommand>
	{
		return new DeleteCommand(this, await this.resolveTable(tableName), argumentValue, options);
	}

	/**
	 * DELETE of many rows; chain `withFilter(...)` or `all()` before running it.
	 */
	async deleteWithFilter(tableName: string): Promise<DeleteSetCommand>
	{
		return new DeleteSetCommand(this, await this.resolveTable(tableName));
	}

	sql(sqlText: string, args?: SqlArguments): SqlCall
	{
		this.ensureUsable();
		return new SqlCall(this, sqlText, args);
	}

	/**
	 * Runs every token of the chain in order on one session, under the chain's lock.
	 * The lock is released and every cursor closed on every path.
	 */
	async execute<T>(token: ExecutionToken, consumer: (result: ChainResult) => T, options: ExecuteOptions = {}): Promise<T>
	{
		this.ensureUsable();
		throwIfAborted(options.signal);

		const release = await this.acquireLock(token.chainLockMode);
		try
		{
			this.ensureUsable();
			const session = await this.openSession();
			try
			{
				return await this.runChain(session, token, consumer, options);
			}
			finally
			{
				await this.closeSession(session);
			}
		}
		finally
		{
			release();
		}
	}

	protected acquireLock(mode: LockMode): Promise<LockRelease>
	{
		if (this.context.settings.disableLocks)
		{
			return Promise.resolve(noRelease);
		}
		return this.context.lock.acquire(mode);
	}

	/**
	 * Fails when the context can no longer run commands.
	 */
	protected ensureUsable(): void
	{
		// a plain data source stays usable
	}

	protected abstract openSession(): Promise<NativeSession>;

	protected abstract closeSession(session: NativeSession): Promise<void>;

	/**
	 * Runs one native command; a failure while the signal is aborted becomes OperationCanceledError.
	 */
	protected async executeNative(session: NativeSession, token: ExecutionToken, signal: AbortSignal | undefined): Promise<NativeResult>
	{
		try
		{
			return await session.execute({
				commandText: token.commandText,
				commandType: token.commandType,
				executionMode: token.executionMode,
				parameters: token.parameters,
				timeout: token.timeout
			}, signal);
		}
		catch (error)
		{
			if (signal?.aborted)
			{
				throw new OperationCanceledError(undefined, { cause: error });
			}
			throw error;
		}
	}

	private async runChain<T>(session: NativeSession, token: ExecutionToken, consumer: (result: ChainResult) => T, options: ExecuteOptions): Promise<T>
	{
		const timeout = options.timeout ?? this.context.settings.defaultCommandTimeout;
		const chain = timeout === undefined ? token : token.withTimeout(timeout);
		const cursors: RowCursor[] = [];
		const result: ChainResult = {};
		const started = Date.now();

		try
		{
			for (const current of chain.tokens())
			{
				throwIfAborted(options.signal);
				this.logger.debug('Executing command', { operation: current.operationName, sql: current.commandText });

				const native = await this.executeNative(session, current, options.signal);
				if (native.cursor)
				{
					cursors.push(native.cursor);
				}
				if (current.primary)
				{
					const affectedRows = native.affectedRows ?? native.cursor?.rowCount;
					current.checkAffectedRowCount(affectedRows);
					result.affectedRows = affectedRows;
					result.lastInsertId = native.lastInsertId;
				}
				if (current.executionMode === 'query' && native.cursor)
				{
					result.cursor = native.cursor;
				}
			}

			const value = consumer(result);
			const completed = { operation: token.operationName, affectedRows: result.affectedRows, durationMs: Date.now() - started };
			if (token.operationName === 'Select')
			{
				this.logger.debug('Query completed', completed);
			}
			else
			{
				this.logger.info(`${token.operationName} completed`, completed);
			}
			return value;
		}
		catch (error)
		{
			this.logger.error(`${token.operationName} failed`, { error: error instanceof Error ? error.message : String(error) });
			throw error;
		}
		finally
		{
			for (const cursor of cursors)
			{
				cursor.close();
			}
		}
	}

	private async resolveTable(name: string): Promise<TableOrViewMetadata>
	{
		this.ensureUsable();
		const metadata = await this.metadata.getTableOrView(name);
		if (!metadata)
		{
			throw new MissingObjectError(name);
		}
		return metadata;
	}
}
