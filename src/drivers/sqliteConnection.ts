import { open } from 'sqlite';
import type { Database } from 'sqlite';
import sqlite3 from 'sqlite3';
import { InvalidOperationError } from '../errors';
import { getLogger } from '../logger';
import type { NativeCommand, NativeConnection, NativeResult, NativeSession, SessionOptions } from '../nativeCommand';
import { ArrayRowCursor } from '../rowCursor';

/**
 * Options for connecting to a SQLite database.
 */
export interface SQLiteConnectionOptions
{
	/** The file path to the SQLite database, or `:memory:`. */
	filename: string;
	/** How long a statement waits on a locked database, in milliseconds (default: 5000). */
	busyTimeout?: number;
}

const logger = getLogger('SQLiteConnection');

/**
 * Converts a bound value into one sqlite3 accepts.
 */
function toSQLiteValue(value: unknown): unknown
{
	if (value instanceof Date) return value.toISOString();
	if (typeof value === 'boolean') return value ? 1 : 0;
	if (typeof value === 'bigint')
	{
		return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER) ? Number(value) : value.toString();
	}
	return value;
}

/**
 * SQLite through sqlite3 and its promise wrapper.
 *
 * Ordinary sessions share one database handle, which sqlite3 serializes. Transactions get a
 * handle of their own, except for `:memory:` databases, which exist only on the shared handle.
 */
export class SQLiteConnection implements NativeConnection
{
	private shared?: Promise<Database>;

	constructor(private readonly options: SQLiteConnectionOptions) { }

	private get isMemory(): boolean
	{
		return this.options.filename === ':memory:' || this.options.filename === '';
	}

	async openSession(options: SessionOptions = {}): Promise<NativeSession>
	{
		if (options.transactional && !this.isMemory)
		{
			const db = await this.openDatabase();
			return new SQLiteSession(db, () => db.close());
		}
		this.shared ??= this.openDatabase();
		return new SQLiteSession(await this.shared, () => Promise.resolve());
	}

	async close(): Promise<void>
	{
		if (!this.shared) return;
		const db = await this.shared;
		this.shared = undefined;
		await db.close();
		logger.info('SQLite database closed', { filename: this.options.filename });
	}

	private async openDatabase(): Promise<Database>
	{
		logger.debug('Opening SQLite database', { filename: this.options.filename });
		const db = await open({ filename: this.options.filename, driver: sqlite3.Database });
		db.configure('busyTimeout', this.options.busyTimeout ?? 5000);
		return db;
	}
}

class SQLiteSession implements NativeSession
{
	constructor(
		private readonly db: Database,
		private readonly onRelease: () => Promise<void>
	) { }

	async execute(command: NativeCommand, signal?: AbortSignal): Promise<NativeResult>
	{
		if (command.commandType !== 'text')
		{
			throw new InvalidOperationError('SQLite has no stored procedures');
		}

		const values = command.parameters.map(p => toSQLiteValue(p.value));
		const interrupt = (): void => this.db.getDatabaseInstance().interrupt();
		const timer = command.timeout ? setTimeout(interrupt, command.timeout) : undefined;
		signal?.addEventListener('abort', interrupt);
		try
		{
			if (command.executionMode === 'query')
			{
				const rows = await this.db.all<Record<string, unknown>[]>(command.commandText, values);
				return { cursor: ArrayRowCursor.fromRecords(rows) };
			}
			const result = await this.db.run(command.commandText, values);
			return { affectedRows: result.changes, lastInsertId: result.lastID };
		}
		finally
		{
			if (timer) clearTimeout(timer);
			signal?.removeEventListener('abort', interrupt);
		}
	}

	release(): Promise<void>
	{
		return this.onRelease();
	}
}
