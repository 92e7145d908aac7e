import mysql from 'mysql2/promise';
import type { Pool, PoolConnection, PoolOptions, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { InvalidOperationError } from '../errors';
import { getLogger } from '../logger';
import type { NativeCommand, NativeConnection, NativeResult, NativeSession } from '../nativeCommand';
import { ArrayRowCursor } from '../rowCursor';

const logger = getLogger('MySQLConnection');

function isResultSetHeader(result: ResultSetHeader | RowDataPacket[]): result is ResultSetHeader
{
	return !Array.isArray(result);
}

function toMySQLValue(value: unknown): unknown
{
	if (value === undefined) return null;
	if (typeof value === 'bigint') return value.toString();
	return value;
}

/**
 * MySQL through a mysql2 pool.
 * Aborting a running statement sends KILL QUERY for its connection thread on a second pooled connection.
 */
export class MySQLConnection implements NativeConnection
{
	private readonly pool: Pool;

	constructor(options: PoolOptions)
	{
		this.pool = mysql.createPool({ waitForConnections: true, ...options });
	}

	async openSession(): Promise<NativeSession>
	{
		const connection = await this.pool.getConnection();
		return new MySQLSession(connection, threadId => this.killQuery(threadId));
	}

	async close(): Promise<void>
	{
		await this.pool.end();
		logger.info('MySQL connection pool closed');
	}

	private async killQuery(threadId: number): Promise<void>
	{
		try
		{
			await this.pool.query('KILL QUERY ?', [threadId]);
			logger.warn('Running statement killed', { threadId });
		}
		catch (error)
		{
			logger.error('Failed to kill running statement', { threadId, error: error instanceof Error ? error.message : String(error) });
		}
	}
}

class MySQLSession implements NativeSession
{
	constructor(
		private readonly connection: PoolConnection,
		private readonly kill: (threadId: number) => Promise<void>
	) { }

	async execute(command: NativeCommand, signal?: AbortSignal): Promise<NativeResult>
	{
		const values = command.parameters.map(p => toMySQLValue(p.value));
		const sql = command.commandType === 'storedProcedure'
			? this.callText(command)
			: command.commandText;

		const interrupt = (): void => { void this.kill(this.connection.threadId); };
		signal?.addEventListener('abort', interrupt);
		try
		{
			const [result, fields] = await this.connection.execute<ResultSetHeader | RowDataPacket[]>({
				sql,
				values,
				timeout: command.timeout,
				rowsAsArray: true
			});

			if (isResultSetHeader(result))
			{
				return { affectedRows: result.affectedRows, lastInsertId: result.insertId };
			}
			const rows = result.map(row => Array.isArray(row) ? row : Object.values(row));
			return {
				cursor: new ArrayRowCursor((fields ?? []).map(f => ({ name: f.name })), rows)
			};
		}
		finally
		{
			signal?.removeEventListener('abort', interrupt);
		}
	}

	release(): Promise<void>
	{
		this.connection.release();
		return Promise.resolve();
	}

	private callText(command: NativeCommand): string
	{
		if (command.executionMode === 'query')
		{
			throw new InvalidOperationError('MySQL procedures return rows as extra result sets, which are not read');
		}
		return `CALL ${command.commandText}(${command.parameters.map(() => '?').join(', ')})`;
	}
}
