import { Pool } from 'pg';
import type { PoolClient, PoolConfig } from 'pg';
import { SQLValidator } from '../dialects/sqlValidator';
import { InvalidOperationError } from '../errors';
import { getLogger } from '../logger';
import type { NativeCommand, NativeConnection, NativeResult, NativeSession } from '../nativeCommand';
import { ArrayRowCursor } from '../rowCursor';
import type { ValueKind } from '../rowCursor';

const logger = getLogger('PostgreSQLConnection');

/**
 * Value kinds of the built-in type OIDs, as node-postgres parses them.
 * int8 and numeric come back as strings.
 */
const KIND_BY_OID = new Map<number, ValueKind>([
	[16, 'boolean'],
	[17, 'buffer'],
	[19, 'string'],
	[20, 'string'],
	[21, 'number'],
	[23, 'number'],
	[25, 'string'],
	[26, 'number'],
	[114, 'json'],
	[700, 'number'],
	[701, 'number'],
	[1042, 'string'],
	[1043, 'string'],
	[1082, 'date'],
	[1114, 'date'],
	[1184, 'date'],
	[1700, 'string'],
	[2950, 'string'],
	[3802, 'json']
]);

/**
 * PostgreSQL through a pg pool. Each session is one pooled client.
 * A running statement cannot be interrupted here; the command timeout becomes the session's
 * statement_timeout.
 */
export class PostgreSQLConnection implements NativeConnection
{
	private readonly pool: Pool;

	constructor(config: PoolConfig)
	{
		this.pool = new Pool(config);
		this.pool.on('error', error => logger.error('Idle PostgreSQL client failed', { error: error.message }));
	}

	async openSession(): Promise<NativeSession>
	{
		return new PostgreSQLSession(await this.pool.connect());
	}

	async close(): Promise<void>
	{
		await this.pool.end();
		logger.info('PostgreSQL connection pool closed');
	}
}

class PostgreSQLSession implements NativeSession
{
	private statementTimeout = 0;

	constructor(private readonly client: PoolClient) { }

	async execute(command: NativeCommand): Promise<NativeResult>
	{
		if (command.commandType !== 'text')
		{
			throw new InvalidOperationError('Run PostgreSQL procedures with CALL in command text');
		}

		await this.applyTimeout(command.timeout ?? 0);
		const result = await this.client.query({
			text: command.commandText,
			values: command.parameters.map(p => p.value),
			rowMode: 'array'
		});

		const affectedRows = result.rowCount ?? undefined;
		if (command.executionMode === 'nonQuery')
		{
			return { affectedRows };
		}
		const fields = result.fields.map(f => ({ name: f.name, type: KIND_BY_OID.get(f.dataTypeID) ?? 'unknown' }));
		return { cursor: new ArrayRowCursor(fields, result.rows), affectedRows };
	}

	async release(): Promise<void>
	{
		try
		{
			await this.applyTimeout(0);
			this.client.release();
		}
		catch (error)
		{
			// a client whose timeout could not be reset is discarded
			this.client.release(error instanceof Error ? error : new Error(String(error)));
			throw error;
		}
	}

	private async applyTimeout(timeout: number): Promise<void>
	{
		const milliseconds = Math.ceil(timeout);
		if (milliseconds === this.statementTimeout) return;
		await this.client.query(`SET statement_timeout = ${SQLValidator.integerLiteral(milliseconds, 'timeout')}`);
		this.statementTimeout = milliseconds;
	}
}
