import type { RowCursor } from './rowCursor';

/**
 * How the command text is interpreted by the driver.
 */
export type CommandType = 'text' | 'storedProcedure';

/**
 * Whether the command is expected to return rows.
 * `nonQuery` commands only report affected rows.
 */
export type ExecutionMode = 'query' | 'nonQuery';

/**
 * A bound parameter. `name` is informational for positional dialects.
 */
export interface SqlParameter
{
	readonly name: string;
	readonly value: unknown;
	/** Native type tag of the column the value is bound against, when known. */
	readonly dbType?: string;
}

/**
 * What a native command needs to run.
 */
export interface NativeCommand
{
	commandText: string;
	commandType: CommandType;
	executionMode: ExecutionMode;
	parameters: readonly SqlParameter[];
	/** Timeout in milliseconds. */
	timeout?: number;
}

/**
 * What a native command produced.
 */
export interface NativeResult
{
	cursor?: RowCursor;
	/** Undefined when the driver does not report it. */
	affectedRows?: number;
	lastInsertId?: number | bigint | string;
}

/**
 * One native connection, held for the duration of an execution chain or a transaction.
 */
export interface NativeSession
{
	/**
	 * Runs a command. Drivers that can interrupt a running statement do so when the signal aborts.
	 */
	execute(command: NativeCommand, signal?: AbortSignal): Promise<NativeResult>;

	/**
	 * Returns the session to its connection (pool release or handle close).
	 */
	release(): Promise<void>;
}

/**
 * Options when opening a session.
 */
export interface SessionOptions
{
	/** The session will host a transaction and must not be shared with other callers. */
	transactional?: boolean;
}

/**
 * The driver boundary: everything the core needs from a vendor driver.
 */
export interface NativeConnection
{
	openSession(options?: SessionOptions): Promise<NativeSession>;

	/**
	 * Closes the underlying driver resources.
	 */
	close(): Promise<void>;
}
