import type { ChainResult, CommandDataSource } from '../commandDataSource';
import type { ExecutionToken } from '../executionToken';

/**
 * Desired-columns sentinel: the operation reads nothing back.
 */
export const NO_COLUMNS: unique symbol = Symbol('NoColumns');

/**
 * Desired-columns sentinel: every column the table has.
 */
export const ALL_COLUMNS: unique symbol = Symbol('AllColumns');

export type DesiredColumns = readonly string[] | typeof NO_COLUMNS | typeof ALL_COLUMNS;

export interface ExecuteOptions
{
	/** Aborting cancels the execution; the failure surfaces as OperationCanceledError. */
	signal?: AbortSignal;
	/** Command timeout in milliseconds for this execution. */
	timeout?: number;
}

/**
 * Anything that can turn a materializer into an execution token.
 */
export interface PreparableCommand
{
	readonly dataSource: CommandDataSource;
	prepare(materializer: Materializer<unknown>): ExecutionToken;
}

/**
 * Reads the result of a command into a typed value.
 */
export abstract class Materializer<TResult>
{
	constructor(protected readonly command: PreparableCommand) { }

	/**
	 * The columns this materializer needs. The builder never selects more.
	 */
	desiredColumns(): DesiredColumns
	{
		return ALL_COLUMNS;
	}

	/**
	 * Replaces the select list of a query, e.g. `COUNT(*)`.
	 */
	selectExpression(): string | undefined
	{
		return undefined;
	}

	/**
	 * Builds the token without running it.
	 */
	prepare(): ExecutionToken
	{
		return this.command.prepare(this);
	}

	abstract execute(options?: ExecuteOptions): Promise<TResult>;

	/**
	 * Prepares the token and runs it, reading the result before the cursor is closed.
	 * A failure to prepare rejects like any other.
	 */
	protected async run(read: (result: ChainResult, token: ExecutionToken) => TResult, options?: ExecuteOptions): Promise<TResult>
	{
		const token = this.prepare();
		return this.command.dataSource.execute(token, result => read(result, token), options);
	}
}
