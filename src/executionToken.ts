import type { LockMode } from './concurrency/readerWriterLock';
import { RowCountMismatchError } from './errors';
import type { CommandType, ExecutionMode, SqlParameter } from './nativeCommand';

export interface ExecutionTokenInit
{
	operationName: string;
	commandText: string;
	commandType?: CommandType;
	parameters: readonly SqlParameter[];
	executionMode: ExecutionMode;
	expectedRowCount?: number;
	lockMode: LockMode;
	/** Timeout in milliseconds; the data source default applies when omitted. */
	timeout?: number;
	/**
	 * Whether this token is the operation's own statement. Read-back and setup
	 * statements chained around it are not primary.
	 */
	primary?: boolean;
}

/**
 * A prepared native command plus its post-conditions, optionally followed by more tokens
 * that run on the same session. Immutable.
 */
export class ExecutionToken
{
	readonly operationName: string;
	readonly commandText: string;
	readonly commandType: CommandType;
	readonly parameters: readonly SqlParameter[];
	readonly executionMode: ExecutionMode;
	readonly expectedRowCount?: number;
	readonly lockMode: LockMode;
	readonly timeout?: number;
	readonly primary: boolean;

	constructor(init: ExecutionTokenInit, readonly next?: ExecutionToken)
	{
		this.operationName = init.operationName;
		this.commandText = init.commandText;
		this.commandType = init.commandType ?? 'text';
		this.parameters = Object.freeze([...init.parameters]);
		this.executionMode = init.executionMode;
		this.expectedRowCount = init.expectedRowCount;
		this.lockMode = init.lockMode;
		this.timeout = init.timeout;
		this.primary = init.primary ?? true;
		Object.freeze(this);
	}

	/**
	 * Links tokens in the given order.
	 */
	static chain(first: ExecutionTokenInit, ...rest: ExecutionTokenInit[]): ExecutionToken
	{
		let next: ExecutionToken | undefined;
		for (let i = rest.length - 1; i >= 0; i--)
		{
			next = new ExecutionToken(rest[i], next);
		}
		return new ExecutionToken(first, next);
	}

	/**
	 * The chain starting at this token, in execution order.
	 */
	*tokens(): Generator<ExecutionToken>
	{
		let current: ExecutionToken | undefined = this;
		while (current)
		{
			yield current;
			current = current.next;
		}
	}

	/**
	 * Command text of the whole chain, one statement per line.
	 */
	get chainText(): string
	{
		return [...this.tokens()].map(t => t.commandText).join('\n');
	}

	/**
	 * The strongest lock any token in the chain asks for.
	 */
	get chainLockMode(): LockMode
	{
		let mode: LockMode = 'none';
		for (const token of this.tokens())
		{
			if (token.lockMode === 'write') return 'write';
			if (token.lockMode === 'read') mode = 'read';
		}
		return mode;
	}

	/**
	 * Copy of the chain with a timeout on every token that does not have its own.
	 */
	withTimeout(timeout: number): ExecutionToken
	{
		const next = this.next?.withTimeout(timeout);
		return new ExecutionToken({ ...this.toInit(), timeout: this.timeout ?? timeout }, next);
	}

	/**
	 * Throws when the reported affected row count differs from the expected one.
	 * Nothing is checked when no count is expected or the driver reported none.
	 */
	checkAffectedRowCount(actual: number | undefined): void
	{
		if (this.expectedRowCount === undefined || actual === undefined) return;
		if (actual !== this.expectedRowCount)
		{
			throw new RowCountMismatchError(this.operationName, this.expectedRowCount, actual);
		}
	}

	private toInit(): ExecutionTokenInit
	{
		return {
			operationName: this.operationName,
			commandText: this.commandText,
			commandType: this.commandType,
			parameters: this.parameters,
			executionMode: this.executionMode,
			expectedRowCount: this.expectedRowCount,
			lockMode: this.lockMode,
			timeout: this.timeout,
			primary: this.primary
		};
	}
}
