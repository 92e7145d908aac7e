/**
 * Error taxonomy for the data-access core.
 * Nothing here is retried; every error surfaces to the caller as-is.
 */

/**
 * Base class of every error raised by this library.
 */
export class ChainError extends Error
{
	constructor(message: string, options?: { cause?: unknown })
	{
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Desired columns, filter values or argument values could not be matched against
 * the table metadata or the target type.
 */
export class MappingError extends ChainError { }

/**
 * The operation descriptor asks for something the dialect cannot express,
 * such as skipping rows with a top-N limit.
 */
export class InvalidOperationError extends ChainError { }

/**
 * The native command reported a different number of affected rows than expected.
 * The statement has already run; nothing is rolled back here.
 */
export class RowCountMismatchError extends ChainError
{
	constructor(
		readonly operationName: string,
		readonly expected: number,
		readonly actual: number
	)
	{
		super(`Expected ${expected} row(s) to be affected by ${operationName}, but ${actual} row(s) were affected.`);
	}
}

/**
 * A table, view, procedure or function does not exist.
 */
export class MissingObjectError extends ChainError
{
	constructor(readonly objectName: string, kind = 'table or view')
	{
		super(`Could not find ${kind} ${objectName}`);
	}
}

/**
 * A single-row materializer received no row.
 */
export class MissingDataError extends ChainError { }

/**
 * A single-row materializer received more than one row.
 */
export class UnexpectedDataError extends ChainError { }

/**
 * The operation was canceled through its AbortSignal. The native failure is kept as the cause.
 */
export class OperationCanceledError extends ChainError
{
	constructor(message = 'Operation was canceled.', options?: { cause?: unknown })
	{
		super(message, options);
	}
}

/**
 * The transactional context was already committed, rolled back or disposed.
 */
export class DisposedError extends ChainError
{
	constructor(what = 'Transaction')
	{
		super(`${what} is disposed.`);
	}
}
