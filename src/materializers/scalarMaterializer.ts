import type { ChainResult } from '../commandDataSource';
import { MissingDataError } from '../errors';
import type { RowCursor } from '../rowCursor';
import { convertToNumber } from './columnReader';
import { Materializer, NO_COLUMNS } from './materializer';
import type { DesiredColumns, ExecuteOptions, PreparableCommand } from './materializer';

/**
 * Converts a non-null cell; the label names the column in errors.
 */
export type ValueConverter<T> = (value: unknown, label: string) => T;

/**
 * Column index to read: the named column, or the first one.
 */
function columnIndex(cursor: RowCursor, column: string | undefined): number
{
	if (column === undefined)
	{
		if (cursor.fieldCount === 0)
		{
			throw new MissingDataError('The result has no columns');
		}
		return 0;
	}
	const lower = column.toLowerCase();
	for (let i = 0; i < cursor.fieldCount; i++)
	{
		if (cursor.getName(i).toLowerCase() === lower) return i;
	}
	throw new MissingDataError(`The result does not have a column named ${column}`);
}

/**
 * Reads the first row's value, or `missing` when there is no row or the value is NULL.
 */
function readFirst<T, TMissing>(result: ChainResult, column: string | undefined, convert: ValueConverter<T>, missing: () => TMissing): T | TMissing
{
	const cursor = result.cursor;
	if (!cursor || !cursor.read())
	{
		return missing();
	}
	const index = columnIndex(cursor, column);
	if (cursor.isNull(index))
	{
		return missing();
	}
	return convert(cursor.getValue(index), `column ${cursor.getName(index)}`);
}

abstract class SingleColumnMaterializer<TResult> extends Materializer<TResult>
{
	constructor(command: PreparableCommand, protected readonly column?: string)
	{
		super(command);
	}

	desiredColumns(): DesiredColumns
	{
		// no named column: read everything and take the first
		return this.column === undefined ? super.desiredColumns() : [this.column];
	}
}

/**
 * One value from the first row. No row, or NULL, is a MissingDataError.
 */
export class ScalarMaterializer<T> extends SingleColumnMaterializer<T>
{
	constructor(command: PreparableCommand, private readonly convert: ValueConverter<T>, column?: string)
	{
		super(command, column);
	}

	execute(options?: ExecuteOptions): Promise<T>
	{
		return this.run((result, token) => readFirst(result, this.column, this.convert, () =>
		{
			throw new MissingDataError(`${token.operationName} did not return a value`);
		}), options);
	}
}

/**
 * One value from the first row; null when there is no row or the value is NULL.
 */
export class ScalarOrNullMaterializer<T> extends SingleColumnMaterializer<T | null>
{
	constructor(command: PreparableCommand, private readonly convert: ValueConverter<T>, column?: string)
	{
		super(command, column);
	}

	execute(options?: ExecuteOptions): Promise<T | null>
	{
		return this.run(result => readFirst(result, this.column, this.convert, () => null), options);
	}
}

export interface ListOptions
{
	column?: string;
	/** Skip NULL values instead of failing with MissingDataError. */
	discardNulls?: boolean;
}

/**
 * One column of every row.
 */
export class ListMaterializer<T> extends SingleColumnMaterializer<T[]>
{
	constructor(command: PreparableCommand, private readonly convert: ValueConverter<T>, private readonly options: ListOptions = {})
	{
		super(command, options.column);
	}

	execute(options?: ExecuteOptions): Promise<T[]>
	{
		return this.run(result =>
		{
			const values: T[] = [];
			const cursor = result.cursor;
			if (!cursor) return values;

			let index: number | undefined;
			while (cursor.read())
			{
				index ??= columnIndex(cursor, this.column);
				if (cursor.isNull(index))
				{
					if (this.options.discardNulls) continue;
					throw new MissingDataError(`Row ${values.length + 1} has a NULL in column ${cursor.getName(index)}; use discardNulls to skip it`);
				}
				values.push(this.convert(cursor.getValue(index), `column ${cursor.getName(index)}`));
			}
			return values;
		}, options);
	}
}

/**
 * Row count of a query, as `SELECT COUNT(*)`.
 */
export class CountMaterializer extends Materializer<number>
{
	desiredColumns(): DesiredColumns
	{
		return NO_COLUMNS;
	}

	selectExpression(): string
	{
		return 'COUNT(*)';
	}

	execute(options?: ExecuteOptions): Promise<number>
	{
		return this.run(result => readFirst(result, undefined, convertToNumber, () => 0), options);
	}
}
