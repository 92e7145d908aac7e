import { SQLValidator } from './dialects/sqlValidator';

/**
 * Options for structured filters.
 */
export enum FilterOptions
{
	None = 0,
	/** Null or undefined properties are left out instead of rendered as `IS NULL`. */
	IgnoreNullProperties = 1
}

/**
 * Options for object updates and update-set commands.
 */
export enum UpdateOptions
{
	None = 0,
	/** Use the properties flagged `key` on the type instead of the table's primary key. */
	UseKeyAttribute = 1,
	/** Read back the values as they were before the update. */
	ReturnOldValues = 2,
	/** Do not check that exactly one row was affected. */
	IgnoreRowsAffected = 4
}

/**
 * Options for object deletes.
 */
export enum DeleteOptions
{
	None = 0,
	UseKeyAttribute = 1,
	IgnoreRowsAffected = 4
}

/**
 * Options for upserts.
 */
export enum UpsertOptions
{
	None = 0,
	UseKeyAttribute = 1
}

export function hasFlag(value: number, flag: number): boolean
{
	return (value & flag) === flag;
}

/**
 * Arguments for raw SQL text: positional values for `?`, or named values for `@name`.
 * A class instance with a registered type descriptor is read through its descriptor.
 */
export type SqlArguments = readonly unknown[] | object;

/**
 * The active filter of a command. At most one representation is active at a time.
 */
export type FilterSpec =
	| { readonly kind: 'none' }
	| { readonly kind: 'value'; readonly value: object; readonly options: FilterOptions }
	| { readonly kind: 'raw'; readonly where: string; readonly args?: SqlArguments };

export const NO_FILTER: FilterSpec = Object.freeze({ kind: 'none' });

/**
 * A raw WHERE clause with its arguments, or a structured filter value with its options.
 */
export function createFilter(filter: string | object, extra?: SqlArguments | FilterOptions): FilterSpec
{
	const spec: FilterSpec = typeof filter === 'string'
		? { kind: 'raw', where: filter, args: typeof extra === 'number' ? undefined : extra }
		: { kind: 'value', value: filter, options: typeof extra === 'number' ? extra : FilterOptions.None };
	return Object.freeze(spec);
}

export type SortDirection = 'ASC' | 'DESC';

export interface SortExpression
{
	readonly column: string;
	readonly direction: SortDirection;
}

/**
 * A sort expression, or a column name optionally followed by ASC or DESC.
 */
export type SortInput = string | { column: string; direction?: string };

export function parseSort(input: SortInput): SortExpression
{
	if (typeof input !== 'string')
	{
		return Object.freeze({
			column: input.column,
			direction: input.direction === undefined ? 'ASC' : toDirection(input.direction)
		});
	}

	const text = input.trim();
	const match = /^(.*?)\s+(asc|desc)$/i.exec(text);
	if (match)
	{
		return Object.freeze({ column: match[1], direction: toDirection(match[2]) });
	}
	return Object.freeze({ column: text, direction: 'ASC' });
}

function toDirection(text: string): SortDirection
{
	return SQLValidator.validateDirection(text) === 'DESC' ? 'DESC' : 'ASC';
}

/**
 * - `rows`: skip and take rows (OFFSET/FETCH, LIMIT/OFFSET)
 * - `top`: take the first rows only; skip is not supported
 * - `randomSample`: take a random sample, reproducible when a seed is given
 */
export type LimitStrategy = 'none' | 'rows' | 'top' | 'randomSample';

export interface LimitSpec
{
	readonly skip?: number;
	readonly take?: number;
	readonly strategy: LimitStrategy;
	readonly seed?: number;
}

export const NO_LIMIT: LimitSpec = Object.freeze({ strategy: 'none' });

/**
 * Validates and freezes a limit descriptor.
 */
export function createLimits(limits: { skip?: number; take?: number; strategy?: LimitStrategy; seed?: number }): LimitSpec
{
	SQLValidator.validateLimitValue(limits.skip, 'skip');
	SQLValidator.validateLimitValue(limits.take, 'take');
	if (limits.seed !== undefined && !Number.isSafeInteger(limits.seed))
	{
		throw new RangeError(`Invalid seed: ${limits.seed}`);
	}
	const strategy = limits.strategy ?? (limits.skip === undefined && limits.take === undefined ? 'none' : 'rows');
	return Object.freeze({ skip: limits.skip, take: limits.take, strategy, seed: limits.seed });
}
