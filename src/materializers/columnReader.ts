import { MappingError } from '../errors';
import type { PropertyMetadata } from '../metadata/typeDescriptor';
import { kindOf } from '../rowCursor';
import type { RowCursor, ValueKind } from '../rowCursor';

/**
 * Reads one column of the current row, already converted for its target.
 */
export type ColumnReader = (cursor: RowCursor, index: number) => unknown;

function conversionError(value: unknown, target: string, label: string): MappingError
{
	return new MappingError(`Cannot convert the ${kindOf(value)} value of ${label} to ${target}`);
}

export function convertToNumber(value: unknown, label: string): number
{
	switch (typeof value)
	{
		case 'number':
			return value;
		case 'bigint':
			if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER))
			{
				throw new MappingError(`The value ${value} of ${label} does not fit in a number`);
			}
			return Number(value);
		case 'boolean':
			return value ? 1 : 0;
		case 'string':
		{
			const parsed = value.trim() === '' ? NaN : Number(value);
			if (Number.isNaN(parsed))
			{
				throw conversionError(value, 'number', label);
			}
			return parsed;
		}
		default:
			throw conversionError(value, 'number', label);
	}
}

export function convertToBigInt(value: unknown, label: string): bigint
{
	switch (typeof value)
	{
		case 'bigint':
			return value;
		case 'number':
			if (!Number.isInteger(value))
			{
				throw new MappingError(`The value ${value} of ${label} is not an integer`);
			}
			return BigInt(value);
		case 'string':
			try
			{
				return BigInt(value.trim());
			}
			catch (error)
			{
				throw new MappingError(`Cannot convert '${value}' of ${label} to bigint`, { cause: error });
			}
		default:
			throw conversionError(value, 'bigint', label);
	}
}

export function convertToBoolean(value: unknown, label: string): boolean
{
	switch (typeof value)
	{
		case 'boolean':
			return value;
		case 'number':
			return value !== 0;
		case 'bigint':
			return value !== 0n;
		default:
			throw conversionError(value, 'boolean', label);
	}
}

export function convertToString(value: unknown, label: string): string
{
	switch (typeof value)
	{
		case 'string':
			return value;
		case 'number':
		case 'bigint':
		case 'boolean':
			return String(value);
		default:
			if (value instanceof Date) return value.toISOString();
			if (Buffer.isBuffer(value)) return value.toString('utf8');
			throw conversionError(value, 'string', label);
	}
}

export function convertToDate(value: unknown, label: string): Date
{
	if (value instanceof Date)
	{
		return value;
	}
	if (typeof value === 'string' || typeof value === 'number')
	{
		const date = new Date(value);
		if (Number.isNaN(date.getTime()))
		{
			throw conversionError(value, 'date', label);
		}
		return date;
	}
	throw conversionError(value, 'date', label);
}

export function convertToBuffer(value: unknown, label: string): Buffer
{
	if (Buffer.isBuffer(value))
	{
		return value;
	}
	throw conversionError(value, 'buffer', label);
}

/**
 * JSON text is parsed; values the driver already parsed pass through.
 */
export function convertToJson(value: unknown, label: string): unknown
{
	if (typeof value === 'string')
	{
		try
		{
			return JSON.parse(value);
		}
		catch (error)
		{
			throw new MappingError(`${label} does not hold valid JSON`, { cause: error });
		}
	}
	if (typeof value === 'object' && value !== null && !(value instanceof Date) && !Buffer.isBuffer(value))
	{
		return value;
	}
	throw conversionError(value, 'json', label);
}

/**
 * Converts a non-null value to the representation a target kind asks for.
 * Unsupported pairs are a MappingError.
 */
export function convertValue(value: unknown, target: ValueKind, label: string): unknown
{
	switch (target)
	{
		case 'string': return convertToString(value, label);
		case 'number': return convertToNumber(value, label);
		case 'bigint': return convertToBigInt(value, label);
		case 'boolean': return convertToBoolean(value, label);
		case 'date': return convertToDate(value, label);
		case 'buffer': return convertToBuffer(value, label);
		case 'json': return convertToJson(value, label);
		case 'unknown': return value;
	}
}

/**
 * The cursor accessor that returns a kind without conversion.
 */
function directGetter(kind: ValueKind): ColumnReader
{
	switch (kind)
	{
		case 'string': return (cursor, index) => cursor.getString(index);
		case 'number': return (cursor, index) => cursor.getNumber(index);
		case 'bigint': return (cursor, index) => cursor.getBigInt(index);
		case 'boolean': return (cursor, index) => cursor.getBoolean(index);
		case 'date': return (cursor, index) => cursor.getDate(index);
		case 'buffer': return (cursor, index) => cursor.getBuffer(index);
		case 'json':
		case 'unknown':
			return (cursor, index) => cursor.getValue(index);
	}
}

/**
 * Builds the reader for one (column, property) pair.
 *
 * When the column's reported kind is the property's kind the typed accessor is used as is;
 * otherwise the value is read untyped and converted. NULL goes to nullable properties only.
 * Both binder tiers build their readers here, so they produce the same values.
 */
export function createColumnReader(fieldType: ValueKind, property: PropertyMetadata, columnName: string): ColumnReader
{
	const label = `column ${columnName} (property ${property.name})`;
	const target = property.type;
	const read: ColumnReader = fieldType === target || target === 'unknown'
		? directGetter(target)
		: (cursor, index) => convertValue(cursor.getValue(index), target, label);

	return (cursor, index) =>
	{
		if (cursor.isNull(index))
		{
			if (!property.nullable)
			{
				throw new MappingError(`${label} is NULL but the property does not accept null`);
			}
			return null;
		}
		return read(cursor, index);
	};
}
