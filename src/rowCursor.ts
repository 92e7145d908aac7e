/**
 * Representation kinds shared by row cursors (what a column holds) and type
 * descriptors (what a property wants).
 */
export type ValueKind = 'string' | 'number' | 'bigint' | 'boolean' | 'date' | 'buffer' | 'json' | 'unknown';

/**
 * Forward-only cursor over the rows a native command produced.
 * Column indexes are zero-based.
 */
export interface RowCursor
{
	readonly fieldCount: number;

	/** Total rows, for cursors over a buffered result. */
	readonly rowCount?: number;

	/** Advances to the next row; false at the end. */
	read(): boolean;

	isNull(index: number): boolean;
	getName(index: number): string;
	getFieldType(index: number): ValueKind;

	getValue(index: number): unknown;
	getString(index: number): string;
	getNumber(index: number): number;
	getBigInt(index: number): bigint;
	getBoolean(index: number): boolean;
	getDate(index: number): Date;
	getBuffer(index: number): Buffer;

	/** Releases the cursor. Reading afterwards fails. */
	close(): void;
}

/**
 * Column description handed to an {@link ArrayRowCursor}.
 */
export interface CursorField
{
	name: string;
	/** Omit to infer the kind from the first non-null value in the column. */
	type?: ValueKind;
}

/**
 * Infers the representation kind of a value as a driver returned it.
 */
export function kindOf(value: unknown): ValueKind
{
	switch (typeof value)
	{
		case 'string': return 'string';
		case 'number': return 'number';
		case 'bigint': return 'bigint';
		case 'boolean': return 'boolean';
		case 'object':
			if (value instanceof Date) return 'date';
			if (Buffer.isBuffer(value)) return 'buffer';
			if (value !== null) return 'json';
			return 'unknown';
		default:
			return 'unknown';
	}
}

/**
 * Row cursor over a fully buffered result, which is how the Node.js drivers hand rows back.
 * Typed getters check the value they return; a mismatch is a TypeError.
 */
export class ArrayRowCursor implements RowCursor
{
	private position = -1;
	private closed = false;
	private readonly kinds: ValueKind[];

	constructor(
		private readonly fields: readonly CursorField[],
		private readonly rows: readonly (readonly unknown[])[]
	)
	{
		this.kinds = fields.map((field, index) => field.type ?? this.inferKind(index));
	}

	/**
	 * Builds a cursor from object rows, taking the column order from the first row
	 * unless the column names are given.
	 */
	static fromRecords(records: readonly Record<string, unknown>[], columnNames?: readonly string[]): ArrayRowCursor
	{
		const names = columnNames ?? (records.length > 0 ? Object.keys(records[0]) : []);
		return new ArrayRowCursor(
			names.map(name => ({ name })),
			records.map(record => names.map(name => record[name]))
		);
	}

	get fieldCount(): number
	{
		return this.fields.length;
	}

	get rowCount(): number
	{
		return this.rows.length;
	}

	read(): boolean
	{
		this.ensureOpen();
		if (this.position + 1 >= this.rows.length)
		{
			this.position = this.rows.length;
			return false;
		}
		this.position++;
		return true;
	}

	isNull(index: number): boolean
	{
		const value = this.current(index);
		return value === null || value === undefined;
	}

	getName(index: number): string
	{
		this.checkIndex(index);
		return this.fields[index].name;
	}

	getFieldType(index: number): ValueKind
	{
		this.checkIndex(index);
		return this.kinds[index];
	}

	getValue(index: number): unknown
	{
		const value = this.current(index);
		return value === undefined ? null : value;
	}

	getString(index: number): string
	{
		const value = this.current(index);
		if (typeof value !== 'string') throw this.typeError(index, 'string');
		return value;
	}

	getNumber(index: number): number
	{
		const value = this.current(index);
		if (typeof value !== 'number') throw this.typeError(index, 'number');
		return value;
	}

	getBigInt(index: number): bigint
	{
		const value = this.current(index);
		if (typeof value !== 'bigint') throw this.typeError(index, 'bigint');
		return value;
	}

	getBoolean(index: number): boolean
	{
		const value = this.current(index);
		if (typeof value !== 'boolean') throw this.typeError(index, 'boolean');
		return value;
	}

	getDate(index: number): Date
	{
		const value = this.current(index);
		if (!(value instanceof Date)) throw this.typeError(index, 'date');
		return value;
	}

	getBuffer(index: number): Buffer
	{
		const value = this.current(index);
		if (!Buffer.isBuffer(value)) throw this.typeError(index, 'buffer');
		return value;
	}

	close(): void
	{
		this.closed = true;
	}

	private inferKind(index: number): ValueKind
	{
		for (const row of this.rows)
		{
			const value = row[index];
			if (value !== null && value !== undefined)
			{
				return kindOf(value);
			}
		}
		return 'unknown';
	}

	private current(index: number): unknown
	{
		this.ensureOpen();
		this.checkIndex(index);
		if (this.position < 0 || this.position >= this.rows.length)
		{
			throw new Error('No current row; call read() first');
		}
		return this.rows[this.position][index];
	}

	private checkIndex(index: number): void
	{
		if (index < 0 || index >= this.fields.length)
		{
			throw new RangeError(`Column index ${index} is out of range (${this.fields.length} columns)`);
		}
	}

	private ensureOpen(): void
	{
		if (this.closed)
		{
			throw new Error('The cursor is closed');
		}
	}

	private typeError(index: number, expected: ValueKind): TypeError
	{
		return new TypeError(`Column ${this.fields[index].name} does not hold a ${expected} value`);
	}
}

/**
 * Reads the remaining rows of a cursor into plain records keyed by column name.
 */
export function readRecords(cursor: RowCursor): Record<string, unknown>[]
{
	const records: Record<string, unknown>[] = [];
	const names: string[] = [];
	for (let i = 0; i < cursor.fieldCount; i++)
	{
		names.push(cursor.getName(i));
	}
	while (cursor.read())
	{
		const record: Record<string, unknown> = {};
		names.forEach((name, i) =>
		{
			record[name] = cursor.getValue(i);
		});
		records.push(record);
	}
	return records;
}
