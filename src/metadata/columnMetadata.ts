import { MappingError } from '../errors';

export interface ColumnDefinition
{
	sqlName: string;
	/** Native type tag as the catalog reports it, e.g. `varchar` or `INTEGER`. */
	typeName: string;
	isPrimaryKey?: boolean;
	isIdentity?: boolean;
	isComputed?: boolean;
	isNullable?: boolean;
	maxLength?: number;
}

/**
 * One column of a table or view. Immutable.
 */
export class ColumnMetadata
{
	readonly sqlName: string;
	readonly quotedSqlName: string;
	/** Property-facing name: the sql name with everything but letters, digits and underscores removed. */
	readonly identifierName: string;
	readonly typeName: string;
	readonly isPrimaryKey: boolean;
	readonly isIdentity: boolean;
	readonly isComputed: boolean;
	readonly isNullable: boolean;
	readonly maxLength?: number;

	constructor(definition: ColumnDefinition, quote: (identifier: string) => string)
	{
		this.sqlName = definition.sqlName;
		this.quotedSqlName = quote(definition.sqlName);
		this.identifierName = toIdentifierName(definition.sqlName);
		this.typeName = definition.typeName;
		this.isPrimaryKey = definition.isPrimaryKey ?? false;
		this.isIdentity = definition.isIdentity ?? false;
		this.isComputed = definition.isComputed ?? false;
		this.isNullable = definition.isNullable ?? true;
		this.maxLength = definition.maxLength;
		Object.freeze(this);
	}

	/**
	 * Whether a property-facing name refers to this column (case-insensitive, raw or cleaned name).
	 */
	matches(name: string): boolean
	{
		const lower = name.toLowerCase();
		return this.sqlName.toLowerCase() === lower || this.identifierName.toLowerCase() === lower;
	}
}

export function toIdentifierName(sqlName: string): string
{
	return sqlName.replace(/[^A-Za-z0-9_]/g, '');
}

/**
 * Ordered, case-insensitively unique set of columns.
 */
export class ColumnMetadataCollection implements Iterable<ColumnMetadata>
{
	private readonly list: readonly ColumnMetadata[];
	private readonly byName = new Map<string, ColumnMetadata>();

	constructor(readonly ownerName: string, columns: readonly ColumnMetadata[])
	{
		this.list = Object.freeze([...columns]);
		for (const column of columns)
		{
			const key = column.sqlName.toLowerCase();
			if (this.byName.has(key))
			{
				throw new MappingError(`Column ${column.sqlName} appears more than once on ${ownerName}`);
			}
			this.byName.set(key, column);
		}
		// cleaned names resolve too, unless they collide with a raw name
		for (const column of columns)
		{
			const key = column.identifierName.toLowerCase();
			if (!this.byName.has(key))
			{
				this.byName.set(key, column);
			}
		}
	}

	get length(): number
	{
		return this.list.length;
	}

	at(index: number): ColumnMetadata | undefined
	{
		return this.list[index];
	}

	[Symbol.iterator](): Iterator<ColumnMetadata>
	{
		return this.list[Symbol.iterator]();
	}

	toArray(): readonly ColumnMetadata[]
	{
		return this.list;
	}

	tryGetColumn(name: string): ColumnMetadata | undefined
	{
		return this.byName.get(name.toLowerCase());
	}

	getColumn(name: string): ColumnMetadata
	{
		const column = this.tryGetColumn(name);
		if (!column)
		{
			throw new MappingError(`${this.ownerName} does not have a column named ${name}`);
		}
		return column;
	}
}
