import type { ParameterCollector } from './dialects/parameterCollector';
import { MappingError } from './errors';
import { ALL_COLUMNS, NO_COLUMNS } from './materializers/materializer';
import type { DesiredColumns } from './materializers/materializer';
import type { ColumnMetadata } from './metadata/columnMetadata';
import { PropertiesFilter } from './metadata/tableOrViewMetadata';
import type { TableOrViewMetadata } from './metadata/tableOrViewMetadata';
import type { TypeRegistry } from './metadata/typeDescriptor';
import { FilterOptions, hasFlag } from './operation';
import type { SortExpression } from './operation';

/**
 * Per-column state of one statement being built.
 */
export interface SqlBuilderEntry
{
	readonly column: ColumnMetadata;
	/** Selected, or read back through an output clause. */
	materialize: boolean;
	useForInsert: boolean;
	useForUpdate: boolean;
	isKey: boolean;
	/** An argument value was supplied for the column. */
	hasValue: boolean;
	value: unknown;
}

export interface ArgumentOptions
{
	/** Keys come from properties flagged `key` instead of the primary key. */
	useObjectDefinedKeys?: boolean;
}

/**
 * Column bookkeeping for one prepare call: which columns are read, written and used as keys,
 * and what values they are bound to. Never shared between prepare calls.
 *
 * Strict mode: on the read side every desired column must exist; on the write side every
 * mapped argument property must have a column. Lenient mode skips both. A read or write that
 * matches no column at all is an error in either mode.
 */
export class SqlBuilder
{
	private readonly entries: SqlBuilderEntry[];
	private selectAll = false;

	constructor(
		readonly metadata: TableOrViewMetadata,
		readonly types: TypeRegistry,
		readonly strictMode: boolean
	)
	{
		this.entries = metadata.columns.toArray().map(column => ({
			column,
			materialize: true,
			useForInsert: !column.isIdentity && !column.isComputed,
			useForUpdate: !column.isIdentity && !column.isComputed,
			isKey: column.isPrimaryKey,
			hasValue: false,
			value: undefined
		}));
	}

	private get tableName(): string
	{
		return this.metadata.name.toString();
	}

	applyDesiredColumns(desired: DesiredColumns): void
	{
		this.selectAll = desired === ALL_COLUMNS;
		if (desired === NO_COLUMNS || desired === ALL_COLUMNS)
		{
			for (const entry of this.entries) entry.materialize = desired === ALL_COLUMNS;
			return;
		}

		for (const entry of this.entries) entry.materialize = false;

		const unknown: string[] = [];
		let matched = 0;
		for (const name of desired)
		{
			const entry = this.find(name);
			if (!entry)
			{
				unknown.push(name);
			}
			else if (!entry.materialize)
			{
				entry.materialize = true;
				matched++;
			}
		}

		if (unknown.length > 0 && this.strictMode)
		{
			throw new MappingError(`The desired column(s) ${unknown.join(', ')} were not found on ${this.tableName}. Disable strict mode to ignore them.`);
		}
		if (matched === 0)
		{
			throw new MappingError(`None of the desired columns [${desired.join(', ')}] were found on ${this.tableName}`);
		}
	}

	/**
	 * Takes the values to write from an object, a registered class instance or a Map.
	 */
	applyArgumentValue(argumentValue: object, options: ArgumentOptions = {}): void
	{
		const descriptor = this.types.resolve(argumentValue);
		const typeName = descriptor?.name ?? 'the argument object';
		let matched = 0;

		if (options.useObjectDefinedKeys)
		{
			if (!descriptor)
			{
				throw new MappingError(`Object-defined keys need a registered type; no type descriptor is registered for ${typeName} on ${this.tableName}`);
			}
			this.metadata.getPropertiesFor(descriptor, PropertiesFilter.ObjectDefinedKey | PropertiesFilter.ThrowOnMissingColumns | PropertiesFilter.ThrowOnNoMatch);
			for (const entry of this.entries) entry.isKey = false;
		}

		if (descriptor)
		{
			if (this.strictMode)
			{
				this.metadata.getPropertiesFor(descriptor, PropertiesFilter.NonPrimaryKey | PropertiesFilter.ThrowOnMissingColumns);
			}
			for (const map of this.metadata.getPropertiesFor(descriptor))
			{
				const entry = this.entryFor(map.column);
				if (options.useObjectDefinedKeys)
				{
					entry.isKey = map.property.isKey;
				}
				if (!map.property.canRead) continue;
				entry.hasValue = true;
				entry.value = Reflect.get(argumentValue, map.property.name);
				matched++;
			}
		}
		else
		{
			const unmatched: string[] = [];
			for (const item of this.types.getValues(argumentValue))
			{
				const entry = this.find(item.columnName);
				if (!entry)
				{
					unmatched.push(item.columnName);
					continue;
				}
				entry.hasValue = true;
				entry.value = item.value;
				matched++;
			}
			if (unmatched.length > 0 && this.strictMode)
			{
				throw new MappingError(`The table ${this.tableName} is missing a column mapped to the properties: ${unmatched.join(', ')}. Disable strict mode to ignore them.`);
			}
		}

		if (matched === 0)
		{
			throw new MappingError(`None of the properties on ${typeName} match the columns on ${this.tableName}`);
		}
	}

	/**
	 * Replaces the key with explicitly named columns.
	 */
	overrideKeys(columnNames: readonly string[]): void
	{
		if (columnNames.length === 0)
		{
			throw new MappingError(`No match columns were given for ${this.tableName}`);
		}
		for (const entry of this.entries) entry.isKey = false;
		for (const name of columnNames)
		{
			const entry = this.find(name);
			if (!entry)
			{
				throw new MappingError(`${this.tableName} does not have a column named ${name}`);
			}
			entry.isKey = true;
		}
	}

	/**
	 * Renders a structured filter as ANDed predicates. Null properties become `IS NULL` unless
	 * ignored; everything else is bound. Properties without a column are skipped.
	 */
	applyFilterValue(filterValue: object, options: FilterOptions, collector: ParameterCollector): string
	{
		const predicates: string[] = [];
		let matched = 0;

		for (const item of this.types.getValues(filterValue))
		{
			const entry = this.find(item.columnName);
			if (!entry) continue;
			matched++;

			if (item.value === null || item.value === undefined)
			{
				if (hasFlag(options, FilterOptions.IgnoreNullProperties)) continue;
				predicates.push(`${entry.column.quotedSqlName} IS NULL`);
			}
			else
			{
				predicates.push(`${entry.column.quotedSqlName} = ${collector.add(entry.column.identifierName, item.value, entry.column.typeName)}`);
			}
		}

		if (matched === 0)
		{
			const typeName = this.types.resolve(filterValue)?.name ?? 'the filter object';
			throw new MappingError(`Unable to find any properties on ${typeName} that match the columns on ${this.tableName}`);
		}
		if (predicates.length === 0)
		{
			throw new MappingError(`Every filter property matching ${this.tableName} is null and null properties are ignored`);
		}
		return predicates.join(' AND ');
	}

	hasReadColumns(): boolean
	{
		return this.selectAll || this.entries.some(e => e.materialize);
	}

	getKeyColumns(): SqlBuilderEntry[]
	{
		return this.entries.filter(e => e.isKey);
	}

	/**
	 * Key columns for a statement that targets one row. Every key needs a supplied value.
	 */
	requireKeyColumns(operationName: string): SqlBuilderEntry[]
	{
		const keys = this.getKeyColumns();
		if (keys.length === 0)
		{
			throw new MappingError(`${operationName}: ${this.tableName} has no primary key. Use the object-defined key option or supply match columns.`);
		}
		const missing = keys.filter(k => !k.hasValue);
		if (missing.length > 0)
		{
			throw new MappingError(`${operationName}: no value was supplied for the key column(s) ${missing.map(k => k.column.sqlName).join(', ')}`);
		}
		return keys;
	}

	/**
	 * Columns to assign in an UPDATE: supplied, updatable and, unless asked for, not part of the key.
	 */
	getUpdateColumns(includeKeys = false): SqlBuilderEntry[]
	{
		return this.entries.filter(e => e.useForUpdate && e.hasValue && (includeKeys || !e.isKey));
	}

	getInsertColumns(): SqlBuilderEntry[]
	{
		return this.entries.filter(e => e.useForInsert && e.hasValue);
	}

	/**
	 * Insert columns of an upsert: like {@link getInsertColumns}, plus identity keys with a value
	 * so an existing row can be matched.
	 */
	getUpsertInsertColumns(): SqlBuilderEntry[]
	{
		return this.entries.filter(e => e.hasValue && (e.useForInsert || (e.isKey && !e.column.isComputed && e.value !== null && e.value !== undefined)));
	}

	getParameterizedColumns(): SqlBuilderEntry[]
	{
		return this.entries.filter(e => e.hasValue);
	}

	/**
	 * Columns to read, each with an optional prefix such as `Inserted.`; `*` for all columns.
	 * Empty when nothing is read.
	 */
	buildSelectClause(prefix = ''): string
	{
		if (this.selectAll)
		{
			return `${prefix}*`;
		}
		return this.entries.filter(e => e.materialize).map(e => prefix + e.column.quotedSqlName).join(', ');
	}

	buildAssignments(entries: readonly SqlBuilderEntry[], collector: ParameterCollector): string
	{
		return entries.map(e => `${e.column.quotedSqlName} = ${this.bind(e, collector)}`).join(', ');
	}

	buildInsertColumns(entries: readonly SqlBuilderEntry[]): string
	{
		return `(${entries.map(e => e.column.quotedSqlName).join(', ')})`;
	}

	buildValuesClause(entries: readonly SqlBuilderEntry[], collector: ParameterCollector): string
	{
		return `(${entries.map(e => this.bind(e, collector)).join(', ')})`;
	}

	buildKeyWhereClause(keys: readonly SqlBuilderEntry[], collector: ParameterCollector, prefix = ''): string
	{
		return keys.map(e => `${prefix}${e.column.quotedSqlName} = ${this.bind(e, collector)}`).join(' AND ');
	}

	buildOrderByClause(sort: readonly SortExpression[]): string
	{
		return sort.map(s => `${this.metadata.columns.getColumn(s.column).quotedSqlName} ${s.direction}`).join(', ');
	}

	bind(entry: SqlBuilderEntry, collector: ParameterCollector): string
	{
		return collector.add(entry.column.identifierName, entry.value, entry.column.typeName);
	}

	private find(name: string): SqlBuilderEntry | undefined
	{
		const column = this.metadata.columns.tryGetColumn(name);
		return column ? this.entryFor(column) : undefined;
	}

	private entryFor(column: ColumnMetadata): SqlBuilderEntry
	{
		const entry = this.entries.find(e => e.column === column);
		if (!entry)
		{
			throw new Error(`[SqlBuilder.entryFor] Column ${column.sqlName} does not belong to ${this.tableName}`);
		}
		return entry;
	}
}
