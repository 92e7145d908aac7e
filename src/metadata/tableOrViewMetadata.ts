import { LazyCache } from '../concurrency/lazyCache';
import { MappingError } from '../errors';
import { getLogger } from '../logger';
import { ColumnMetadata, ColumnMetadataCollection } from './columnMetadata';
import type { ObjectName } from './objectName';
import type { PropertyMetadata, TypeDescriptor } from './typeDescriptor';

/**
 * Bit flags selecting which column/property pairs {@link TableOrViewMetadata.getPropertiesFor} returns.
 * At most one of the first four flags is meaningful; they are checked in declaration order.
 */
export enum PropertiesFilter
{
	None = 0,
	PrimaryKey = 1,
	NonPrimaryKey = 2,
	ObjectDefinedKey = 4,
	ObjectDefinedNonKey = 8,
	/** Drop identity and computed columns. */
	UpdatableOnly = 16,
	/** With PrimaryKey: every primary key column needs a property. */
	ThrowOnMissingProperties = 32,
	/** With NonPrimaryKey or ObjectDefinedKey: every mapped (key) property needs a column. */
	ThrowOnMissingColumns = 64,
	/** An empty result is an error. */
	ThrowOnNoMatch = 128
}

/**
 * One column paired with the property it maps to.
 */
export interface ColumnPropertyMap
{
	readonly column: ColumnMetadata;
	readonly property: PropertyMetadata;
}

/**
 * A table or view as discovered from the catalog.
 * Property maps are computed once per (type, filter) and kept for the life of this object.
 */
export class TableOrViewMetadata
{
	readonly columns: ColumnMetadataCollection;
	private readonly propertyMaps = new LazyCache<string, readonly ColumnPropertyMap[]>();
	private readonly logger = getLogger('TableOrViewMetadata');

	constructor(
		readonly name: ObjectName,
		readonly quotedName: string,
		readonly isTable: boolean,
		columns: readonly ColumnMetadata[],
		/** SQLite rowid; false for views and WITHOUT ROWID tables. */
		readonly hasRowId: boolean = isTable
	)
	{
		this.columns = new ColumnMetadataCollection(name.toString(), columns);
	}

	tryGetColumn(name: string): ColumnMetadata | undefined
	{
		return this.columns.tryGetColumn(name);
	}

	get primaryKeyColumns(): ColumnMetadata[]
	{
		return this.columns.toArray().filter(c => c.isPrimaryKey);
	}

	get identityColumn(): ColumnMetadata | undefined
	{
		return this.columns.toArray().find(c => c.isIdentity);
	}

	getPropertiesFor(descriptor: TypeDescriptor<object>, filter: PropertiesFilter = PropertiesFilter.None): readonly ColumnPropertyMap[]
	{
		return this.propertyMaps.getOrAdd(`${descriptor.id}:${filter}`, () => this.computeProperties(descriptor, filter));
	}

	private computeProperties(descriptor: TypeDescriptor<object>, filter: PropertiesFilter): readonly ColumnPropertyMap[]
	{
		if (filter === PropertiesFilter.None)
		{
			this.logger.debug('Mapping type to columns', { type: descriptor.name, table: this.name.toString() });
			const properties = descriptor.getProperties();
			const result: ColumnPropertyMap[] = [];
			for (const column of this.columns)
			{
				const property = properties.find(p => p.mappedColumnName !== undefined && column.matches(p.mappedColumnName));
				if (property)
				{
					result.push(Object.freeze({ column, property }));
				}
			}
			return Object.freeze(result);
		}

		// filtered maps are derived from the unfiltered one
		let result = this.getPropertiesFor(descriptor, PropertiesFilter.None);
		let filterText = '';

		if (filter & PropertiesFilter.PrimaryKey)
		{
			filterText = 'primary key';
			result = result.filter(m => m.column.isPrimaryKey);
			if (filter & PropertiesFilter.ThrowOnMissingProperties)
			{
				const missing = this.primaryKeyColumns.filter(c => !result.some(m => m.column === c));
				if (missing.length > 0)
				{
					throw new MappingError(`The type ${descriptor.name} is missing a property mapped to the primary key column(s): ${missing.map(c => c.sqlName).join(', ')} on table ${this.name}`);
				}
			}
		}
		else if (filter & PropertiesFilter.NonPrimaryKey)
		{
			filterText = 'non-primary key';
			if (filter & PropertiesFilter.ThrowOnMissingColumns)
			{
				const mapped = result;
				const missing = descriptor.getProperties().filter(p => p.mappedColumnName !== undefined && !mapped.some(m => m.property === p));
				if (missing.length > 0)
				{
					throw new MappingError(`The table ${this.name} is missing a column mapped to the properties: ${missing.map(p => p.mappedColumnName).join(', ')} on type ${descriptor.name}. Mark the properties notMapped or disable strict mode.`);
				}
			}
			result = result.filter(m => !m.column.isPrimaryKey);
		}
		else if (filter & PropertiesFilter.ObjectDefinedKey)
		{
			filterText = 'object defined key';
			result = result.filter(m => m.property.isKey);
			if (filter & PropertiesFilter.ThrowOnMissingColumns)
			{
				const keys = result;
				const missing = descriptor.getProperties().filter(p => p.isKey && !keys.some(m => m.property === p));
				if (missing.length > 0)
				{
					throw new MappingError(`The table ${this.name} is missing a column mapped to the key properties: ${missing.map(p => p.mappedColumnName ?? p.name).join(', ')} on type ${descriptor.name}`);
				}
			}
		}
		else if (filter & PropertiesFilter.ObjectDefinedNonKey)
		{
			filterText = 'object defined non-key';
			result = result.filter(m => !m.property.isKey);
		}

		if (filter & PropertiesFilter.UpdatableOnly)
		{
			result = result.filter(m => !m.column.isComputed && !m.column.isIdentity);
		}

		if ((filter & PropertiesFilter.ThrowOnNoMatch) && result.length === 0)
		{
			const which = filterText ? `${filterText} columns` : 'columns';
			throw new MappingError(`None of the properties for ${descriptor.name} match the ${which} for ${this.name}`);
		}

		return Object.freeze(result);
	}
}

/**
 * A parameter of a stored procedure or table function.
 */
export interface ParameterMetadata
{
	readonly sqlName: string;
	readonly typeName: string;
	readonly direction: 'in' | 'out' | 'inout';
}

/**
 * A stored procedure or table-valued function.
 */
export class RoutineMetadata
{
	constructor(
		readonly name: ObjectName,
		readonly quotedName: string,
		readonly kind: 'procedure' | 'function',
		readonly parameters: readonly ParameterMetadata[],
		/** Result columns, for table functions. */
		readonly columns: readonly ColumnMetadata[] = []
	)
	{
		Object.freeze(this);
	}
}
