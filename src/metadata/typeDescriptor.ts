import { MappingError } from '../errors';
import type { ValueKind } from '../rowCursor';

/**
 * Options for one property of a described type.
 * A bare {@link ValueKind} string is shorthand for `{ type }`.
 */
export interface PropertyOptions
{
	/** Representation the property holds (default: 'unknown', values pass through). */
	type?: ValueKind;
	/** Whether the property accepts null (default: true). */
	nullable?: boolean;
	/** Column the property maps to (default: the property name). */
	column?: string;
	/** The property is part of the object's own key. */
	key?: boolean;
	/** The property is not mapped to any column. */
	notMapped?: boolean;
	/** The property can be read but not written by materializers. */
	readOnly?: boolean;
	/** The property is written by materializers but never read for parameters. */
	writeOnly?: boolean;
	/** The property holds a nested object whose properties map to prefixed columns. */
	decompose?: TypeDescriptor<object>;
	/** Column-name prefix for the nested object's columns (default: none). */
	prefix?: string;
}

/**
 * Immutable description of one property.
 */
export class PropertyMetadata
{
	readonly type: ValueKind;
	readonly nullable: boolean;
	/** Column the property is mapped to; undefined when not mapped (or decomposed). */
	readonly mappedColumnName?: string;
	readonly canRead: boolean;
	readonly canWrite: boolean;
	readonly isKey: boolean;
	readonly decompose?: TypeDescriptor<object>;
	readonly decompositionPrefix: string;

	constructor(readonly name: string, options: PropertyOptions)
	{
		this.type = options.type ?? 'unknown';
		this.nullable = options.nullable ?? true;
		this.canRead = options.writeOnly !== true;
		this.canWrite = options.readOnly !== true;
		this.isKey = options.key === true;
		this.decompose = options.decompose;
		this.decompositionPrefix = options.prefix ?? '';
		if (!options.notMapped && !options.decompose)
		{
			this.mappedColumnName = options.column ?? name;
		}
	}
}

/**
 * A named, non-default way to construct a type from column values.
 */
export interface ConstructorSignature<T>
{
	readonly name: string;
	/** Column names, in argument order. */
	readonly parameters: readonly string[];
	create(args: readonly unknown[]): T;
}

/**
 * Objects that keep a "changed" flag and can reset it after materialization.
 */
export interface ChangeTracking
{
	acceptChanges(): void;
}

export function isChangeTracking(value: object): value is ChangeTracking
{
	return 'acceptChanges' in value && typeof value.acceptChanges === 'function';
}

export interface TypeDescriptorOptions<T>
{
	constructors?: readonly ConstructorSignature<T>[];
	/** Instances implement {@link ChangeTracking}. Detected from a sample instance when omitted. */
	tracksChanges?: boolean;
}

let nextDescriptorId = 1;

/**
 * Ahead-of-time description of an object shape, standing in for runtime reflection.
 * Descriptors are immutable and compared by identity.
 */
export class TypeDescriptor<T extends object>
{
	/** Unique per descriptor; part of compiled binder cache keys. */
	readonly id: number;
	readonly constructors: readonly ConstructorSignature<T>[];
	readonly tracksChanges: boolean;
	private readonly propertyList: readonly PropertyMetadata[];
	private readonly byName = new Map<string, PropertyMetadata>();
	private columnList?: readonly string[];

	constructor(
		readonly name: string,
		private readonly factory: () => T,
		properties: readonly PropertyMetadata[],
		options: TypeDescriptorOptions<T> = {}
	)
	{
		this.id = nextDescriptorId++;
		this.propertyList = Object.freeze([...properties]);
		for (const property of properties)
		{
			const key = property.name.toLowerCase();
			if (this.byName.has(key))
			{
				throw new MappingError(`Type ${name} declares the property ${property.name} more than once`);
			}
			this.byName.set(key, property);
		}
		this.constructors = Object.freeze([...(options.constructors ?? [])]);
		this.tracksChanges = options.tracksChanges ?? isChangeTracking(factory());
	}

	create(): T
	{
		return this.factory();
	}

	/**
	 * Ordered property list.
	 */
	getProperties(): readonly PropertyMetadata[]
	{
		return this.propertyList;
	}

	tryGetProperty(name: string): PropertyMetadata | undefined
	{
		return this.byName.get(name.toLowerCase());
	}

	/**
	 * Column names the type can be materialized from, decomposed columns included with their prefixes.
	 */
	get columnsFor(): readonly string[]
	{
		if (!this.columnList)
		{
			const columns: string[] = [];
			collectColumns(this, '', columns, new Set());
			this.columnList = Object.freeze(columns);
		}
		return this.columnList;
	}

	/**
	 * Finds a construction signature by name.
	 */
	getConstructor(name: string): ConstructorSignature<T> | undefined
	{
		return this.constructors.find(c => c.name === name);
	}
}

function collectColumns(descriptor: TypeDescriptor<object>, prefix: string, into: string[], seen: Set<TypeDescriptor<object>>): void
{
	if (seen.has(descriptor))
	{
		throw new MappingError(`Type ${descriptor.name} decomposes into itself`);
	}
	seen.add(descriptor);
	for (const property of descriptor.getProperties())
	{
		if (property.decompose)
		{
			collectColumns(property.decompose, prefix + property.decompositionPrefix, into, seen);
		}
		else if (property.mappedColumnName && property.canWrite)
		{
			into.push(prefix + property.mappedColumnName);
		}
	}
	seen.delete(descriptor);
}

/**
 * Describes a type.
 *
 * @example
 * const Customer = describeType('Customer', () => new Customer(), {
 *     customerKey: { type: 'number', key: true, nullable: false },
 *     fullName: { type: 'string', column: 'FullName' },
 *     address: { decompose: Address, prefix: 'Billing' },
 * });
 */
export function describeType<T extends object>(
	name: string,
	factory: () => T,
	properties: Readonly<Record<string, PropertyOptions | ValueKind>>,
	options?: TypeDescriptorOptions<T>
): TypeDescriptor<T>
{
	const list = Object.entries(properties).map(([propertyName, value]) =>
		new PropertyMetadata(propertyName, typeof value === 'string' ? { type: value } : value)
	);
	return new TypeDescriptor(name, factory, list, options);
}

/**
 * One (column name, value) pair taken from an argument or filter value.
 */
export interface ValueEntry
{
	readonly columnName: string;
	readonly value: unknown;
	readonly property?: PropertyMetadata;
}

type Constructor = abstract new (...args: never[]) => object;

/**
 * Maps constructors to descriptors so that class instances passed as argument or filter
 * values resolve their descriptor. Owned by a data source.
 */
export class TypeRegistry
{
	private readonly descriptors = new Map<Constructor, TypeDescriptor<object>>();

	register(ctor: Constructor, descriptor: TypeDescriptor<object>): this
	{
		this.descriptors.set(ctor, descriptor);
		return this;
	}

	/**
	 * Descriptor for a value's class, if one was registered.
	 */
	resolve(value: object): TypeDescriptor<object> | undefined
	{
		let proto: unknown = Object.getPrototypeOf(value);
		while (proto !== null && typeof proto === 'object')
		{
			if (Object.prototype.hasOwnProperty.call(proto, 'constructor'))
			{
				const ctor: unknown = Reflect.get(proto, 'constructor');
				for (const [registered, descriptor] of this.descriptors)
				{
					if (registered === ctor) return descriptor;
				}
			}
			proto = Object.getPrototypeOf(proto);
		}
		return undefined;
	}

	/**
	 * Reads the mapped values of an argument or filter value.
	 * Registered class instances are read through their descriptor; anything else is
	 * treated as a dictionary of column name to value.
	 */
	getValues(value: object): ValueEntry[]
	{
		if (value instanceof Map)
		{
			const entries: ValueEntry[] = [];
			for (const [key, item] of value)
			{
				if (typeof key === 'string') entries.push({ columnName: key, value: item });
			}
			return entries;
		}

		const descriptor = this.resolve(value);
		if (descriptor)
		{
			return descriptor.getProperties()
				.filter(p => p.mappedColumnName !== undefined && p.canRead)
				.map(p => ({ columnName: p.mappedColumnName ?? p.name, value: Reflect.get(value, p.name), property: p }));
		}

		return Object.entries(value)
			.filter(([, item]) => typeof item !== 'function')
			.map(([key, item]) => ({ columnName: key, value: item }));
	}
}
