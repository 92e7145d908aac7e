import { MappingError } from '../errors';
import type { ConstructorSignature, PropertyMetadata, TypeDescriptor } from '../metadata/typeDescriptor';
import { isChangeTracking } from '../metadata/typeDescriptor';
import type { RowCursor, ValueKind } from '../rowCursor';
import { createColumnReader } from './columnReader';
import type { ColumnReader } from './columnReader';

/**
 * A decomposed property on the way from the root object to the one a column is set on.
 */
interface PathSegment
{
	readonly property: PropertyMetadata;
	readonly descriptor: TypeDescriptor<object>;
}

/**
 * Where a column lands: the nested objects to walk through and the property to set.
 */
interface ColumnTarget
{
	readonly path: readonly PathSegment[];
	readonly property: PropertyMetadata;
}

interface BindStep extends ColumnTarget
{
	readonly index: number;
	readonly read: ColumnReader;
}

interface FieldSignature
{
	readonly name: string;
	readonly type: ValueKind;
}

/**
 * Finds the writable property a column maps to, descending into decomposed properties whose
 * prefix starts the column name. Matching is case-insensitive; no match is not an error.
 */
function resolveColumn(descriptor: TypeDescriptor<object>, columnName: string): ColumnTarget | undefined
{
	const lower = columnName.toLowerCase();
	for (const property of descriptor.getProperties())
	{
		if (property.mappedColumnName !== undefined && property.canWrite && property.mappedColumnName.toLowerCase() === lower)
		{
			return { path: [], property };
		}
	}
	for (const property of descriptor.getProperties())
	{
		const nested = property.decompose;
		if (!nested || !property.canWrite) continue;
		const prefix = property.decompositionPrefix.toLowerCase();
		if (!lower.startsWith(prefix)) continue;

		const inner = resolveColumn(nested, columnName.slice(prefix.length));
		if (inner)
		{
			return { path: [{ property, descriptor: nested }, ...inner.path], property: inner.property };
		}
	}
	return undefined;
}

/**
 * Walks to the object a column is set on, creating nested objects that are still missing.
 */
function ensurePath(target: object, path: readonly PathSegment[], created: object[]): object
{
	let current = target;
	for (const segment of path)
	{
		const existing: unknown = Reflect.get(current, segment.property.name);
		if (typeof existing === 'object' && existing !== null)
		{
			current = existing;
		}
		else
		{
			const child = segment.descriptor.create();
			Reflect.set(current, segment.property.name, child);
			created.push(child);
			current = child;
		}
	}
	return current;
}

/**
 * Resets change tracking once every column has been set, so a fresh object reads as unchanged.
 */
function acceptChanges(target: object, created: readonly object[]): void
{
	for (const item of [...created, target])
	{
		if (isChangeTracking(item))
		{
			item.acceptChanges();
		}
	}
}

function signatureOf(cursor: RowCursor): FieldSignature[]
{
	const fields: FieldSignature[] = [];
	for (let i = 0; i < cursor.fieldCount; i++)
	{
		fields.push({ name: cursor.getName(i), type: cursor.getFieldType(i) });
	}
	return fields;
}

/**
 * Interpreted tier: resolves every column of the current row against the type on each call.
 */
export function bindRow(descriptor: TypeDescriptor<object>, target: object, cursor: RowCursor): void
{
	const created: object[] = [];
	for (let i = 0; i < cursor.fieldCount; i++)
	{
		const name = cursor.getName(i);
		const column = resolveColumn(descriptor, name);
		if (!column) continue;
		const value = createColumnReader(cursor.getFieldType(i), column.property, name)(cursor, i);
		Reflect.set(ensurePath(target, column.path, created), column.property.name, value);
	}
	if (descriptor.tracksChanges || created.length > 0)
	{
		acceptChanges(target, created);
	}
}

/**
 * Reads the arguments of a construction signature from the current row.
 * A parameter that names a property's column, or the property itself, is read through that property's conversion.
 */
export function readConstructorArguments(descriptor: TypeDescriptor<object>, signature: ConstructorSignature<object>, cursor: RowCursor): unknown[]
{
	return argumentReaders(descriptor, signature, cursor).map(({ index, read }) => read(cursor, index));
}

function argumentReaders(descriptor: TypeDescriptor<object>, signature: ConstructorSignature<object>, cursor: RowCursor): { index: number; read: ColumnReader }[]
{
	const names: string[] = [];
	for (let i = 0; i < cursor.fieldCount; i++)
	{
		names.push(cursor.getName(i).toLowerCase());
	}

	return signature.parameters.map(parameter =>
	{
		const index = names.indexOf(parameter.toLowerCase());
		if (index < 0)
		{
			throw new MappingError(`The constructor ${signature.name} of ${descriptor.name} needs the column ${parameter}, which the result does not have`);
		}
		const lower = parameter.toLowerCase();
		const property = descriptor.getProperties().find(p => p.mappedColumnName?.toLowerCase() === lower) ?? descriptor.tryGetProperty(parameter);
		const read: ColumnReader = property
			? createColumnReader(cursor.getFieldType(index), property, cursor.getName(index))
			: (c, i) => c.getValue(i);
		return { index, read };
	});
}

/**
 * Compiled tier: the column-to-property plan for one result shape, built once and replayed per row.
 */
export class CompiledRowBinder
{
	private constructor(
		private readonly descriptor: TypeDescriptor<object>,
		private readonly fields: readonly FieldSignature[],
		private readonly steps: readonly BindStep[]
	) { }

	static compile(descriptor: TypeDescriptor<object>, cursor: RowCursor): CompiledRowBinder
	{
		const fields = signatureOf(cursor);
		const steps: BindStep[] = [];
		fields.forEach((field, index) =>
		{
			const column = resolveColumn(descriptor, field.name);
			if (column)
			{
				steps.push({ ...column, index, read: createColumnReader(field.type, column.property, field.name) });
			}
		});
		return new CompiledRowBinder(descriptor, fields, steps);
	}

	get stepCount(): number
	{
		return this.steps.length;
	}

	/**
	 * Whether a cursor has the column names and kinds this plan was built for.
	 */
	matches(cursor: RowCursor): boolean
	{
		if (cursor.fieldCount !== this.fields.length) return false;
		return this.fields.every((field, i) => cursor.getName(i) === field.name && cursor.getFieldType(i) === field.type);
	}

	bind(target: object, cursor: RowCursor): void
	{
		const created: object[] = [];
		for (const step of this.steps)
		{
			Reflect.set(ensurePath(target, step.path, created), step.property.name, step.read(cursor, step.index));
		}
		if (this.descriptor.tracksChanges || created.length > 0)
		{
			acceptChanges(target, created);
		}
	}
}

/**
 * Compiled tier for construction signatures: argument readers for one result shape.
 */
export class CompiledArgumentReader
{
	private constructor(
		private readonly fields: readonly FieldSignature[],
		private readonly readers: readonly { index: number; read: ColumnReader }[]
	) { }

	static compile(descriptor: TypeDescriptor<object>, signature: ConstructorSignature<object>, cursor: RowCursor): CompiledArgumentReader
	{
		return new CompiledArgumentReader(signatureOf(cursor), argumentReaders(descriptor, signature, cursor));
	}

	matches(cursor: RowCursor): boolean
	{
		if (cursor.fieldCount !== this.fields.length) return false;
		return this.fields.every((field, i) => cursor.getName(i) === field.name && cursor.getFieldType(i) === field.type);
	}

	read(cursor: RowCursor): unknown[]
	{
		return this.readers.map(({ index, read }) => read(cursor, index));
	}
}
