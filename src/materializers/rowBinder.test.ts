import { describe, it, expect } from 'vitest';
import { MappingError } from '../errors';
import { describeType } from '../metadata/typeDescriptor';
import type { TypeDescriptor } from '../metadata/typeDescriptor';
import { ArrayRowCursor } from '../rowCursor';
import type { CursorField } from '../rowCursor';
import { CompiledBinderCache } from './compiledBinderCache';
import { bindRow, CompiledArgumentReader, CompiledRowBinder, readConstructorArguments } from './rowBinder';

class Address
{
	City: string | null = null;
	Zip = '';
}

class Customer
{
	CustomerKey = 0;
	FullName: string | null = null;
	Billing?: Address;
	changed = true;

	acceptChanges(): void
	{
		this.changed = false;
	}
}

class Contact
{
	constructor(readonly key: number, readonly name: string) { }
}

const AddressType = describeType('Address', () => new Address(), { City: 'string', Zip: 'string' });

const CustomerType = describeType('Customer', () => new Customer(), {
	CustomerKey: { type: 'number', nullable: false },
	FullName: 'string',
	Billing: { decompose: AddressType, prefix: 'Billing' },
	changed: { type: 'boolean', notMapped: true }
});

const ContactType = describeType('Contact', () => new Contact(0, ''), {
	key: { type: 'number', column: 'CustomerKey' },
	name: 'string'
}, {
	constructors: [{
		name: 'keyAndName',
		parameters: ['CustomerKey', 'FullName'],
		create: args => new Contact(Number(args[0]), String(args[1]))
	}]
});

const FIELDS: CursorField[] = [
	{ name: 'CustomerKey', type: 'bigint' },
	{ name: 'FullName', type: 'string' },
	{ name: 'BillingCity', type: 'string' },
	{ name: 'BillingZip', type: 'number' },
	{ name: 'Unmapped', type: 'string' }
];

const ROWS: unknown[][] = [
	[1n, 'Ann', 'Reno', 89501, 'x'],
	[2n, null, null, null, 'y']
];

function cursor(fields: CursorField[] = FIELDS): ArrayRowCursor
{
	return new ArrayRowCursor(fields, ROWS);
}

function readInterpreted<T extends object>(type: TypeDescriptor<T>): T[]
{
	const source = cursor();
	const items: T[] = [];
	while (source.read())
	{
		const item = type.create();
		bindRow(type, item, source);
		items.push(item);
	}
	return items;
}

function readCompiled<T extends object>(type: TypeDescriptor<T>): T[]
{
	const source = cursor();
	const binder = CompiledRowBinder.compile(type, source);
	const items: T[] = [];
	while (source.read())
	{
		const item = type.create();
		binder.bind(item, source);
		items.push(item);
	}
	return items;
}

describe('row binding', () =>
{
	it('should set mapped and decomposed properties, converting as needed', () =>
	{
		const [first, second] = readInterpreted(CustomerType);

		expect(first.CustomerKey).toBe(1);
		expect(first.FullName).toBe('Ann');
		expect(first.Billing).toBeInstanceOf(Address);
		expect(first.Billing?.City).toBe('Reno');
		expect(first.Billing?.Zip).toBe('89501');
		expect(second.FullName).toBeNull();
		expect(second.Billing?.City).toBeNull();
	});

	it('should produce the same objects on both tiers', () =>
	{
		expect(readCompiled(CustomerType)).toEqual(readInterpreted(CustomerType));
	});

	it('should accept changes once a row is bound', () =>
	{
		expect(readInterpreted(CustomerType).map(c => c.changed)).toEqual([false, false]);
		expect(readCompiled(CustomerType).map(c => c.changed)).toEqual([false, false]);
	});

	it('should skip columns without a writable property', () =>
	{
		const ReadOnlyName = describeType('ReadOnlyName', () => ({ CustomerKey: 0, FullName: 'unset' }), {
			CustomerKey: 'number',
			FullName: { type: 'string', readOnly: true }
		});

		const source = cursor();
		const binder = CompiledRowBinder.compile(ReadOnlyName, source);
		source.read();
		const item = ReadOnlyName.create();
		binder.bind(item, source);

		expect(binder.stepCount).toBe(1);
		expect(item).toEqual({ CustomerKey: 1, FullName: 'unset' });
	});

	it('should notice a result of a different shape', () =>
	{
		const binder = CompiledRowBinder.compile(CustomerType, cursor());

		expect(binder.matches(cursor())).toBe(true);
		expect(binder.matches(cursor([...FIELDS].reverse()))).toBe(false);
		expect(binder.matches(cursor(FIELDS.map((f): CursorField => f.name === 'CustomerKey' ? { ...f, type: 'number' } : f)))).toBe(false);
		expect(binder.matches(cursor(FIELDS.slice(0, 4)))).toBe(false);
	});

	it('should fail when a non-nullable column is NULL', () =>
	{
		const source = new ArrayRowCursor([{ name: 'CustomerKey', type: 'number' }], [[null]]);
		source.read();

		expect(() => bindRow(CustomerType, new Customer(), source)).toThrow(MappingError);
	});
});

describe('constructor arguments', () =>
{
	const signature = ContactType.constructors[0];

	it('should read arguments in signature order on both tiers', () =>
	{
		const interpreted = cursor();
		const compiled = CompiledArgumentReader.compile(ContactType, signature, interpreted);
		interpreted.read();

		expect(readConstructorArguments(ContactType, signature, interpreted)).toEqual([1, 'Ann']);
		expect(compiled.read(interpreted)).toEqual([1, 'Ann']);
	});

	it('should fail when the result lacks a parameter column', () =>
	{
		const source = new ArrayRowCursor([{ name: 'CustomerKey', type: 'number' }], [[1]]);
		source.read();

		expect(() => readConstructorArguments(ContactType, signature, source))
			.toThrow('The constructor keyAndName of Contact needs the column FullName, which the result does not have');
	});
});

describe('CompiledBinderCache', () =>
{
	it('should compile once per type and statement text', () =>
	{
		const cache = new CompiledBinderCache();

		const first = cache.getRowBinder(CustomerType, 'SELECT 1;', cursor());
		const again = cache.getRowBinder(CustomerType, 'SELECT 1;', cursor());
		const other = cache.getRowBinder(CustomerType, 'SELECT 2;', cursor());

		expect(again).toBe(first);
		expect(other).not.toBe(first);
		expect(cache.size).toBe(2);
	});
});
