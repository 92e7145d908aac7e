import { describe, it, expect } from 'vitest';
import { CUSTOMER_COLUMNS, createTable } from './__tests__/fixtures';
import { ParameterCollector } from './dialects/parameterCollector';
import { SQLiteEscaper } from './dialects/sqlEscaper';
import { MappingError } from './errors';
import { ALL_COLUMNS, NO_COLUMNS } from './materializers/materializer';
import { describeType, TypeRegistry } from './metadata/typeDescriptor';
import { FilterOptions } from './operation';
import { SqlBuilder } from './sqlBuilder';

const table = createTable(new SQLiteEscaper(), 'Customer', CUSTOMER_COLUMNS);

function builder(strictMode = false, types = new TypeRegistry()): SqlBuilder
{
	return new SqlBuilder(table, types, strictMode);
}

describe('SqlBuilder', () =>
{
	describe('applyFilterValue', () =>
	{
		it('should render one predicate per matched property, ANDed', () =>
		{
			const collector = new ParameterCollector('positional');

			const where = builder().applyFilterValue({ FullName: 'Ann', State: null, Color: 'red' }, FilterOptions.None, collector);

			expect(where).toBe('"FullName" = ? AND "State" IS NULL');
			expect(collector.parameters).toEqual([{ name: 'FullName', value: 'Ann', dbType: 'TEXT' }]);
		});

		it('should never inline a filter value', () =>
		{
			const collector = new ParameterCollector('numbered');
			const hostile = 'x\'; DROP TABLE "Customer"; --';

			const where = builder().applyFilterValue({ FullName: hostile, State: 'CA' }, FilterOptions.None, collector);

			expect(where).toBe('"FullName" = $1 AND "State" = $2');
			expect(collector.parameters.map(p => p.value)).toEqual([hostile, 'CA']);
		});

		it('should skip null properties when asked to', () =>
		{
			const collector = new ParameterCollector('named');

			const where = builder().applyFilterValue({ FullName: 'Ann', State: undefined }, FilterOptions.IgnoreNullProperties, collector);

			expect(where).toBe('"FullName" = @FullName');
		});

		it('should fail when no property matches a column', () =>
		{
			expect(() => builder().applyFilterValue({ Color: 'red' }, FilterOptions.None, new ParameterCollector('positional')))
				.toThrow(MappingError);
		});

		it('should read registered class instances through their descriptor', () =>
		{
			class CustomerFilter
			{
				State = 'WA';
				ignored = 'not mapped';
			}
			const types = new TypeRegistry().register(CustomerFilter, describeType('CustomerFilter', () => new CustomerFilter(), {
				State: 'string',
				ignored: { type: 'string', notMapped: true }
			}));
			const collector = new ParameterCollector('positional');

			expect(builder(false, types).applyFilterValue(new CustomerFilter(), FilterOptions.None, collector)).toBe('"State" = ?');
			expect(collector.parameters.map(p => p.value)).toEqual(['WA']);
		});
	});

	describe('applyDesiredColumns', () =>
	{
		it('should select the desired columns in table order', () =>
		{
			const b = builder();
			b.applyDesiredColumns(['State', 'fullname']);

			expect(b.buildSelectClause()).toBe('"FullName", "State"');
		});

		it('should select nothing for NO_COLUMNS and everything for ALL_COLUMNS', () =>
		{
			const none = builder();
			none.applyDesiredColumns(NO_COLUMNS);
			const all = builder();
			all.applyDesiredColumns(ALL_COLUMNS);

			expect(none.hasReadColumns()).toBe(false);
			expect(none.buildSelectClause()).toBe('');
			expect(all.buildSelectClause('Inserted.')).toBe('Inserted.*');
		});

		it('should ignore unknown desired columns unless strict', () =>
		{
			const lenient = builder();
			lenient.applyDesiredColumns(['FullName', 'Color']);

			expect(lenient.buildSelectClause()).toBe('"FullName"');
			expect(() => builder(true).applyDesiredColumns(['FullName', 'Color'])).toThrow(/Color/);
		});

		it('should fail when no desired column exists, strict or not', () =>
		{
			expect(() => builder().applyDesiredColumns(['Color'])).toThrow('None of the desired columns [Color] were found on Customer');
		});
	});

	describe('applyArgumentValue', () =>
	{
		it('should leave identity and computed columns out of an insert', () =>
		{
			const b = builder();
			b.applyArgumentValue({ CustomerKey: 5, FullName: 'Ann', State: 'CA', CreatedDate: '2024-01-01' });

			expect(b.getInsertColumns().map(e => e.column.sqlName)).toEqual(['FullName', 'State']);
			expect(b.getUpdateColumns().map(e => e.column.sqlName)).toEqual(['FullName', 'State']);
			expect(b.getKeyColumns().map(e => e.column.sqlName)).toEqual(['CustomerKey']);
		});

		it('should reject argument properties without a column in strict mode', () =>
		{
			expect(() => builder(true).applyArgumentValue({ FullName: 'Ann', Color: 'red' })).toThrow(/Color/);

			const lenient = builder();
			lenient.applyArgumentValue({ FullName: 'Ann', Color: 'red' });
			expect(lenient.getParameterizedColumns().map(e => e.column.sqlName)).toEqual(['FullName']);
		});

		it('should fail when no argument property matches a column', () =>
		{
			expect(() => builder().applyArgumentValue({ Color: 'red' })).toThrow('None of the properties on the argument object match the columns on Customer');
		});

		it('should require values for every key column of a single-row write', () =>
		{
			const b = builder();
			b.applyArgumentValue({ FullName: 'Ann' });

			expect(() => b.requireKeyColumns('Update')).toThrow('Update: no value was supplied for the key column(s) CustomerKey');
		});

		it('should take explicit match columns as the key', () =>
		{
			const b = builder();
			b.applyArgumentValue({ FullName: 'Ann', State: 'CA' });
			b.overrideKeys(['FullName']);

			expect(b.getKeyColumns().map(e => e.column.sqlName)).toEqual(['FullName']);
			expect(() => b.overrideKeys(['Color'])).toThrow('Customer does not have a column named Color');
		});
	});
});
