import { describe, it, expect, beforeAll } from 'vitest';
import { globalLogger, LogLevel } from './logger';
import { createFilter, createLimits, FilterOptions, hasFlag, parseSort, UpdateOptions } from './operation';

describe('operation descriptors', () =>
{
	beforeAll(() =>
	{
		globalLogger.setLevel(LogLevel.OFF);
	});

	describe('parseSort', () =>
	{
		it('should split a trailing direction off the column name', () =>
		{
			expect(parseSort('FullName desc')).toEqual({ column: 'FullName', direction: 'DESC' });
			expect(parseSort(' State ')).toEqual({ column: 'State', direction: 'ASC' });
			expect(parseSort('Order Date ASC')).toEqual({ column: 'Order Date', direction: 'ASC' });
		});

		it('should validate an explicit direction', () =>
		{
			expect(parseSort({ column: 'State' })).toEqual({ column: 'State', direction: 'ASC' });
			expect(parseSort({ column: 'State', direction: 'Desc' })).toEqual({ column: 'State', direction: 'DESC' });
			expect(() => parseSort({ column: 'State', direction: 'sideways' })).toThrow('Invalid ORDER BY direction: sideways');
		});
	});

	describe('createLimits', () =>
	{
		it('should pick a strategy from the values given', () =>
		{
			expect(createLimits({}).strategy).toBe('none');
			expect(createLimits({ take: 5 }).strategy).toBe('rows');
			expect(createLimits({ take: 5, strategy: 'top' })).toEqual({ skip: undefined, take: 5, strategy: 'top', seed: undefined });
			expect(Object.isFrozen(createLimits({ skip: 1 }))).toBe(true);
		});

		it('should reject invalid values', () =>
		{
			expect(() => createLimits({ skip: -1 })).toThrow('Invalid skip value: -1');
			expect(() => createLimits({ take: 2.5 })).toThrow(RangeError);
			expect(() => createLimits({ take: 1, strategy: 'randomSample', seed: 1.5 })).toThrow('Invalid seed: 1.5');
		});
	});

	describe('createFilter', () =>
	{
		it('should keep raw SQL with its arguments', () =>
		{
			expect(createFilter('"State" = ?', ['CA'])).toEqual({ kind: 'raw', where: '"State" = ?', args: ['CA'] });
		});

		it('should keep a filter value with its options', () =>
		{
			const value = { State: 'CA' };

			expect(createFilter(value)).toEqual({ kind: 'value', value, options: FilterOptions.None });
			expect(createFilter(value, FilterOptions.IgnoreNullProperties)).toEqual({ kind: 'value', value, options: FilterOptions.IgnoreNullProperties });
		});
	});

	it('should test flag combinations', () =>
	{
		const options = UpdateOptions.ReturnOldValues | UpdateOptions.IgnoreRowsAffected;

		expect(hasFlag(options, UpdateOptions.IgnoreRowsAffected)).toBe(true);
		expect(hasFlag(options, UpdateOptions.UseKeyAttribute)).toBe(false);
		expect(hasFlag(UpdateOptions.None, UpdateOptions.None)).toBe(true);
	});
});
