import { describe, it, expect } from 'vitest';
import { ArrayRowCursor, kindOf, readRecords } from './rowCursor';

describe('ArrayRowCursor', () =>
{
	it('should take columns from the first record and infer their kinds', () =>
	{
		const cursor = ArrayRowCursor.fromRecords([{ CustomerKey: 1, State: null }, { CustomerKey: 2, State: 'CA' }]);

		expect(cursor.fieldCount).toBe(2);
		expect(cursor.rowCount).toBe(2);
		expect(cursor.getName(1)).toBe('State');
		expect(cursor.getFieldType(0)).toBe('number');
		expect(cursor.getFieldType(1)).toBe('string');
	});

	it('should keep declared kinds and named columns of an empty result', () =>
	{
		expect(ArrayRowCursor.fromRecords([]).fieldCount).toBe(0);
		expect(ArrayRowCursor.fromRecords([], ['State']).getFieldType(0)).toBe('unknown');
		expect(new ArrayRowCursor([{ name: 'Created', type: 'date' }], [[null]]).getFieldType(0)).toBe('date');
	});

	it('should read rows forward with typed getters', () =>
	{
		const cursor = ArrayRowCursor.fromRecords([{ CustomerKey: 1, State: undefined }]);

		expect(() => cursor.getValue(0)).toThrow('No current row; call read() first');
		expect(cursor.read()).toBe(true);
		expect(cursor.getNumber(0)).toBe(1);
		expect(cursor.isNull(1)).toBe(true);
		expect(cursor.getValue(1)).toBeNull();
		expect(() => cursor.getString(0)).toThrow(new TypeError('Column CustomerKey does not hold a string value'));
		expect(() => cursor.getName(2)).toThrow('Column index 2 is out of range (2 columns)');
		expect(cursor.read()).toBe(false);
		expect(cursor.read()).toBe(false);
	});

	it('should fail once closed', () =>
	{
		const cursor = ArrayRowCursor.fromRecords([{ CustomerKey: 1 }]);
		cursor.close();

		expect(() => cursor.read()).toThrow('The cursor is closed');
	});
});

describe('readRecords', () =>
{
	it('should read the remaining rows', () =>
	{
		const cursor = ArrayRowCursor.fromRecords([{ k: 1 }, { k: 2 }, { k: 3 }]);
		cursor.read();

		expect(readRecords(cursor)).toEqual([{ k: 2 }, { k: 3 }]);
	});
});

describe('kindOf', () =>
{
	it('should name the representation of driver values', () =>
	{
		expect(kindOf('a')).toBe('string');
		expect(kindOf(1n)).toBe('bigint');
		expect(kindOf(new Date(0))).toBe('date');
		expect(kindOf(Buffer.from('a'))).toBe('buffer');
		expect(kindOf({ a: 1 })).toBe('json');
		expect(kindOf(null)).toBe('unknown');
		expect(kindOf(undefined)).toBe('unknown');
	});
});
