import { describe, it, expect, beforeAll } from 'vitest';
import { globalLogger, LogLevel } from '../logger';
import { SQLValidator } from './sqlValidator';

describe('SQLValidator', () =>
{
	beforeAll(() =>
	{
		globalLogger.setLevel(LogLevel.OFF);
	});

	describe('validateDirection', () =>
	{
		it('should accept ASC and DESC in any case', () =>
		{
			expect(SQLValidator.validateDirection(' desc ')).toBe('DESC');
			expect(SQLValidator.validateDirection('Asc')).toBe('ASC');
		});

		it('should reject anything else', () =>
		{
			expect(() => SQLValidator.validateDirection('DESC; DROP TABLE x')).toThrow('Invalid ORDER BY direction: DESC; DROP TABLE x');
		});
	});

	describe('validateLimitValue', () =>
	{
		it('should accept undefined and non-negative integers', () =>
		{
			expect(() => SQLValidator.validateLimitValue(undefined)).not.toThrow();
			expect(() => SQLValidator.validateLimitValue(0, 'skip')).not.toThrow();
		});

		it('should reject negative, fractional and non-numeric values', () =>
		{
			expect(() => SQLValidator.validateLimitValue(-1, 'take')).toThrow(new RangeError('Invalid take value: -1'));
			expect(() => SQLValidator.validateLimitValue(1.5, 'skip')).toThrow('Invalid skip value: 1.5');
			expect(() => SQLValidator.validateLimitValue('3')).toThrow('Invalid LIMIT/OFFSET value: 3');
		});
	});

	describe('integerLiteral', () =>
	{
		it('should render safe integers', () =>
		{
			expect(SQLValidator.integerLiteral(10, 'take')).toBe('10');
			expect(SQLValidator.integerLiteral(-3, 'seed')).toBe('-3');
		});

		it('should reject values that are not safe integers', () =>
		{
			expect(() => SQLValidator.integerLiteral(Number.NaN, 'seed')).toThrow('Invalid seed value: NaN');
			expect(() => SQLValidator.integerLiteral(2 ** 53, 'take')).toThrow(RangeError);
		});
	});

	describe('validateTimeout', () =>
	{
		it('should accept undefined and finite non-negative values', () =>
		{
			expect(() => SQLValidator.validateTimeout(undefined)).not.toThrow();
			expect(() => SQLValidator.validateTimeout(0)).not.toThrow();
		});

		it('should reject negative and infinite values', () =>
		{
			expect(() => SQLValidator.validateTimeout(-5)).toThrow('Invalid command timeout: -5');
			expect(() => SQLValidator.validateTimeout(Number.POSITIVE_INFINITY)).toThrow(RangeError);
		});
	});
});
