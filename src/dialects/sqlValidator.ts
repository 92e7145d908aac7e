import { getLogger } from '../logger';

/**
 * SQL security validation utility class.
 * Validates the few caller-supplied values that end up inlined in SQL text.
 */
export class SQLValidator
{
	private static readonly logger = getLogger('SQLValidator');

	/**
	 * Validate ORDER BY direction
	 * @param direction Sort direction
	 * @returns Validated direction (uppercase)
	 */
	static validateDirection(direction: string): string
	{
		const validDirections = ['ASC', 'DESC'];
		const upperDirection = direction.trim().toUpperCase();

		if (!validDirections.includes(upperDirection))
		{
			this.logger.error('Invalid ORDER BY direction detected', { direction, validDirections });
			throw new Error(`Invalid ORDER BY direction: ${direction}`);
		}

		return upperDirection;
	}

	/**
	 * Validate a skip or take value. Undefined means "not set".
	 * @throws RangeError if value is not a non-negative integer
	 */
	static validateLimitValue(value: unknown, label = 'LIMIT/OFFSET'): void
	{
		if (value !== undefined && (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0))
		{
			this.logger.error('Invalid limit value detected', { label, value: String(value) });
			throw new RangeError(`Invalid ${label} value: ${String(value)}`);
		}
	}

	/**
	 * Validate a value inlined into SQL text as an integer literal.
	 * @returns The literal text
	 */
	static integerLiteral(value: number, label: string): string
	{
		if (!Number.isSafeInteger(value))
		{
			this.logger.error('Invalid integer literal detected', { label, value });
			throw new RangeError(`Invalid ${label} value: ${value}`);
		}
		return String(value);
	}

	/**
	 * Validate a command timeout in milliseconds.
	 */
	static validateTimeout(value: number | undefined): void
	{
		if (value !== undefined && (!Number.isFinite(value) || value < 0))
		{
			this.logger.error('Invalid command timeout detected', { value });
			throw new RangeError(`Invalid command timeout: ${value}`);
		}
	}
}
