import type { SqlParameter } from '../nativeCommand';

/**
 * How a dialect writes parameter placeholders.
 * - `positional`: `?` (SQLite, MySQL)
 * - `numbered`: `$1`, `$2` (PostgreSQL)
 * - `named`: `@name` (SQL Server)
 */
export type PlaceholderStyle = 'positional' | 'numbered' | 'named';

/**
 * Collects the parameters of one statement in the order their placeholders are emitted.
 * A collector belongs to one statement; chained statements get their own.
 */
export class ParameterCollector
{
	private readonly list: SqlParameter[] = [];
	private readonly usedNames = new Set<string>();

	constructor(readonly style: PlaceholderStyle) { }

	get parameters(): readonly SqlParameter[]
	{
		return this.list;
	}

	get count(): number
	{
		return this.list.length;
	}

	/**
	 * Binds a value and returns the placeholder text for it.
	 * Undefined is bound as NULL.
	 */
	add(name: string, value: unknown, dbType?: string): string
	{
		const parameterName = this.uniqueName(name);
		this.list.push(Object.freeze({ name: parameterName, value: value === undefined ? null : value, dbType }));

		switch (this.style)
		{
			case 'positional':
				return '?';
			case 'numbered':
				return `$${this.list.length}`;
			case 'named':
				return `@${parameterName}`;
		}
	}

	private uniqueName(name: string): string
	{
		const base = name.replace(/[^A-Za-z0-9_]/g, '') || 'p';
		let candidate = base;
		let suffix = 2;
		while (this.usedNames.has(candidate.toLowerCase()))
		{
			candidate = `${base}_${suffix++}`;
		}
		this.usedNames.add(candidate.toLowerCase());
		return candidate;
	}
}
