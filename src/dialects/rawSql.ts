import { MappingError } from '../errors';
import type { TypeRegistry } from '../metadata/typeDescriptor';
import type { SqlArguments } from '../operation';
import type { ParameterCollector } from './parameterCollector';

/**
 * Arguments for raw SQL text after normalization.
 */
export interface RawArguments
{
	readonly positional: readonly unknown[];
	/** Keyed by lower-cased name. */
	readonly named: ReadonlyMap<string, { readonly name: string; readonly value: unknown }>;
}

export const NO_RAW_ARGUMENTS: RawArguments = { positional: [], named: new Map() };

export function toRawArguments(args: SqlArguments | undefined, types: TypeRegistry): RawArguments
{
	if (args === undefined)
	{
		return NO_RAW_ARGUMENTS;
	}
	if (Array.isArray(args))
	{
		return { positional: args, named: new Map() };
	}
	const named = new Map<string, { name: string; value: unknown }>();
	for (const entry of types.getValues(args))
	{
		named.set(entry.columnName.toLowerCase(), { name: entry.columnName, value: entry.value });
	}
	return { positional: [], named };
}

const identifierStart = /[A-Za-z_]/;
const identifierPart = /[A-Za-z0-9_]/;

/**
 * Rewrites `?` and `@name` placeholders in caller-written SQL into the dialect's placeholder
 * style, binding each value through the collector.
 *
 * String literals, quoted identifiers (brackets only where the dialect quotes with them) and
 * comments are copied untouched. An `@name` with no matching argument is left as written
 * (it may be a variable), and `@@name` is never a placeholder.
 */
export function bindRawSql(text: string, args: RawArguments, collector: ParameterCollector, bracketIdentifiers = false): string
{
	let output = '';
	let positionalIndex = 0;
	let i = 0;

	while (i < text.length)
	{
		const ch = text[i];
		const next = text[i + 1];

		if (ch === '\'' || ch === '"' || ch === '`' || (ch === '[' && bracketIdentifiers))
		{
			const end = findClosing(text, i, ch === '[' ? ']' : ch);
			output += text.slice(i, end);
			i = end;
		}
		else if (ch === '-' && next === '-')
		{
			const end = text.indexOf('\n', i);
			const stop = end < 0 ? text.length : end;
			output += text.slice(i, stop);
			i = stop;
		}
		else if (ch === '/' && next === '*')
		{
			const end = text.indexOf('*/', i + 2);
			const stop = end < 0 ? text.length : end + 2;
			output += text.slice(i, stop);
			i = stop;
		}
		else if (ch === '?')
		{
			if (positionalIndex >= args.positional.length)
			{
				throw new MappingError(`The SQL text has more ? placeholders than the ${args.positional.length} positional argument(s) supplied`);
			}
			output += collector.add(`p${positionalIndex + 1}`, args.positional[positionalIndex]);
			positionalIndex++;
			i++;
		}
		else if (ch === '@' && next === '@')
		{
			let end = i + 2;
			while (end < text.length && identifierPart.test(text[end])) end++;
			output += text.slice(i, end);
			i = end;
		}
		else if (ch === '@' && next !== undefined && identifierStart.test(next))
		{
			let end = i + 1;
			while (end < text.length && identifierPart.test(text[end])) end++;
			const name = text.slice(i + 1, end);
			const arg = args.named.get(name.toLowerCase());
			output += arg ? collector.add(arg.name, arg.value) : text.slice(i, end);
			i = end;
		}
		else
		{
			output += ch;
			i++;
		}
	}

	if (positionalIndex < args.positional.length)
	{
		throw new MappingError(`${args.positional.length} positional argument(s) were supplied but the SQL text has ${positionalIndex} ? placeholder(s)`);
	}

	return output;
}

/**
 * Index just past the closing quote; a doubled closing quote is an escaped one.
 */
function findClosing(text: string, start: number, closer: string): number
{
	let i = start + 1;
	while (i < text.length)
	{
		if (text[i] === closer)
		{
			if (text[i + 1] === closer)
			{
				i += 2;
				continue;
			}
			return i + 1;
		}
		i++;
	}
	return text.length;
}
