/**
 * A dialect object name: an optional schema plus the object's own name.
 * Names are kept unquoted; quoting is the dialect's job.
 */
export class ObjectName
{
	constructor(readonly schema: string | undefined, readonly name: string)
	{
		if (!name)
		{
			throw new Error('[ObjectName] Object name is empty');
		}
	}

	/**
	 * Parses `name`, `schema.name` or their quoted forms (`"s"."n"`, `` `s`.`n` ``, `[s].[n]`).
	 */
	static parse(text: string, defaultSchema?: string): ObjectName
	{
		const parts = splitQualifiedName(text.trim());
		if (parts.length === 0 || parts.some(part => part.length === 0))
		{
			throw new Error(`[ObjectName.parse] Invalid object name: ${text}`);
		}
		if (parts.length === 1)
		{
			return new ObjectName(defaultSchema, parts[0]);
		}
		// database.schema.name: the database part is not used
		return new ObjectName(parts[parts.length - 2], parts[parts.length - 1]);
	}

	/**
	 * Case-insensitive cache key.
	 */
	get key(): string
	{
		return (this.schema === undefined ? this.name : `${this.schema}.${this.name}`).toLowerCase();
	}

	toString(): string
	{
		return this.schema === undefined ? this.name : `${this.schema}.${this.name}`;
	}
}

const closers: Record<string, string> = { '"': '"', '`': '`', '[': ']' };

function splitQualifiedName(text: string): string[]
{
	const parts: string[] = [];
	let current = '';
	let i = 0;
	while (i < text.length)
	{
		const ch = text[i];
		const closer = closers[ch];
		if (closer !== undefined)
		{
			i++;
			while (i < text.length)
			{
				if (text[i] === closer)
				{
					// doubled closer is an escaped quote
					if (text[i + 1] === closer)
					{
						current += closer;
						i += 2;
						continue;
					}
					break;
				}
				current += text[i];
				i++;
			}
			i++;
		}
		else if (ch === '.')
		{
			parts.push(current);
			current = '';
			i++;
		}
		else
		{
			current += ch;
			i++;
		}
	}
	parts.push(current);
	return parts;
}
