import type { LimitSpec } from '../operation';
import { ParameterCollector } from './parameterCollector';
import { SqlDialect } from './sqlDialect';
import type { PagingClauses } from './sqlDialect';
import { PostgreSQLEscaper } from './sqlEscaper';
import { SQLValidator } from './sqlValidator';

/**
 * PostgreSQL statement synthesis.
 * A session is one client connection, which queues its own queries, so no lock is taken.
 */
export class PostgreSQLDialect extends SqlDialect
{
	readonly name = 'postgresql';
	readonly escaper = new PostgreSQLEscaper();
	readonly placeholderStyle = 'numbered';

	beginTransactionSql(): string
	{
		return 'BEGIN;';
	}

	protected planPaging(limits: LimitSpec): PagingClauses
	{
		switch (limits.strategy)
		{
			case 'none':
				return {};
			case 'rows':
			{
				const parts: string[] = [];
				if (limits.take !== undefined) parts.push(`LIMIT ${SQLValidator.integerLiteral(limits.take, 'take')}`);
				if (limits.skip !== undefined) parts.push(`OFFSET ${SQLValidator.integerLiteral(limits.skip, 'skip')}`);
				return parts.length > 0 ? { suffix: parts.join(' ') } : {};
			}
			case 'top':
				return { suffix: `LIMIT ${this.takeLiteral(limits)}` };
			case 'randomSample':
			{
				const clauses: PagingClauses = { orderBy: 'random()', suffix: `LIMIT ${this.takeLiteral(limits)}` };
				if (limits.seed === undefined)
				{
					return clauses;
				}
				// setseed is per session and wants a value in [-1, 1]
				const seedCollector = new ParameterCollector(this.placeholderStyle);
				const placeholder = seedCollector.add('seed', toSetSeed(limits.seed));
				return { ...clauses, preamble: { commandText: `SELECT setseed(${placeholder});`, parameters: seedCollector.parameters } };
			}
		}
	}
}

export function toSetSeed(seed: number): number
{
	return (seed % 2147483647) / 2147483647;
}
