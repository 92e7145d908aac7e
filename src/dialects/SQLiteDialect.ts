import { InvalidOperationError } from '../errors';
import type { LockMode } from '../concurrency/readerWriterLock';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import type { LimitSpec } from '../operation';
import type { ParameterCollector } from './parameterCollector';
import { SqlDialect } from './sqlDialect';
import type { PagingClauses } from './sqlDialect';
import { SQLiteEscaper } from './sqlEscaper';
import { SQLValidator } from './sqlValidator';

/**
 * SQLite statement synthesis.
 * One connection handle serializes everything, so reads and writes take the data source lock.
 */
export class SQLiteDialect extends SqlDialect
{
	readonly name = 'sqlite';
	readonly escaper = new SQLiteEscaper();
	readonly placeholderStyle = 'positional';
	readonly readLockMode: LockMode = 'read';
	readonly writeLockMode: LockMode = 'write';

	protected planPaging(limits: LimitSpec, _hasSort: boolean, collector: ParameterCollector, metadata: TableOrViewMetadata): PagingClauses
	{
		switch (limits.strategy)
		{
			case 'none':
				return {};
			case 'rows':
				if (limits.skip === undefined)
				{
					return limits.take === undefined ? {} : { suffix: `LIMIT ${SQLValidator.integerLiteral(limits.take, 'take')}` };
				}
				// LIMIT -1 is "no limit"
				return { suffix: `LIMIT ${limits.take === undefined ? '-1' : SQLValidator.integerLiteral(limits.take, 'take')} OFFSET ${SQLValidator.integerLiteral(limits.skip, 'skip')}` };
			case 'top':
				return { suffix: `LIMIT ${this.takeLiteral(limits)}` };
			case 'randomSample':
				if (limits.seed !== undefined && !metadata.hasRowId)
				{
					throw new InvalidOperationError(`Seeded random sampling needs a rowid; ${metadata.name.toString()} has none`);
				}
				return {
					// a seeded linear congruential step over rowid gives a repeatable shuffle
					orderBy: limits.seed === undefined
						? 'RANDOM()'
						: `((rowid * 1103515245 + ${collector.add('seed', limits.seed)}) % 2147483648)`,
					suffix: `LIMIT ${this.takeLiteral(limits)}`
				};
		}
	}
}
