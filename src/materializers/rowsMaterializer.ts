import { readRecords } from '../rowCursor';
import { Materializer } from './materializer';
import type { ExecuteOptions } from './materializer';

/**
 * Every column of every row as a plain record keyed by column name.
 */
export class RowsMaterializer extends Materializer<Record<string, unknown>[]>
{
	execute(options?: ExecuteOptions): Promise<Record<string, unknown>[]>
	{
		return this.run(result => (result.cursor ? readRecords(result.cursor) : []), options);
	}
}
