import { Materializer, NO_COLUMNS } from './materializer';
import type { DesiredColumns, ExecuteOptions } from './materializer';

/**
 * Runs the command without reading anything back and returns the affected row count,
 * or undefined when the driver does not report one.
 */
export class NonQueryMaterializer extends Materializer<number | undefined>
{
	desiredColumns(): DesiredColumns
	{
		return NO_COLUMNS;
	}

	execute(options?: ExecuteOptions): Promise<number | undefined>
	{
		return this.run(result => result.affectedRows, options);
	}
}
