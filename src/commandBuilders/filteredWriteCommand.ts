import type { CommandDataSource } from '../commandDataSource';
import { SQLValidator } from '../dialects/sqlValidator';
import { InvalidOperationError } from '../errors';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import { createFilter, NO_FILTER } from '../operation';
import type { FilterOptions, FilterSpec, SqlArguments } from '../operation';
import { TableCommandBuilder } from './dbCommandBuilder';

export interface FilteredWriteState
{
	readonly filter: FilterSpec;
	/** The caller asked for every row. */
	readonly allRows: boolean;
	readonly expectedRowCount?: number;
}

export const UNFILTERED: FilteredWriteState = Object.freeze({ filter: NO_FILTER, allRows: false });

/**
 * A write against a set of rows. It must be given a filter or be told to touch every row.
 */
export abstract class FilteredWriteCommand<TSelf> extends TableCommandBuilder
{
	constructor(dataSource: CommandDataSource, metadata: TableOrViewMetadata, protected readonly state: FilteredWriteState)
	{
		super(dataSource, metadata);
	}

	withFilter(whereClause: string, args?: SqlArguments): TSelf;
	withFilter(filterValue: object, options?: FilterOptions): TSelf;
	withFilter(filter: string | object, extra?: SqlArguments | FilterOptions): TSelf
	{
		return this.with({ ...this.state, filter: createFilter(filter, extra), allRows: false });
	}

	/**
	 * Applies the write to every row of the table.
	 */
	all(): TSelf
	{
		return this.with({ ...this.state, filter: NO_FILTER, allRows: true });
	}

	/**
	 * Fails with RowCountMismatchError unless exactly this many rows are affected.
	 */
	withExpectedRowCount(count: number): TSelf
	{
		SQLValidator.validateLimitValue(count, 'expectedRowCount');
		return this.with({ ...this.state, expectedRowCount: count });
	}

	protected abstract with(state: FilteredWriteState): TSelf;

	protected requireFilter(operationName: string): FilterSpec
	{
		if (this.state.filter.kind === 'none' && !this.state.allRows)
		{
			throw new InvalidOperationError(`${operationName} on ${this.metadata.name} needs a filter; call all() to affect every row`);
		}
		return this.state.filter;
	}
}
