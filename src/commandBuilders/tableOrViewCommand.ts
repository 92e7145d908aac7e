import type { CommandDataSource } from '../commandDataSource';
import { InvalidOperationError } from '../errors';
import type { ExecutionToken } from '../executionToken';
import { CountMaterializer } from '../materializers/scalarMaterializer';
import type { Materializer } from '../materializers/materializer';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import { createFilter, createLimits, NO_FILTER, NO_LIMIT, parseSort } from '../operation';
import type { FilterOptions, FilterSpec, LimitSpec, LimitStrategy, SortExpression, SortInput, SqlArguments } from '../operation';
import { TableCommandBuilder } from './dbCommandBuilder';

interface SelectState
{
	readonly filter: FilterSpec;
	readonly sort: readonly SortExpression[];
	readonly limits: LimitSpec;
}

/**
 * SELECT from a table or view. Every `with...` call returns a new command.
 */
export class TableOrViewCommand extends TableCommandBuilder
{
	constructor(
		dataSource: CommandDataSource,
		metadata: TableOrViewMetadata,
		private readonly state: SelectState = { filter: NO_FILTER, sort: [], limits: NO_LIMIT }
	)
	{
		super(dataSource, metadata);
	}

	get filter(): FilterSpec
	{
		return this.state.filter;
	}

	/**
	 * Filters with a raw WHERE clause (`@name` and `?` placeholders) or a filter object
	 * matched by equality. Replaces any earlier filter of either kind.
	 */
	withFilter(whereClause: string, args?: SqlArguments): TableOrViewCommand;
	withFilter(filterValue: object, options?: FilterOptions): TableOrViewCommand;
	withFilter(filter: string | object, extra?: SqlArguments | FilterOptions): TableOrViewCommand
	{
		return this.with({ filter: createFilter(filter, extra) });
	}

	/**
	 * Replaces the sort order.
	 */
	withSorting(...sort: SortInput[]): TableOrViewCommand
	{
		return this.with({ sort: Object.freeze(sort.map(parseSort)) });
	}

	withLimits(limits: { skip?: number; take?: number; strategy?: LimitStrategy; seed?: number }): TableOrViewCommand
	{
		return this.with({ limits: createLimits(limits) });
	}

	/**
	 * Counts the rows the filter matches.
	 */
	asCount(): CountMaterializer
	{
		return new CountMaterializer(this);
	}

	prepare(materializer: Materializer<unknown>): ExecutionToken
	{
		const builder = this.createBuilder(materializer);
		const selectExpression = materializer.selectExpression();
		if (selectExpression !== undefined && this.state.limits.strategy !== 'none')
		{
			throw new InvalidOperationError('Limits cannot be combined with an aggregate select');
		}

		return this.dataSource.dialect.prepareSelect({
			operationName: 'Select',
			metadata: this.metadata,
			builder,
			filter: this.state.filter,
			// an aggregate has nothing to order
			sort: selectExpression === undefined ? this.state.sort : [],
			limits: this.state.limits,
			selectExpression
		});
	}

	private with(changes: Partial<SelectState>): TableOrViewCommand
	{
		return new TableOrViewCommand(this.dataSource, this.metadata, Object.freeze({ ...this.state, ...changes }));
	}
}
