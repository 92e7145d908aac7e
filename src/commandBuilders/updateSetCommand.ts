import type { CommandDataSource } from '../commandDataSource';
import type { ExecutionToken } from '../executionToken';
import type { Materializer } from '../materializers/materializer';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import { hasFlag, UpdateOptions } from '../operation';
import type { SqlArguments } from '../operation';
import { FilteredWriteCommand, UNFILTERED } from './filteredWriteCommand';
import type { FilteredWriteState } from './filteredWriteCommand';

/**
 * New values for an update-set: an object of column values, or a raw SET expression.
 */
export type UpdateSetValues =
	| { readonly values: object }
	| { readonly expression: string; readonly args?: SqlArguments };

/**
 * UPDATE of every row a filter matches.
 *
 * @example
 * await (await ds.updateSet('Employee', { values: { Status: 'Inactive' } })).withFilter('HireDate < @Cutoff', { Cutoff }).asNonQuery().execute();
 */
export class UpdateSetCommand extends FilteredWriteCommand<UpdateSetCommand>
{
	constructor(
		dataSource: CommandDataSource,
		metadata: TableOrViewMetadata,
		private readonly newValues: UpdateSetValues,
		private readonly options: UpdateOptions = UpdateOptions.None,
		state: FilteredWriteState = UNFILTERED
	)
	{
		super(dataSource, metadata, state);
	}

	prepare(materializer: Materializer<unknown>): ExecutionToken
	{
		const filter = this.requireFilter('UpdateSet');
		const builder = this.createBuilder(materializer);
		if ('values' in this.newValues)
		{
			builder.applyArgumentValue(this.newValues.values);
		}
		return this.dataSource.dialect.prepareUpdateSet({
			operationName: 'UpdateSet',
			metadata: this.metadata,
			builder,
			filter,
			setExpression: 'expression' in this.newValues ? { text: this.newValues.expression, args: this.newValues.args } : undefined,
			expectedRowCount: this.state.expectedRowCount,
			returnOldValues: hasFlag(this.options, UpdateOptions.ReturnOldValues)
		});
	}

	protected with(state: FilteredWriteState): UpdateSetCommand
	{
		return new UpdateSetCommand(this.dataSource, this.metadata, this.newValues, this.options, Object.freeze(state));
	}
}
