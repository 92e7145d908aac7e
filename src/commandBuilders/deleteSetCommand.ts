import type { CommandDataSource } from '../commandDataSource';
import type { ExecutionToken } from '../executionToken';
import type { Materializer } from '../materializers/materializer';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import { FilteredWriteCommand, UNFILTERED } from './filteredWriteCommand';
import type { FilteredWriteState } from './filteredWriteCommand';

/**
 * DELETE of every row a filter matches. A materializer that wants columns gets the deleted rows.
 */
export class DeleteSetCommand extends FilteredWriteCommand<DeleteSetCommand>
{
	constructor(dataSource: CommandDataSource, metadata: TableOrViewMetadata, state: FilteredWriteState = UNFILTERED)
	{
		super(dataSource, metadata, state);
	}

	prepare(materializer: Materializer<unknown>): ExecutionToken
	{
		const filter = this.requireFilter('DeleteWithFilter');
		return this.dataSource.dialect.prepareDeleteSet({
			operationName: 'DeleteWithFilter',
			metadata: this.metadata,
			builder: this.createBuilder(materializer),
			filter,
			expectedRowCount: this.state.expectedRowCount
		});
	}

	protected with(state: FilteredWriteState): DeleteSetCommand
	{
		return new DeleteSetCommand(this.dataSource, this.metadata, Object.freeze(state));
	}
}
