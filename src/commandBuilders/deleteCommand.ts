import type { CommandDataSource } from '../commandDataSource';
import type { ExecutionToken } from '../executionToken';
import type { Materializer } from '../materializers/materializer';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import { DeleteOptions, hasFlag } from '../operation';
import { TableCommandBuilder } from './dbCommandBuilder';

/**
 * DELETE of the row an object's key identifies. A materializer that wants columns
 * gets the deleted row.
 */
export class DeleteCommand extends TableCommandBuilder
{
	constructor(
		dataSource: CommandDataSource,
		metadata: TableOrViewMetadata,
		private readonly argumentValue: object,
		private readonly options: DeleteOptions = DeleteOptions.None
	)
	{
		super(dataSource, metadata);
	}

	prepare(materializer: Materializer<unknown>): ExecutionToken
	{
		const builder = this.createBuilder(materializer);
		builder.applyArgumentValue(this.argumentValue, { useObjectDefinedKeys: hasFlag(this.options, DeleteOptions.UseKeyAttribute) });
		return this.dataSource.dialect.prepareDelete({
			operationName: 'Delete',
			metadata: this.metadata,
			builder,
			expectedRowCount: hasFlag(this.options, DeleteOptions.IgnoreRowsAffected) ? undefined : 1
		});
	}
}
