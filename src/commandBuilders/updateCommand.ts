import type { CommandDataSource } from '../commandDataSource';
import type { ExecutionToken } from '../executionToken';
import type { Materializer } from '../materializers/materializer';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import { hasFlag, UpdateOptions } from '../operation';
import { TableCommandBuilder } from './dbCommandBuilder';

/**
 * UPDATE of the row an object's key identifies. Exactly one row must be affected
 * unless IgnoreRowsAffected is set.
 */
export class UpdateCommand extends TableCommandBuilder
{
	constructor(
		dataSource: CommandDataSource,
		metadata: TableOrViewMetadata,
		private readonly argumentValue: object,
		private readonly options: UpdateOptions = UpdateOptions.None
	)
	{
		super(dataSource, metadata);
	}

	prepare(materializer: Materializer<unknown>): ExecutionToken
	{
		const builder = this.createBuilder(materializer);
		builder.applyArgumentValue(this.argumentValue, { useObjectDefinedKeys: hasFlag(this.options, UpdateOptions.UseKeyAttribute) });
		return this.dataSource.dialect.prepareUpdate({
			operationName: 'Update',
			metadata: this.metadata,
			builder,
			expectedRowCount: hasFlag(this.options, UpdateOptions.IgnoreRowsAffected) ? undefined : 1,
			returnOldValues: hasFlag(this.options, UpdateOptions.ReturnOldValues)
		});
	}
}
