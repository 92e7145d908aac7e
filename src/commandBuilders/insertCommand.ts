import type { CommandDataSource } from '../commandDataSource';
import type { ExecutionToken } from '../executionToken';
import type { Materializer } from '../materializers/materializer';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import { TableCommandBuilder } from './dbCommandBuilder';

/**
 * INSERT of one object. A materializer that wants columns reads the new row back.
 */
export class InsertCommand extends TableCommandBuilder
{
	constructor(dataSource: CommandDataSource, metadata: TableOrViewMetadata, private readonly argumentValue: object)
	{
		super(dataSource, metadata);
	}

	prepare(materializer: Materializer<unknown>): ExecutionToken
	{
		const builder = this.createBuilder(materializer);
		builder.applyArgumentValue(this.argumentValue);
		return this.dataSource.dialect.prepareInsert({ operationName: 'Insert', metadata: this.metadata, builder });
	}
}
