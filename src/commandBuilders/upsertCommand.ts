import type { CommandDataSource } from '../commandDataSource';
import type { ExecutionToken } from '../executionToken';
import type { Materializer } from '../materializers/materializer';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import { hasFlag, UpsertOptions } from '../operation';
import { TableCommandBuilder } from './dbCommandBuilder';

/**
 * Insert-or-update of one object, matched on the primary key, the object's own key
 * or explicit match columns.
 */
export class UpsertCommand extends TableCommandBuilder
{
	constructor(
		dataSource: CommandDataSource,
		metadata: TableOrViewMetadata,
		private readonly argumentValue: object,
		private readonly options: UpsertOptions = UpsertOptions.None,
		private readonly matchColumns: readonly string[] = []
	)
	{
		super(dataSource, metadata);
	}

	/**
	 * Matches existing rows on these columns instead of the key.
	 */
	matchOn(...columnNames: string[]): UpsertCommand
	{
		return new UpsertCommand(this.dataSource, this.metadata, this.argumentValue, this.options, Object.freeze(columnNames));
	}

	prepare(materializer: Materializer<unknown>): ExecutionToken
	{
		const builder = this.createBuilder(materializer);
		builder.applyArgumentValue(this.argumentValue, { useObjectDefinedKeys: hasFlag(this.options, UpsertOptions.UseKeyAttribute) });
		if (this.matchColumns.length > 0)
		{
			builder.overrideKeys(this.matchColumns);
		}
		return this.dataSource.dialect.prepareUpsert({ operationName: 'Upsert', metadata: this.metadata, builder });
	}
}
