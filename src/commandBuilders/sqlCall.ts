import type { CommandDataSource } from '../commandDataSource';
import type { ExecutionToken } from '../executionToken';
import { NO_COLUMNS } from '../materializers/materializer';
import type { Materializer } from '../materializers/materializer';
import type { SqlArguments } from '../operation';
import { DbCommandBuilder } from './dbCommandBuilder';

/**
 * Caller-written SQL. `?` takes positional arguments and `@name` named ones; both are bound.
 */
export class SqlCall extends DbCommandBuilder
{
	constructor(dataSource: CommandDataSource, private readonly sqlText: string, private readonly args?: SqlArguments)
	{
		super(dataSource);
	}

	prepare(materializer: Materializer<unknown>): ExecutionToken
	{
		return this.dataSource.dialect.prepareSql('Sql', this.sqlText, this.args, this.dataSource, materializer.desiredColumns() !== NO_COLUMNS);
	}
}
