import type { SqlDialect } from '../dialects/sqlDialect';
import type { SQLEscaper } from '../dialects/sqlEscaper';
import { DataSource } from '../dataSource';
import type { DataSourceSettings } from '../config';
import { ColumnMetadata } from '../metadata/columnMetadata';
import type { ColumnDefinition } from '../metadata/columnMetadata';
import { DatabaseMetadataCache } from '../metadata/databaseMetadataCache';
import type { NotFoundPolicy } from '../metadata/databaseMetadataCache';
import { ObjectName } from '../metadata/objectName';
import { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import { describeType } from '../metadata/typeDescriptor';
import type { NativeCommand, NativeConnection, NativeResult, NativeSession } from '../nativeCommand';

/**
 * Test doubles shared by the unit tests. Nothing here talks to a database.
 */

export const CUSTOMER_COLUMNS: readonly ColumnDefinition[] = [
	{ sqlName: 'CustomerKey', typeName: 'INTEGER', isPrimaryKey: true, isIdentity: true, isNullable: false },
	{ sqlName: 'FullName', typeName: 'TEXT', isNullable: false },
	{ sqlName: 'State', typeName: 'TEXT' },
	{ sqlName: 'CreatedDate', typeName: 'TEXT', isComputed: true }
];

export class Customer
{
	CustomerKey = 0;
	FullName = '';
	State: string | null = null;
}

export const CustomerType = describeType('Customer', () => new Customer(), {
	CustomerKey: { type: 'number', nullable: false },
	FullName: { type: 'string', nullable: false },
	State: 'string'
});

export function createTable(escaper: SQLEscaper, name: string, columns: readonly ColumnDefinition[], schema?: string, isTable = true): TableOrViewMetadata
{
	return new TableOrViewMetadata(
		new ObjectName(schema, name),
		escaper.quoteObjectName(schema, name),
		isTable,
		columns.map(c => new ColumnMetadata(c, identifier => escaper.quoteIdentifier(identifier)))
	);
}

type Responder = (command: NativeCommand, signal?: AbortSignal) => NativeResult | Promise<NativeResult>;

/**
 * In-process NativeConnection that records every command and answers from a script.
 */
export class StubConnection implements NativeConnection
{
	readonly commands: NativeCommand[] = [];
	sessionsOpened = 0;
	sessionsReleased = 0;
	closed = false;

	constructor(private readonly respond: Responder = () => ({})) { }

	get commandTexts(): string[]
	{
		return this.commands.map(c => c.commandText);
	}

	openSession(): Promise<NativeSession>
	{
		this.sessionsOpened++;
		return Promise.resolve({
			execute: async (command, signal) =>
			{
				this.commands.push(command);
				return this.respond(command, signal);
			},
			release: () =>
			{
				this.sessionsReleased++;
				return Promise.resolve();
			}
		});
	}

	close(): Promise<void>
	{
		this.closed = true;
		return Promise.resolve();
	}
}

/**
 * Catalog over fixed tables. Counts discovery calls per name.
 */
export class FixtureMetadataCache extends DatabaseMetadataCache
{
	readonly discoveries: string[] = [];

	constructor(
		connection: NativeConnection,
		escaper: SQLEscaper,
		private readonly fixtureTables: readonly TableOrViewMetadata[],
		readonly notFoundPolicy: NotFoundPolicy = 'soft'
	)
	{
		super(connection, escaper);
	}

	protected loadTableOrView(name: ObjectName): Promise<TableOrViewMetadata | undefined>
	{
		this.discoveries.push(name.name);
		return Promise.resolve(this.fixtureTables.find(t => t.name.name.toLowerCase() === name.name.toLowerCase()));
	}

	protected listObjects(kind: 'table' | 'view'): Promise<ObjectName[]>
	{
		return Promise.resolve(this.fixtureTables.filter(t => t.isTable === (kind === 'table')).map(t => t.name));
	}
}

/**
 * A data source over a stub connection and the Customer fixture table.
 */
export function createStubDataSource(dialect: SqlDialect, connection = new StubConnection(), settings?: DataSourceSettings): { dataSource: DataSource; connection: StubConnection }
{
	const metadata = new FixtureMetadataCache(connection, dialect.escaper, [createTable(dialect.escaper, 'Customer', CUSTOMER_COLUMNS)]);
	return { dataSource: new DataSource(connection, dialect, metadata, settings), connection };
}
