import { resolveSettings } from './config';
import type { DataSourceConfig, DataSourceSettings } from './config';
import { ReaderWriterLock } from './concurrency/readerWriterLock';
import { MySQLDialect } from './dialects/MySQLDialect';
import { MySQLMetadataCache } from './dialects/MySQLMetadataCache';
import { PostgreSQLDialect } from './dialects/PostgreSQLDialect';
import { PostgreSQLMetadataCache } from './dialects/PostgreSQLMetadataCache';
import type { SqlDialect } from './dialects/sqlDialect';
import { SQLiteDialect } from './dialects/SQLiteDialect';
import { SQLiteMetadataCache } from './dialects/SQLiteMetadataCache';
import { DataSourceBase } from './dataSourceBase';
import { getLogger } from './logger';
import { CompiledBinderCache } from './materializers/compiledBinderCache';
import type { DatabaseMetadataCache } from './metadata/databaseMetadataCache';
import { TypeRegistry } from './metadata/typeDescriptor';
import type { NativeConnection, NativeSession } from './nativeCommand';
import { TransactionalDataSource } from './transactionalDataSource';

const logger = getLogger('DataSource');

/**
 * Entry point: owns the native connection, the metadata catalog, the compiled binder cache
 * and the lock, and hands them to every command and transaction it creates.
 *
 * @example
 * const ds = await DataSource.build({ type: 'sqlite', filename: ':memory:' });
 * ds.types.register(Customer, CustomerType);
 * const rows = await (await ds.from('Customer')).withSorting('Name').toRows().execute();
 */
export class DataSource extends DataSourceBase
{
	/**
	 * Creates a data source over an open native connection.
	 */
	constructor(
		connection: NativeConnection,
		dialect: SqlDialect,
		metadata: DatabaseMetadataCache,
		settings?: DataSourceSettings
	)
	{
		super({
			connection,
			dialect,
			metadata,
			types: new TypeRegistry(),
			binders: new CompiledBinderCache(),
			lock: new ReaderWriterLock(),
			settings: resolveSettings(settings)
		});
	}

	/**
	 * Builds a data source from configuration, loading only the driver it needs.
	 */
	static async build(config: DataSourceConfig): Promise<DataSource>
	{
		logger.debug('Building data source', { type: config.type });
		switch (config.type)
		{
			case 'sqlite':
			{
				const { SQLiteConnection } = await import('./drivers/sqliteConnection');
				const connection = new SQLiteConnection({ filename: config.filename });
				return new DataSource(connection, new SQLiteDialect(), new SQLiteMetadataCache(connection), config.settings);
			}
			case 'postgresql':
			{
				const { PostgreSQLConnection } = await import('./drivers/postgresqlConnection');
				const connection = new PostgreSQLConnection(config.pool);
				return new DataSource(connection, new PostgreSQLDialect(), new PostgreSQLMetadataCache(connection, config.defaultSchema), config.settings);
			}
			case 'mysql':
			{
				const { MySQLConnection } = await import('./drivers/mysqlConnection');
				const connection = new MySQLConnection(config.pool);
				return new DataSource(connection, new MySQLDialect(), new MySQLMetadataCache(connection), config.settings);
			}
			case 'custom':
				return new DataSource(config.connection, config.dialect, config.metadata, config.settings);
		}
	}

	/**
	 * Starts a transaction on a session of its own.
	 */
	beginTransaction(): Promise<TransactionalDataSource>
	{
		return TransactionalDataSource.begin(this.context);
	}

	/**
	 * Closes the native connection. Caches are dropped with the data source.
	 */
	async close(): Promise<void>
	{
		await this.context.connection.close();
		logger.info('Data source closed', { dialect: this.dialect.name });
	}

	protected openSession(): Promise<NativeSession>
	{
		return this.context.connection.openSession();
	}

	protected closeSession(session: NativeSession): Promise<void>
	{
		return session.release();
	}
}
