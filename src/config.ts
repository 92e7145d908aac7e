import type { PoolOptions } from 'mysql2/promise';
import type { PoolConfig } from 'pg';
import type { SqlDialect } from './dialects/sqlDialect';
import { SQLValidator } from './dialects/sqlValidator';
import { globalLogger } from './logger';
import type { LogLevel } from './logger';
import type { DatabaseMetadataCache } from './metadata/databaseMetadataCache';
import type { NativeConnection } from './nativeCommand';

/**
 * Behavior settings shared by every kind of data source.
 */
export interface DataSourceSettings
{
	/**
	 * Unknown desired columns and argument properties without a column are MappingErrors
	 * instead of being ignored (default: false).
	 */
	strictMode?: boolean;
	/** Command timeout in milliseconds applied to tokens that carry none. */
	defaultCommandTimeout?: number;
	/** Skip the reader/writer lock entirely (default: false). */
	disableLocks?: boolean;
	/** Sets the global logger's level when the data source is built. */
	logLevel?: LogLevel;
}

/**
 * SQLite through sqlite3 and the sqlite promise wrapper.
 */
export interface SQLiteDataSourceConfig
{
	type: 'sqlite';
	/** Database file path, or `:memory:`. */
	filename: string;
	settings?: DataSourceSettings;
}

/**
 * PostgreSQL through a pg connection pool.
 */
export interface PostgreSQLDataSourceConfig
{
	type: 'postgresql';
	pool: PoolConfig;
	/** Schema for names given without one (default: public). */
	defaultSchema?: string;
	settings?: DataSourceSettings;
}

/**
 * MySQL through a mysql2 connection pool.
 */
export interface MySQLDataSourceConfig
{
	type: 'mysql';
	pool: PoolOptions;
	settings?: DataSourceSettings;
}

/**
 * Any other transport, such as a SQL Server driver behind a {@link NativeConnection}.
 */
export interface CustomDataSourceConfig
{
	type: 'custom';
	connection: NativeConnection;
	dialect: SqlDialect;
	metadata: DatabaseMetadataCache;
	settings?: DataSourceSettings;
}

export type DataSourceConfig =
	| SQLiteDataSourceConfig
	| PostgreSQLDataSourceConfig
	| MySQLDataSourceConfig
	| CustomDataSourceConfig;

export interface ResolvedSettings
{
	readonly strictMode: boolean;
	readonly defaultCommandTimeout?: number;
	readonly disableLocks: boolean;
}

/**
 * Validates settings, fills in defaults and applies the log level.
 */
export function resolveSettings(settings: DataSourceSettings = {}): ResolvedSettings
{
	if (settings.defaultCommandTimeout !== undefined)
	{
		SQLValidator.validateTimeout(settings.defaultCommandTimeout);
	}
	if (settings.logLevel !== undefined)
	{
		globalLogger.setLevel(settings.logLevel);
	}
	return Object.freeze({
		strictMode: settings.strictMode ?? false,
		defaultCommandTimeout: settings.defaultCommandTimeout,
		disableLocks: settings.disableLocks ?? false
	});
}
