/**
 * @file Main entry point of tabular-chain.
 * Exports the data sources, command builders, materializers, dialects and the metadata catalog.
 * Driver adapters are not exported here so that only the driver a configuration names gets loaded;
 * import them from `tabular-chain/dist/drivers/*` to construct a connection by hand.
 */

export { DataSource } from './dataSource';
export { DataSourceBase } from './dataSourceBase';
export type { DataSourceContext } from './dataSourceBase';
export { TransactionalDataSource } from './transactionalDataSource';
export type { ChainResult, CommandDataSource } from './commandDataSource';

export { resolveSettings } from './config';
export type
{
	DataSourceSettings, ResolvedSettings, DataSourceConfig,
	SQLiteDataSourceConfig, PostgreSQLDataSourceConfig, MySQLDataSourceConfig, CustomDataSourceConfig
} from './config';

export
{
	ChainError, MappingError, InvalidOperationError, RowCountMismatchError, MissingObjectError,
	MissingDataError, UnexpectedDataError, OperationCanceledError, DisposedError
} from './errors';

export { Logger, LogLevel, globalLogger, getLogger } from './logger';
export type { ContextLogger, LogData, LogEntry, LoggerConfig } from './logger';

export { LazyCache, AsyncLazyCache } from './concurrency/lazyCache';
export { ReaderWriterLock } from './concurrency/readerWriterLock';
export type { LockMode, LockRelease } from './concurrency/readerWriterLock';

export { ObjectName } from './metadata/objectName';
export { ColumnMetadata, ColumnMetadataCollection, toIdentifierName } from './metadata/columnMetadata';
export type { ColumnDefinition } from './metadata/columnMetadata';
export { TableOrViewMetadata, PropertiesFilter, RoutineMetadata } from './metadata/tableOrViewMetadata';
export type { ColumnPropertyMap, ParameterMetadata } from './metadata/tableOrViewMetadata';
export { DatabaseMetadataCache } from './metadata/databaseMetadataCache';
export type { CatalogRow, NotFoundPolicy } from './metadata/databaseMetadataCache';
export { describeType, isChangeTracking, PropertyMetadata, TypeDescriptor, TypeRegistry } from './metadata/typeDescriptor';
export type { PropertyOptions, ConstructorSignature, ChangeTracking, TypeDescriptorOptions } from './metadata/typeDescriptor';

export { SqlBuilder } from './sqlBuilder';
export { ExecutionToken } from './executionToken';
export type { ExecutionTokenInit } from './executionToken';
export type { CommandType, ExecutionMode, SqlParameter, NativeCommand, NativeResult, NativeSession, NativeConnection, SessionOptions } from './nativeCommand';
export { ArrayRowCursor, readRecords, kindOf } from './rowCursor';
export type { RowCursor, CursorField, ValueKind } from './rowCursor';

export
{
	FilterOptions, UpdateOptions, DeleteOptions, UpsertOptions,
	NO_FILTER, NO_LIMIT, createFilter, createLimits, parseSort, hasFlag
} from './operation';
export type { SqlArguments, FilterSpec, SortDirection, SortExpression, SortInput, LimitStrategy, LimitSpec } from './operation';

export { SqlDialect } from './dialects/sqlDialect';
export type { DialectName } from './dialects/sqlDialect';
export { SQLiteDialect } from './dialects/SQLiteDialect';
export { PostgreSQLDialect } from './dialects/PostgreSQLDialect';
export { MySQLDialect } from './dialects/MySQLDialect';
export { SqlServerDialect } from './dialects/SqlServerDialect';
export { SQLiteMetadataCache } from './dialects/SQLiteMetadataCache';
export { PostgreSQLMetadataCache } from './dialects/PostgreSQLMetadataCache';
export { MySQLMetadataCache } from './dialects/MySQLMetadataCache';
export { SqlServerMetadataCache } from './dialects/SqlServerMetadataCache';
export { SQLEscaper, SQLiteEscaper, PostgreSQLEscaper, MySQLEscaper, SqlServerEscaper } from './dialects/sqlEscaper';
export { SQLValidator } from './dialects/sqlValidator';

export { NO_COLUMNS, ALL_COLUMNS, Materializer } from './materializers/materializer';
export type { DesiredColumns, ExecuteOptions, PreparableCommand } from './materializers/materializer';
export { NonQueryMaterializer } from './materializers/nonQueryMaterializer';
export { RowsMaterializer } from './materializers/rowsMaterializer';
export { CollectionMaterializer, ObjectMaterializer, ObjectOrUndefinedMaterializer } from './materializers/objectMaterializer';
export type { ConstructionMode, ObjectMaterializerOptions, SingleObjectOptions } from './materializers/objectMaterializer';
export { ScalarMaterializer, ScalarOrNullMaterializer, ListMaterializer, CountMaterializer } from './materializers/scalarMaterializer';
export type { ValueConverter, ListOptions } from './materializers/scalarMaterializer';
export { CompiledBinderCache } from './materializers/compiledBinderCache';
export {
	convertToNumber, convertToBigInt, convertToBoolean, convertToString, convertToDate, convertToBuffer, convertToJson
} from './materializers/columnReader';

export { DbCommandBuilder, TableCommandBuilder } from './commandBuilders/dbCommandBuilder';
export { TableOrViewCommand } from './commandBuilders/tableOrViewCommand';
export { InsertCommand } from './commandBuilders/insertCommand';
export { UpdateCommand } from './commandBuilders/updateCommand';
export { UpdateSetCommand } from './commandBuilders/updateSetCommand';
export type { UpdateSetValues } from './commandBuilders/updateSetCommand';
export { DeleteCommand } from './commandBuilders/deleteCommand';
export { DeleteSetCommand } from './commandBuilders/deleteSetCommand';
export { UpsertCommand } from './commandBuilders/upsertCommand';
export { SqlCall } from './commandBuilders/sqlCall';
