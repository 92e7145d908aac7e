import { catalogParameters, cell, DatabaseMetadataCache } from '../metadata/databaseMetadataCache';
import type { CatalogRow, NotFoundPolicy } from '../metadata/databaseMetadataCache';
import type { ColumnDefinition } from '../metadata/columnMetadata';
import { ObjectName } from '../metadata/objectName';
import type { ParameterMetadata, RoutineMetadata, TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import type { NativeConnection } from '../nativeCommand';
import { MySQLEscaper } from './sqlEscaper';

const TABLE_QUERY = `SELECT TABLE_SCHEMA, TABLE_NAME, TABLE_TYPE
FROM information_schema.TABLES
WHERE TABLE_SCHEMA = COALESCE(?, DATABASE()) AND TABLE_NAME = ?;`;

const COLUMN_QUERY = `SELECT COLUMN_NAME, DATA_TYPE, IS_NULLABLE, COLUMN_KEY, EXTRA, CHARACTER_MAXIMUM_LENGTH
FROM information_schema.COLUMNS
WHERE TABLE_SCHEMA = ? AND TABLE_NAME = ?
ORDER BY ORDINAL_POSITION;`;

const ROUTINE_QUERY = `SELECT ROUTINE_SCHEMA, ROUTINE_NAME
FROM information_schema.ROUTINES
WHERE ROUTINE_SCHEMA = COALESCE(?, DATABASE()) AND ROUTINE_NAME = ? AND ROUTINE_TYPE = ?;`;

const PARAMETER_QUERY = `SELECT PARAMETER_NAME, DATA_TYPE, PARAMETER_MODE
FROM information_schema.PARAMETERS
WHERE SPECIFIC_SCHEMA = ? AND SPECIFIC_NAME = ? AND ORDINAL_POSITION > 0
ORDER BY ORDINAL_POSITION;`;

/**
 * MySQL catalog, read from information_schema. Names without a schema resolve against the
 * connection's current database. Introspection is strict.
 */
export class MySQLMetadataCache extends DatabaseMetadataCache
{
	readonly notFoundPolicy: NotFoundPolicy = 'strict';

	constructor(connection: NativeConnection)
	{
		super(connection, new MySQLEscaper());
	}

	protected async loadTableOrView(name: ObjectName): Promise<TableOrViewMetadata | undefined>
	{
		const tables = await this.query(TABLE_QUERY, catalogParameters(name.schema ?? null, name.name));
		if (tables.length === 0)
		{
			return undefined;
		}

		const schema = cell.text(tables[0], 'TABLE_SCHEMA');
		const tableName = cell.text(tables[0], 'TABLE_NAME');
		const rows = await this.query(COLUMN_QUERY, catalogParameters(schema, tableName));
		// keep the caller's qualification so the quoted name follows the current database
		return this.createTable(new ObjectName(name.schema, tableName), cell.text(tables[0], 'TABLE_TYPE') === 'BASE TABLE', rows.map(toColumn));
	}

	protected async loadRoutine(name: ObjectName, kind: 'procedure' | 'function'): Promise<RoutineMetadata | undefined>
	{
		const routines = await this.query(ROUTINE_QUERY, catalogParameters(name.schema ?? null, name.name, kind === 'procedure' ? 'PROCEDURE' : 'FUNCTION'));
		if (routines.length === 0)
		{
			return undefined;
		}

		const schema = cell.text(routines[0], 'ROUTINE_SCHEMA');
		const routineName = cell.text(routines[0], 'ROUTINE_NAME');
		const rows = await this.query(PARAMETER_QUERY, catalogParameters(schema, routineName));
		const parameters = rows.map((r): ParameterMetadata =>
		{
			const mode = cell.text(r, 'PARAMETER_MODE').toUpperCase();
			return {
				sqlName: cell.text(r, 'PARAMETER_NAME'),
				typeName: cell.text(r, 'DATA_TYPE'),
				direction: mode === 'INOUT' ? 'inout' : mode === 'OUT' ? 'out' : 'in'
			};
		});
		return this.createRoutine(new ObjectName(name.schema, routineName), kind, parameters);
	}

	protected async listObjects(kind: 'table' | 'view'): Promise<ObjectName[]>
	{
		const rows = await this.query(
			'SELECT TABLE_NAME FROM information_schema.TABLES WHERE TABLE_SCHEMA = DATABASE() AND TABLE_TYPE = ?;',
			catalogParameters(kind === 'table' ? 'BASE TABLE' : 'VIEW')
		);
		return rows.map(r => new ObjectName(undefined, cell.text(r, 'TABLE_NAME')));
	}
}

function toColumn(row: CatalogRow): ColumnDefinition
{
	const extra = cell.text(row, 'EXTRA').toLowerCase();
	return {
		sqlName: cell.text(row, 'COLUMN_NAME'),
		typeName: cell.text(row, 'DATA_TYPE'),
		isPrimaryKey: cell.text(row, 'COLUMN_KEY') === 'PRI',
		isIdentity: extra.includes('auto_increment'),
		isComputed: extra.includes('generated') && !extra.includes('default_generated'),
		isNullable: cell.flag(row, 'IS_NULLABLE'),
		maxLength: cell.integer(row, 'CHARACTER_MAXIMUM_LENGTH')
	};
}
