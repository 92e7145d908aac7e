import { catalogParameters, cell, DatabaseMetadataCache } from '../metadata/databaseMetadataCache';
import type { CatalogRow, NotFoundPolicy } from '../metadata/databaseMetadataCache';
import type { ColumnDefinition } from '../metadata/columnMetadata';
import { ObjectName } from '../metadata/objectName';
import type { ParameterMetadata, RoutineMetadata, TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import type { NativeConnection } from '../nativeCommand';
import { PostgreSQLEscaper } from './sqlEscaper';

const TABLE_QUERY = `SELECT table_schema, table_name, table_type
FROM information_schema.tables
WHERE table_schema = $1 AND lower(table_name) = lower($2)
ORDER BY (table_name = $2) DESC
LIMIT 1;`;

const COLUMN_QUERY = `SELECT c.column_name, c.udt_name, c.is_nullable, c.is_identity, c.is_generated, c.column_default,
	c.character_maximum_length,
	EXISTS (
		SELECT 1 FROM pg_index i
		JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = ANY (i.indkey)
		WHERE i.indisprimary
			AND i.indrelid = (quote_ident(c.table_schema) || '.' || quote_ident(c.table_name))::regclass
			AND a.attname = c.column_name
	) AS is_primary_key
FROM information_schema.columns c
WHERE c.table_schema = $1 AND c.table_name = $2
ORDER BY c.ordinal_position;`;

const ROUTINE_QUERY = `SELECT routine_schema, routine_name, specific_name
FROM information_schema.routines
WHERE routine_schema = $1 AND lower(routine_name) = lower($2) AND routine_type = $3
LIMIT 1;`;

const PARAMETER_QUERY = `SELECT parameter_name, udt_name, parameter_mode
FROM information_schema.parameters
WHERE specific_schema = $1 AND specific_name = $2
ORDER BY ordinal_position;`;

/**
 * PostgreSQL catalog, read from information_schema with pg_index for primary keys.
 * Introspection is strict: an unknown name is a MissingObjectError.
 */
export class PostgreSQLMetadataCache extends DatabaseMetadataCache
{
	readonly notFoundPolicy: NotFoundPolicy = 'strict';

	constructor(connection: NativeConnection, defaultSchema = 'public')
	{
		super(connection, new PostgreSQLEscaper(), defaultSchema);
	}

	protected async loadTableOrView(name: ObjectName): Promise<TableOrViewMetadata | undefined>
	{
		const schema = name.schema ?? this.defaultSchema ?? 'public';
		const tables = await this.query(TABLE_QUERY, catalogParameters(schema, name.name));
		if (tables.length === 0)
		{
			return undefined;
		}

		const actual = new ObjectName(cell.text(tables[0], 'table_schema'), cell.text(tables[0], 'table_name'));
		const rows = await this.query(COLUMN_QUERY, catalogParameters(actual.schema, actual.name));
		return this.createTable(actual, cell.text(tables[0], 'table_type') === 'BASE TABLE', rows.map(toColumn));
	}

	protected async loadRoutine(name: ObjectName, kind: 'procedure' | 'function'): Promise<RoutineMetadata | undefined>
	{
		const schema = name.schema ?? this.defaultSchema ?? 'public';
		const routines = await this.query(ROUTINE_QUERY, catalogParameters(schema, name.name, kind === 'procedure' ? 'PROCEDURE' : 'FUNCTION'));
		if (routines.length === 0)
		{
			return undefined;
		}

		const actual = new ObjectName(cell.text(routines[0], 'routine_schema'), cell.text(routines[0], 'routine_name'));
		const rows = await this.query(PARAMETER_QUERY, catalogParameters(actual.schema, cell.text(routines[0], 'specific_name')));

		const parameters: ParameterMetadata[] = [];
		const columns: ColumnDefinition[] = [];
		for (const row of rows)
		{
			const mode = cell.text(row, 'parameter_mode').toUpperCase();
			const typeName = cell.text(row, 'udt_name');
			const sqlName = cell.text(row, 'parameter_name');
			if (kind === 'function' && mode === 'OUT')
			{
				// OUT parameters of a set-returning function are its result columns
				columns.push({ sqlName, typeName });
			}
			else
			{
				parameters.push({ sqlName, typeName, direction: mode === 'INOUT' ? 'inout' : mode === 'OUT' ? 'out' : 'in' });
			}
		}
		return this.createRoutine(actual, kind, parameters, columns);
	}

	protected async listObjects(kind: 'table' | 'view'): Promise<ObjectName[]>
	{
		const rows = await this.query(
			`SELECT table_schema, table_name FROM information_schema.tables
WHERE table_type = $1 AND table_schema NOT IN ('pg_catalog', 'information_schema');`,
			catalogParameters(kind === 'table' ? 'BASE TABLE' : 'VIEW')
		);
		return rows.map(r => new ObjectName(cell.text(r, 'table_schema'), cell.text(r, 'table_name')));
	}
}

function toColumn(row: CatalogRow): ColumnDefinition
{
	const columnDefault = cell.optionalText(row, 'column_default') ?? '';
	return {
		sqlName: cell.text(row, 'column_name'),
		typeName: cell.text(row, 'udt_name'),
		isPrimaryKey: cell.flag(row, 'is_primary_key'),
		isIdentity: cell.flag(row, 'is_identity') || columnDefault.startsWith('nextval('),
		isComputed: cell.text(row, 'is_generated') === 'ALWAYS',
		isNullable: cell.flag(row, 'is_nullable'),
		maxLength: cell.integer(row, 'character_maximum_length')
	};
}
