import { cell, DatabaseMetadataCache } from '../metadata/databaseMetadataCache';
import type { CatalogRow, NotFoundPolicy } from '../metadata/databaseMetadataCache';
import type { ColumnDefinition } from '../metadata/columnMetadata';
import { ObjectName } from '../metadata/objectName';
import type { ParameterMetadata, RoutineMetadata, TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import type { NativeConnection } from '../nativeCommand';
import { SqlServerEscaper } from './sqlEscaper';

const OBJECT_QUERY = `SELECT o.object_id, s.name AS schema_name, o.name, o.type
FROM sys.objects o
INNER JOIN sys.schemas s ON o.schema_id = s.schema_id
WHERE s.name = @Schema AND o.name = @Name AND o.type IN (@Type1, @Type2);`;

const COLUMN_QUERY = `SELECT c.name, t.name AS type_name, c.is_nullable, c.is_identity, c.is_computed, c.max_length,
	CONVERT(bit, CASE WHEN EXISTS (
		SELECT 1 FROM sys.index_columns ic
		INNER JOIN sys.indexes i ON ic.object_id = i.object_id AND ic.index_id = i.index_id
		WHERE i.is_primary_key = 1 AND ic.object_id = c.object_id AND ic.column_id = c.column_id
	) THEN 1 ELSE 0 END) AS is_primary_key
FROM sys.columns c
INNER JOIN sys.types t ON c.user_type_id = t.user_type_id
WHERE c.object_id = @ObjectId
ORDER BY c.column_id;`;

const PARAMETER_QUERY = `SELECT p.name, t.name AS type_name, p.is_output
FROM sys.parameters p
INNER JOIN sys.types t ON p.user_type_id = t.user_type_id
WHERE p.object_id = @ObjectId AND p.parameter_id > 0
ORDER BY p.parameter_id;`;

/**
 * SQL Server catalog, read from the sys views. Names without a schema resolve against dbo.
 * Introspection is strict.
 */
export class SqlServerMetadataCache extends DatabaseMetadataCache
{
	readonly notFoundPolicy: NotFoundPolicy = 'strict';

	constructor(connection: NativeConnection, defaultSchema = 'dbo')
	{
		super(connection, new SqlServerEscaper(), defaultSchema);
	}

	protected async loadTableOrView(name: ObjectName): Promise<TableOrViewMetadata | undefined>
	{
		const found = await this.findObject(name, 'U', 'V');
		if (!found)
		{
			return undefined;
		}
		const rows = await this.query(COLUMN_QUERY, [{ name: 'ObjectId', value: found.objectId }]);
		return this.createTable(found.name, found.type === 'U', rows.map(toColumn));
	}

	protected async loadRoutine(name: ObjectName, kind: 'procedure' | 'function'): Promise<RoutineMetadata | undefined>
	{
		// P: procedure; IF and TF: inline and multi-statement table functions
		const found = kind === 'procedure' ? await this.findObject(name, 'P', 'P') : await this.findObject(name, 'IF', 'TF');
		if (!found)
		{
			return undefined;
		}

		const parameterRows = await this.query(PARAMETER_QUERY, [{ name: 'ObjectId', value: found.objectId }]);
		const parameters = parameterRows.map((r): ParameterMetadata => ({
			sqlName: cell.text(r, 'name'),
			typeName: cell.text(r, 'type_name'),
			direction: cell.flag(r, 'is_output') ? 'inout' : 'in'
		}));
		const columns = kind === 'function'
			? (await this.query(COLUMN_QUERY, [{ name: 'ObjectId', value: found.objectId }])).map(toColumn)
			: [];
		return this.createRoutine(found.name, kind, parameters, columns);
	}

	protected async listObjects(kind: 'table' | 'view'): Promise<ObjectName[]>
	{
		const rows = await this.query(
			`SELECT s.name AS schema_name, o.name FROM sys.objects o
INNER JOIN sys.schemas s ON o.schema_id = s.schema_id
WHERE o.type = @Type AND o.is_ms_shipped = 0;`,
			[{ name: 'Type', value: kind === 'table' ? 'U' : 'V' }]
		);
		return rows.map(r => new ObjectName(cell.text(r, 'schema_name'), cell.text(r, 'name')));
	}

	private async findObject(name: ObjectName, type1: string, type2: string): Promise<{ objectId: unknown; name: ObjectName; type: string } | undefined>
	{
		const rows = await this.query(OBJECT_QUERY, [
			{ name: 'Schema', value: name.schema ?? this.defaultSchema },
			{ name: 'Name', value: name.name },
			{ name: 'Type1', value: type1 },
			{ name: 'Type2', value: type2 }
		]);
		if (rows.length === 0)
		{
			return undefined;
		}
		return {
			objectId: rows[0]['object_id'],
			name: new ObjectName(cell.text(rows[0], 'schema_name'), cell.text(rows[0], 'name')),
			type: cell.text(rows[0], 'type').trim()
		};
	}
}

function toColumn(row: CatalogRow): ColumnDefinition
{
	const maxLength = cell.integer(row, 'max_length');
	return {
		sqlName: cell.text(row, 'name'),
		typeName: cell.text(row, 'type_name'),
		isPrimaryKey: cell.flag(row, 'is_primary_key'),
		isIdentity: cell.flag(row, 'is_identity'),
		isComputed: cell.flag(row, 'is_computed'),
		isNullable: cell.flag(row, 'is_nullable'),
		// -1 is (max)
		maxLength: maxLength === -1 ? undefined : maxLength
	};
}
