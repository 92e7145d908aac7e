import { catalogParameters, cell, DatabaseMetadataCache } from '../metadata/databaseMetadataCache';
import type { NotFoundPolicy } from '../metadata/databaseMetadataCache';
import type { ColumnDefinition } from '../metadata/columnMetadata';
import { ObjectName } from '../metadata/objectName';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import type { NativeConnection } from '../nativeCommand';
import { SQLiteEscaper } from './sqlEscaper';

/**
 * SQLite catalog. Introspection is soft: an unknown name resolves to undefined.
 * SQLite has no stored procedures or table functions.
 */
export class SQLiteMetadataCache extends DatabaseMetadataCache
{
	readonly notFoundPolicy: NotFoundPolicy = 'soft';

	constructor(connection: NativeConnection)
	{
		super(connection, new SQLiteEscaper());
	}

	protected async loadTableOrView(name: ObjectName): Promise<TableOrViewMetadata | undefined>
	{
		const schema = name.schema ?? 'main';
		const master = `${this.escaper.quoteIdentifier(schema)}.sqlite_master`;
		const objects = await this.query(
			`SELECT type, name, sql FROM ${master} WHERE type IN ('table', 'view') AND name = ? COLLATE NOCASE;`,
			catalogParameters(name.name)
		);
		if (objects.length === 0)
		{
			return undefined;
		}

		const actualName = cell.text(objects[0], 'name');
		const isTable = cell.text(objects[0], 'type') === 'table';
		const hasRowId = isTable && !/\bWITHOUT\s+ROWID\b/i.test(cell.text(objects[0], 'sql'));
		const rows = await this.query(
			'SELECT name, type, "notnull" AS not_null, pk, hidden FROM pragma_table_xinfo(?, ?);',
			catalogParameters(actualName, schema)
		);

		const keyCount = rows.filter(r => (cell.integer(r, 'pk') ?? 0) > 0).length;
		const columns: ColumnDefinition[] = rows
			// hidden 1 is a virtual table's hidden column
			.filter(r => cell.integer(r, 'hidden') !== 1)
			.map(r =>
			{
				const typeName = cell.text(r, 'type');
				const isPrimaryKey = (cell.integer(r, 'pk') ?? 0) > 0;
				const hidden = cell.integer(r, 'hidden') ?? 0;
				return {
					sqlName: cell.text(r, 'name'),
					typeName,
					isPrimaryKey,
					// a lone INTEGER primary key aliases the rowid
					isIdentity: isPrimaryKey && keyCount === 1 && typeName.toUpperCase() === 'INTEGER',
					isComputed: hidden === 2 || hidden === 3,
					isNullable: !cell.flag(r, 'not_null') && !isPrimaryKey
				};
			});

		return this.createTable(new ObjectName(name.schema, actualName), isTable, columns, hasRowId);
	}

	protected async listObjects(kind: 'table' | 'view'): Promise<ObjectName[]>
	{
		const rows = await this.query(
			'SELECT name FROM sqlite_master WHERE type = ? AND name NOT LIKE \'sqlite\\_%\' ESCAPE \'\\\';',
			catalogParameters(kind)
		);
		return rows.map(r => new ObjectName(undefined, cell.text(r, 'name')));
	}
}
