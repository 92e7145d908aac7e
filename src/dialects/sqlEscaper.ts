/**
 * Abstract class for SQL identifier escaping.
 * Different databases use different quote characters; an embedded quote character is doubled.
 */
export abstract class SQLEscaper
{
	protected abstract readonly open: string;
	protected abstract readonly close: string;

	/**
	 * Quote a single identifier part, e.g. a column name.
	 * @param identifier Raw identifier, which may contain dots or spaces
	 */
	quoteIdentifier(identifier: string): string
	{
		return this.open + identifier.split(this.close).join(this.close + this.close) + this.close;
	}

	/**
	 * Escape a dotted identifier (schema.table or table.column), quoting each part.
	 * @param identifier Identifier (e.g., "sales.orders" or "orders")
	 */
	escapeIdentifier(identifier: string): string
	{
		return identifier.split('.').map(part => this.quoteIdentifier(part)).join('.');
	}

	/**
	 * Quote an object name made of an optional schema and a name.
	 */
	quoteObjectName(schema: string | undefined, name: string): string
	{
		return schema === undefined ? this.quoteIdentifier(name) : `${this.quoteIdentifier(schema)}.${this.quoteIdentifier(name)}`;
	}
}

/**
 * MySQL identifier escaper.
 * Uses backticks (`) to escape identifiers
 */
export class MySQLEscaper extends SQLEscaper
{
	protected readonly open = '`';
	protected readonly close = '`';
}

/**
 * PostgreSQL identifier escaper.
 * Uses double quotes (") to escape identifiers
 */
export class PostgreSQLEscaper extends SQLEscaper
{
	protected readonly open = '"';
	protected readonly close = '"';
}

/**
 * SQLite identifier escaper.
 * Uses double quotes (") to escape identifiers
 */
export class SQLiteEscaper extends SQLEscaper
{
	protected readonly open = '"';
	protected readonly close = '"';
}

/**
 * SQL Server identifier escaper.
 * Uses brackets ([ ]) to escape identifiers
 */
export class SqlServerEscaper extends SQLEscaper
{
	protected readonly open = '[';
	protected readonly close = ']';
}
