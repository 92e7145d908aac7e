import { AsyncLazyCache } from '../concurrency/lazyCache';
import type { SQLEscaper } from '../dialects/sqlEscaper';
import { MissingObjectError } from '../errors';
import { getLogger } from '../logger';
import type { ContextLogger } from '../logger';
import type { NativeConnection, SqlParameter } from '../nativeCommand';
import { readRecords } from '../rowCursor';
import { ColumnMetadata } from './columnMetadata';
import type { ColumnDefinition } from './columnMetadata';
import { ObjectName } from './objectName';
import { RoutineMetadata, TableOrViewMetadata } from './tableOrViewMetadata';
import type { ParameterMetadata } from './tableOrViewMetadata';

export type CatalogRow = Record<string, unknown>;

/**
 * What a dialect does when a name is not in the catalog.
 * - `soft`: resolve `undefined` and let the caller decide
 * - `strict`: reject with {@link MissingObjectError}
 */
export type NotFoundPolicy = 'soft' | 'strict';

const found = <T>(value: T | undefined): boolean => value !== undefined;

/**
 * Discovers and caches catalog objects for one data source.
 *
 * The first request for a name runs the discovery queries; concurrent requests for the
 * same name wait on that one discovery. Found objects are kept for the life of the cache.
 * Misses and failures are not kept, so a table created later can still be found.
 */
export abstract class DatabaseMetadataCache
{
	abstract readonly notFoundPolicy: NotFoundPolicy;

	protected readonly logger: ContextLogger;
	private readonly tables = new AsyncLazyCache<string, TableOrViewMetadata | undefined>(found);
	private readonly routines = new AsyncLazyCache<string, RoutineMetadata | undefined>(found);

	constructor(
		protected readonly connection: NativeConnection,
		protected readonly escaper: SQLEscaper,
		readonly defaultSchema?: string
	)
	{
		this.logger = getLogger(new.target.name);
	}

	parseObjectName(text: string): ObjectName
	{
		return ObjectName.parse(text, this.defaultSchema);
	}

	/**
	 * Gets the metadata for a table or view, discovering it on first use.
	 */
	getTableOrView(name: string | ObjectName): Promise<TableOrViewMetadata | undefined>
	{
		const objectName = typeof name === 'string' ? this.parseObjectName(name) : name;
		return this.tables.getOrAdd(objectName.key, () => this.discover(objectName, 'table or view', () => this.loadTableOrView(objectName)));
	}

	/**
	 * Returns already-discovered metadata without touching the database.
	 */
	tryGetCachedTableOrView(name: string | ObjectName): TableOrViewMetadata | undefined
	{
		const objectName = typeof name === 'string' ? this.parseObjectName(name) : name;
		return this.tables.peek(objectName.key);
	}

	/**
	 * Every table and view discovered so far.
	 */
	getCachedTables(): TableOrViewMetadata[]
	{
		return this.tables.values().filter((t): t is TableOrViewMetadata => t !== undefined);
	}

	getStoredProcedure(name: string | ObjectName): Promise<RoutineMetadata | undefined>
	{
		return this.getRoutine(name, 'procedure');
	}

	getTableFunction(name: string | ObjectName): Promise<RoutineMetadata | undefined>
	{
		return this.getRoutine(name, 'function');
	}

	/**
	 * Discovers every table.
	 */
	async preloadTables(): Promise<TableOrViewMetadata[]>
	{
		return this.preload('table');
	}

	/**
	 * Discovers every view.
	 */
	async preloadViews(): Promise<TableOrViewMetadata[]>
	{
		return this.preload('view');
	}

	protected abstract loadTableOrView(name: ObjectName): Promise<TableOrViewMetadata | undefined>;

	protected abstract listObjects(kind: 'table' | 'view'): Promise<ObjectName[]>;

	/**
	 * Dialects without procedures or table functions keep this default.
	 */
	protected loadRoutine(_name: ObjectName, _kind: 'procedure' | 'function'): Promise<RoutineMetadata | undefined>
	{
		return Promise.resolve(undefined);
	}

	/**
	 * Runs a catalog query on its own session and returns the rows as records.
	 */
	protected async query(commandText: string, parameters: readonly SqlParameter[]): Promise<CatalogRow[]>
	{
		const session = await this.connection.openSession();
		try
		{
			const result = await session.execute({ commandText, commandType: 'text', executionMode: 'query', parameters });
			if (!result.cursor) return [];
			try
			{
				return readRecords(result.cursor);
			}
			finally
			{
				result.cursor.close();
			}
		}
		finally
		{
			await session.release();
		}
	}

	protected createTable(name: ObjectName, isTable: boolean, columns: readonly ColumnDefinition[], hasRowId = isTable): TableOrViewMetadata
	{
		return new TableOrViewMetadata(
			name,
			this.escaper.quoteObjectName(name.schema, name.name),
			isTable,
			columns.map(c => this.createColumn(c)),
			hasRowId
		);
	}

	protected createRoutine(name: ObjectName, kind: 'procedure' | 'function', parameters: readonly ParameterMetadata[], columns: readonly ColumnDefinition[] = []): RoutineMetadata
	{
		return new RoutineMetadata(
			name,
			this.escaper.quoteObjectName(name.schema, name.name),
			kind,
			parameters,
			columns.map(c => this.createColumn(c))
		);
	}

	protected createColumn(definition: ColumnDefinition): ColumnMetadata
	{
		return new ColumnMetadata(definition, identifier => this.escaper.quoteIdentifier(identifier));
	}

	private getRoutine(name: string | ObjectName, kind: 'procedure' | 'function'): Promise<RoutineMetadata | undefined>
	{
		const objectName = typeof name === 'string' ? this.parseObjectName(name) : name;
		const label = kind === 'procedure' ? 'stored procedure' : 'table function';
		return this.routines.getOrAdd(`${kind}:${objectName.key}`, () => this.discover(objectName, label, () => this.loadRoutine(objectName, kind)));
	}

	private async discover<T>(name: ObjectName, kind: string, load: () => Promise<T | undefined>): Promise<T | undefined>
	{
		this.logger.debug('Discovering catalog object', { name: name.toString(), kind });
		const result = await load();
		if (result === undefined)
		{
			this.logger.debug('Catalog object not found', { name: name.toString(), kind, policy: this.notFoundPolicy });
			if (this.notFoundPolicy === 'strict')
			{
				throw new MissingObjectError(name.toString(), kind);
			}
		}
		return result;
	}

	private async preload(kind: 'table' | 'view'): Promise<TableOrViewMetadata[]>
	{
		const names = await this.listObjects(kind);
		this.logger.debug(`Preloading ${kind}s`, { count: names.length });
		const result: TableOrViewMetadata[] = [];
		for (const name of names)
		{
			const metadata = await this.getTableOrView(name);
			if (metadata) result.push(metadata);
		}
		return result;
	}
}

/**
 * Positional catalog parameters.
 */
export function catalogParameters(...values: unknown[]): SqlParameter[]
{
	return values.map((value, i) => ({ name: `p${i + 1}`, value }));
}

/**
 * Readers for catalog cells, which come back as strings, numbers, bigints or booleans depending on the driver.
 */
export const cell = {
	text(row: CatalogRow, key: string): string
	{
		const value = row[key];
		if (value === null || value === undefined) return '';
		if (Buffer.isBuffer(value)) return value.toString('utf8');
		return String(value);
	},

	optionalText(row: CatalogRow, key: string): string | undefined
	{
		const value = row[key];
		return value === null || value === undefined ? undefined : cell.text(row, key);
	},

	flag(row: CatalogRow, key: string): boolean
	{
		const value = row[key];
		if (typeof value === 'boolean') return value;
		if (typeof value === 'number') return value !== 0;
		if (typeof value === 'bigint') return value !== 0n;
		if (typeof value === 'string') return ['1', 'yes', 'true', 't', 'y'].includes(value.toLowerCase());
		return false;
	},

	integer(row: CatalogRow, key: string): number | undefined
	{
		const value = row[key];
		if (typeof value === 'number') return value;
		if (typeof value === 'bigint') return Number(value);
		if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
		return undefined;
	}
};
