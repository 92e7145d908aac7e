import { describe, it, expect } from 'vitest';
import { createStubDataSource, CustomerType } from '../__tests__/fixtures';
import { UpdateOptions } from '../operation';
import { PostgreSQLDialect, toSetSeed } from './PostgreSQLDialect';

const dialect = new PostgreSQLDialect();
const { dataSource } = createStubDataSource(dialect);

describe('PostgreSQLDialect', () =>
{
	it('should number its placeholders', async () =>
	{
		const token = (await dataSource.from('Customer')).withFilter({ FullName: 'Ann', State: 'CA' }).toRows().prepare();

		expect(token.commandText).toBe('SELECT * FROM "Customer" WHERE "FullName" = $1 AND "State" = $2;');
		expect(token.lockMode).toBe('none');
	});

	it('should page with LIMIT and OFFSET', async () =>
	{
		const paged = (await dataSource.from('Customer')).withSorting('CustomerKey').withLimits({ skip: 2, take: 3 }).toRows().prepare();
		const skipped = (await dataSource.from('Customer')).withSorting('CustomerKey').withLimits({ skip: 2 }).toRows().prepare();

		expect(paged.commandText).toBe('SELECT * FROM "Customer" ORDER BY "CustomerKey" ASC LIMIT 3 OFFSET 2;');
		expect(skipped.commandText).toBe('SELECT * FROM "Customer" ORDER BY "CustomerKey" ASC OFFSET 2;');
	});

	it('should seed the session before a seeded sample', async () =>
	{
		const token = (await dataSource.from('Customer')).withLimits({ take: 3, strategy: 'randomSample', seed: 42 }).toRows().prepare();
		const [seed, read] = [...token.tokens()];

		expect(seed.commandText).toBe('SELECT setseed($1);');
		expect(seed.parameters.map(p => p.value)).toEqual([toSetSeed(42)]);
		expect(seed.executionMode).toBe('nonQuery');
		expect(seed.primary).toBe(false);
		expect(read.commandText).toBe('SELECT * FROM "Customer" ORDER BY random() LIMIT 3;');
		expect(read.parameters).toEqual([]);
		expect(read.primary).toBe(true);
	});

	it('should map a seed into the range setseed takes', () =>
	{
		expect(toSetSeed(0)).toBe(0);
		expect(toSetSeed(2147483647)).toBe(0);
		expect(toSetSeed(-2147483646)).toBeCloseTo(-1, 6);
	});

	it('should read back with RETURNING', async () =>
	{
		const insert = (await dataSource.insert('Customer', { FullName: 'Ann', State: 'CA' })).toObject(CustomerType).prepare();
		const remove = (await dataSource.delete('Customer', { CustomerKey: 9 })).toObject(CustomerType).prepare();

		expect(insert.commandText).toBe('INSERT INTO "Customer" ("FullName", "State") VALUES ($1, $2) RETURNING "CustomerKey", "FullName", "State";');
		expect(remove.commandText).toBe('DELETE FROM "Customer" WHERE "CustomerKey" = $1 RETURNING "CustomerKey", "FullName", "State";');
		expect(remove.expectedRowCount).toBe(1);
		expect(remove.next).toBeUndefined();
	});

	it('should number placeholders separately in a chained old-values read', async () =>
	{
		const token = (await dataSource.update('Customer', { CustomerKey: 3, State: 'NV' }, UpdateOptions.ReturnOldValues)).toObject(CustomerType).prepare();

		expect(token.chainText).toBe(
			'SELECT "CustomerKey", "FullName", "State" FROM "Customer" WHERE "CustomerKey" = $1;\n'
			+ 'UPDATE "Customer" SET "State" = $1 WHERE "CustomerKey" = $2;'
		);
	});

	it('should upsert on explicit match columns', async () =>
	{
		const token = (await dataSource.upsert('Customer', { FullName: 'Ann', State: 'CA' })).matchOn('FullName').asNonQuery().prepare();

		expect(token.commandText).toBe('INSERT INTO "Customer" ("FullName", "State") VALUES ($1, $2) ON CONFLICT ("FullName") DO UPDATE SET "State" = EXCLUDED."State";');
	});

	it('should upsert with DO NOTHING when only keys are supplied', async () =>
	{
		const token = (await dataSource.upsert('Customer', { CustomerKey: 4 })).asNonQuery().prepare();

		expect(token.commandText).toBe('INSERT INTO "Customer" ("CustomerKey") VALUES ($1) ON CONFLICT ("CustomerKey") DO NOTHING;');
	});

	it('should bind raw SQL into numbered placeholders', () =>
	{
		const token = dataSource.sql('SELECT * FROM "Customer" WHERE "State" = @state OR "FullName" = @State', { state: 'CA' }).toRows().prepare();

		expect(token.commandText).toBe('SELECT * FROM "Customer" WHERE "State" = $1 OR "FullName" = $2');
		expect(token.parameters.map(p => p.name)).toEqual(['state', 'state_2']);
	});

	it('should open transactions with BEGIN', () =>
	{
		expect(dialect.beginTransactionSql()).toBe('BEGIN;');
		expect(dialect.commitSql()).toBe('COMMIT;');
		expect(dialect.rollbackSql()).toBe('ROLLBACK;');
	});
});
