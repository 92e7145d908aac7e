import { describe, it, expect, beforeAll } from 'vitest';
import { createStubDataSource, CustomerType, StubConnection } from './__tests__/fixtures';
import { SQLiteDialect } from './dialects/SQLiteDialect';
import { DisposedError, InvalidOperationError, MissingDataError, MissingObjectError, OperationCanceledError, RowCountMismatchError } from './errors';
import { globalLogger, LogLevel } from './logger';
import type { NativeCommand, NativeResult } from './nativeCommand';
import { ArrayRowCursor } from './rowCursor';

const CUSTOMERS = [
	{ CustomerKey: 1, FullName: 'Ann', State: 'CA' },
	{ CustomerKey: 2, FullName: 'Bob', State: null }
];

/**
 * Rows for SELECTs, one affected row for everything else.
 */
function answer(command: NativeCommand): NativeResult
{
	if (command.commandText.startsWith('SELECT COUNT(*)'))
	{
		return { cursor: ArrayRowCursor.fromRecords([{ count: 3 }]) };
	}
	if (command.commandText.startsWith('SELECT'))
	{
		return { cursor: ArrayRowCursor.fromRecords(CUSTOMERS) };
	}
	return { affectedRows: 1 };
}

function setup(respond: (command: NativeCommand, signal?: AbortSignal) => NativeResult | Promise<NativeResult> = answer, timeout?: number)
{
	return createStubDataSource(new SQLiteDialect(), new StubConnection(respond), { defaultCommandTimeout: timeout });
}

describe('DataSource', () =>
{
	beforeAll(() =>
	{
		globalLogger.setLevel(LogLevel.OFF);
	});

	describe('execution', () =>
	{
		it('should materialize rows into typed objects on both tiers', async () =>
		{
			const { dataSource, connection } = setup();
			const command = await dataSource.from('Customer');

			const interpreted = await command.toCollection(CustomerType).execute();
			const compiled = await command.toCollection(CustomerType).compile().execute();

			expect(interpreted).toEqual(CUSTOMERS);
			expect(compiled).toEqual(interpreted);
			expect(dataSource.binders.size).toBe(1);
			expect(connection.sessionsReleased).toBe(connection.sessionsOpened);
		});

		it('should count rows', async () =>
		{
			const { dataSource } = setup();

			await expect((await dataSource.from('Customer')).asCount().execute()).resolves.toBe(3);
		});

		it('should return the affected row count of a non-query', async () =>
		{
			const { dataSource } = setup();

			await expect((await dataSource.insert('Customer', { FullName: 'Ann' })).asNonQuery().execute()).resolves.toBe(1);
		});

		it('should fail a single-row read that returns nothing', async () =>
		{
			const { dataSource } = setup(() => ({ cursor: ArrayRowCursor.fromRecords([], ['CustomerKey', 'FullName', 'State']) }));

			await expect((await dataSource.insert('Customer', { FullName: 'Ann' })).toObject(CustomerType).execute()).rejects.toBeInstanceOf(MissingDataError);
			await expect((await dataSource.insert('Customer', { FullName: 'Ann' })).toObjectOrUndefined(CustomerType).execute()).resolves.toBeUndefined();
		});

		it('should reject a wrong affected row count and release the lock', async () =>
		{
			const { dataSource, connection } = setup(command => (command.commandText.startsWith('UPDATE') ? { affectedRows: 0 } : answer(command)));

			const update = (await dataSource.update('Customer', { CustomerKey: 9, FullName: 'Ann' })).asNonQuery().execute();

			await expect(update).rejects.toThrow(RowCountMismatchError);
			await expect((await dataSource.insert('Customer', { FullName: 'Ann' })).asNonQuery().execute()).resolves.toBe(1);
			expect(connection.sessionsReleased).toBe(2);
		});

		it('should reject an update-set without a filter before anything runs', async () =>
		{
			const { dataSource, connection } = setup();
			const command = await dataSource.updateSet('Customer', { values: { State: 'WA' } });

			await expect(command.asNonQuery().execute()).rejects.toBeInstanceOf(InvalidOperationError);
			expect(connection.commands).toHaveLength(0);
		});

		it('should reject an unknown table', async () =>
		{
			const { dataSource } = setup();

			await expect(dataSource.from('Missing')).rejects.toThrow(new MissingObjectError('Missing').message);
		});

		it('should pass the default timeout unless the call gives one', async () =>
		{
			const { dataSource, connection } = setup(answer, 1500);
			const command = (await dataSource.insert('Customer', { FullName: 'Ann' })).asNonQuery();

			await command.execute();
			await command.execute({ timeout: 200 });

			expect(connection.commands.map(c => c.timeout)).toEqual([1500, 200]);
		});
	});

	describe('locking', () =>
	{
		it('should run writes one at a time on SQLite', async () =>
		{
			let open: () => void = () => { };
			const gate = new Promise<void>(resolve =>
			{
				open = resolve;
			});
			let calls = 0;
			const { dataSource, connection } = setup(async command =>
			{
				if (++calls === 1) await gate;
				return answer(command);
			});
			const insert = (await dataSource.insert('Customer', { FullName: 'Ann' })).asNonQuery();

			const first = insert.execute();
			const second = insert.execute();
			await new Promise(resolve => setTimeout(resolve, 10));

			expect(connection.commands).toHaveLength(1);
			open();
			await expect(Promise.all([first, second])).resolves.toEqual([1, 1]);
			expect(connection.commands).toHaveLength(2);
		});
	});

	describe('cancellation', () =>
	{
		it('should not start when the signal is already aborted', async () =>
		{
			const { dataSource, connection } = setup();
			const controller = new AbortController();
			controller.abort();

			await expect((await dataSource.from('Customer')).toRows().execute({ signal: controller.signal })).rejects.toBeInstanceOf(OperationCanceledError);
			expect(connection.commands).toHaveLength(0);
		});

		it('should turn an interrupted command into OperationCanceledError and release the lock', async () =>
		{
			let started: () => void = () => { };
			const running = new Promise<void>(resolve =>
			{
				started = resolve;
			});
			const { dataSource, connection } = setup((command, signal) =>
			{
				if (!signal) return answer(command);
				started();
				return new Promise<NativeResult>((_resolve, reject) =>
				{
					signal.addEventListener('abort', () => reject(new Error('interrupted')), { once: true });
				});
			});
			const controller = new AbortController();
			const insert = (await dataSource.insert('Customer', { FullName: 'Ann' })).asNonQuery();

			const pending = insert.execute({ signal: controller.signal });
			await running;
			controller.abort();

			const error: unknown = await pending.catch((e: unknown) => e);
			expect(error).toBeInstanceOf(OperationCanceledError);
			expect(error instanceof Error ? error.cause : undefined).toEqual(new Error('interrupted'));
			await expect(insert.execute()).resolves.toBe(1);
			expect(connection.sessionsReleased).toBe(connection.sessionsOpened);
		});
	});

	describe('transactions', () =>
	{
		it('should run every command on one session between BEGIN and COMMIT', async () =>
		{
			const { dataSource, connection } = setup();

			const transaction = await dataSource.beginTransaction();
			await (await transaction.insert('Customer', { FullName: 'Ann' })).asNonQuery().execute();
			await (await transaction.from('Customer')).toRows().execute();
			await transaction.commit();

			expect(connection.commandTexts).toEqual([
				'BEGIN TRANSACTION;',
				'INSERT INTO "Customer" ("FullName") VALUES (?);',
				'SELECT * FROM "Customer";',
				'COMMIT;'
			]);
			expect(connection.sessionsOpened).toBe(1);
			expect(connection.sessionsReleased).toBe(1);
			expect(transaction.isActive).toBe(false);
		});

		it('should refuse every call after commit', async () =>
		{
			const { dataSource } = setup();
			const transaction = await dataSource.beginTransaction();
			const command = (await transaction.from('Customer')).toRows();
			await transaction.commit();

			await expect(transaction.from('Customer')).rejects.toBeInstanceOf(DisposedError);
			await expect(command.execute()).rejects.toThrow('Transaction is disposed.');
			await expect(transaction.commit()).rejects.toBeInstanceOf(DisposedError);
			expect(() => transaction.sql('SELECT 1;')).toThrow(DisposedError);
		});

		it('should roll back on dispose and only once', async () =>
		{
			const { dataSource, connection } = setup();
			const transaction = await dataSource.beginTransaction();

			await transaction.dispose();
			await transaction.dispose();

			expect(connection.commandTexts).toEqual(['BEGIN TRANSACTION;', 'ROLLBACK;']);
			expect(connection.sessionsReleased).toBe(1);
		});
	});
});
