import { describe, it, expect } from 'vitest';
import { createStubDataSource, CustomerType } from '../__tests__/fixtures';
import { InvalidOperationError } from '../errors';
import { UpdateOptions } from '../operation';
import { MySQLDialect } from './MySQLDialect';

const { dataSource } = createStubDataSource(new MySQLDialect());

describe('MySQLDialect', () =>
{
	describe('SELECT', () =>
	{
		it('should use the largest LIMIT when skipping without a take', async () =>
		{
			const token = (await dataSource.from('Customer')).withSorting('CustomerKey').withLimits({ skip: 10 }).toRows().prepare();

			expect(token.commandText).toBe('SELECT * FROM `Customer` ORDER BY `CustomerKey` ASC LIMIT 18446744073709551615 OFFSET 10;');
		});

		it('should bind the seed of a seeded sample to RAND', async () =>
		{
			const token = (await dataSource.from('Customer')).withLimits({ take: 3, strategy: 'randomSample', seed: 42 }).toRows().prepare();
			const unseeded = (await dataSource.from('Customer')).withLimits({ take: 3, strategy: 'randomSample' }).toRows().prepare();

			expect(token.commandText).toBe('SELECT * FROM `Customer` ORDER BY RAND(?) LIMIT 3;');
			expect(token.parameters.map(p => p.value)).toEqual([42]);
			expect(unseeded.commandText).toBe('SELECT * FROM `Customer` ORDER BY RAND() LIMIT 3;');
		});
	});

	describe('read-back', () =>
	{
		it('should read an inserted row back by LAST_INSERT_ID()', async () =>
		{
			const token = (await dataSource.insert('Customer', { FullName: 'Ann', State: 'CA' })).toObject(CustomerType).prepare();
			const [write, read] = [...token.tokens()];

			expect(write.commandText).toBe('INSERT INTO `Customer` (`FullName`, `State`) VALUES (?, ?);');
			expect(write.executionMode).toBe('nonQuery');
			expect(write.primary).toBe(true);
			expect(read.commandText).toBe('SELECT `CustomerKey`, `FullName`, `State` FROM `Customer` WHERE `CustomerKey` = LAST_INSERT_ID();');
			expect(read.parameters).toEqual([]);
			expect(read.primary).toBe(false);
		});

		it('should send an insert alone when nothing is read back', async () =>
		{
			const token = (await dataSource.insert('Customer', { FullName: 'Ann' })).asNonQuery().prepare();

			expect(token.chainText).toBe('INSERT INTO `Customer` (`FullName`) VALUES (?);');
		});

		it('should read new values after an update', async () =>
		{
			const token = (await dataSource.update('Customer', { CustomerKey: 3, State: 'NV' })).toObject(CustomerType).prepare();

			expect(token.chainText).toBe(
				'UPDATE `Customer` SET `State` = ? WHERE `CustomerKey` = ?;\n'
				+ 'SELECT `CustomerKey`, `FullName`, `State` FROM `Customer` WHERE `CustomerKey` = ?;'
			);
			expect(token.expectedRowCount).toBe(1);
		});

		it('should read old values before an update', async () =>
		{
			const token = (await dataSource.update('Customer', { CustomerKey: 3, State: 'NV' }, UpdateOptions.ReturnOldValues)).toObject(CustomerType).prepare();
			const [read, write] = [...token.tokens()];

			expect(read.commandText).toBe('SELECT `CustomerKey`, `FullName`, `State` FROM `Customer` WHERE `CustomerKey` = ?;');
			expect(write.commandText).toBe('UPDATE `Customer` SET `State` = ? WHERE `CustomerKey` = ?;');
			expect(write.expectedRowCount).toBe(1);
		});

		it('should read the rows a filtered delete removes before deleting them', async () =>
		{
			const token = (await dataSource.deleteWithFilter('Customer')).withFilter({ State: 'CA' }).toCollection(CustomerType).prepare();

			expect(token.chainText).toBe(
				'SELECT `CustomerKey`, `FullName`, `State` FROM `Customer` WHERE `State` = ?;\n'
				+ 'DELETE FROM `Customer` WHERE `State` = ?;'
			);
		});
	});

	describe('update-set', () =>
	{
		it('should read old values before an update-set that changes its own filter column', async () =>
		{
			const command = await dataSource.updateSet('Customer', { values: { State: 'NV' } }, UpdateOptions.ReturnOldValues);
			const token = command.withFilter({ State: 'CA' }).toCollection(CustomerType).prepare();
			const [read, write] = [...token.tokens()];

			expect(read.commandText).toBe('SELECT `CustomerKey`, `FullName`, `State` FROM `Customer` WHERE `State` = ?;');
			expect(read.parameters.map(p => p.value)).toEqual(['CA']);
			expect(write.commandText).toBe('UPDATE `Customer` SET `State` = ? WHERE `State` = ?;');
			expect(write.parameters.map(p => p.value)).toEqual(['NV', 'CA']);
		});

		it('should reject reading new values after an update-set', async () =>
		{
			const command = await dataSource.updateSet('Customer', { values: { State: 'NV' } });

			expect(() => command.withFilter({ State: 'CA' }).toCollection(CustomerType).prepare()).toThrow(InvalidOperationError);
		});

		it('should send an update-set alone when nothing is read back', async () =>
		{
			const command = await dataSource.updateSet('Customer', { values: { State: 'NV' } });
			const token = command.withFilter({ State: 'CA' }).asNonQuery().prepare();

			expect(token.chainText).toBe('UPDATE `Customer` SET `State` = ? WHERE `State` = ?;');
			expect(token.parameters.map(p => p.value)).toEqual(['NV', 'CA']);
		});
	});

	describe('upsert', () =>
	{
		it('should write ON DUPLICATE KEY UPDATE without a row count check', async () =>
		{
			const token = (await dataSource.upsert('Customer', { CustomerKey: 7, FullName: 'Ann', State: 'CA' })).toObject(CustomerType).prepare();
			const [write, read] = [...token.tokens()];

			expect(write.commandText).toBe(
				'INSERT INTO `Customer` (`CustomerKey`, `FullName`, `State`) VALUES (?, ?, ?) '
				+ 'ON DUPLICATE KEY UPDATE `FullName` = VALUES(`FullName`), `State` = VALUES(`State`);'
			);
			expect(write.expectedRowCount).toBeUndefined();
			expect(read.commandText).toBe('SELECT `CustomerKey`, `FullName`, `State` FROM `Customer` WHERE `CustomerKey` = ?;');
			expect(read.parameters.map(p => p.value)).toEqual([7]);
		});

		it('should read an upserted row back by its match columns', async () =>
		{
			const token = (await dataSource.upsert('Customer', { FullName: 'Ann', State: 'CA' })).matchOn('FullName').toObject(CustomerType).prepare();
			const [, read] = [...token.tokens()];

			expect(read.commandText).toBe('SELECT `CustomerKey`, `FullName`, `State` FROM `Customer` WHERE `FullName` = ?;');
		});
	});

	it('should insert a row of defaults with empty lists', async () =>
	{
		const token = (await dataSource.insert('Customer', { CustomerKey: null, CreatedDate: 'ignored' })).asNonQuery().prepare();

		expect(token.commandText).toBe('INSERT INTO `Customer` () VALUES ();');
	});
});
