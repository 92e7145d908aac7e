import { describe, it, expect } from 'vitest';
import { ReaderWriterLock } from './readerWriterLock';

const tick = (): Promise<void> => new Promise(resolve => setTimeout(resolve, 0));

describe('ReaderWriterLock', () =>
{
	it('should let readers share the lock', async () =>
	{
		const lock = new ReaderWriterLock();

		const first = await lock.acquireRead();
		const second = await lock.acquireRead();

		expect(lock.readers).toBe(2);
		first();
		second();
		expect(lock.readers).toBe(0);
	});

	it('should make a writer wait for active readers', async () =>
	{
		const lock = new ReaderWriterLock();
		const read = await lock.acquireRead();

		let writing = false;
		const pending = lock.acquireWrite().then(release =>
		{
			writing = true;
			return release;
		});

		await tick();
		expect(writing).toBe(false);
		expect(lock.waiting).toBe(1);

		read();
		const release = await pending;
		expect(writing).toBe(true);
		expect(lock.isWriteHeld).toBe(true);
		release();
		expect(lock.isWriteHeld).toBe(false);
	});

	it('should block new readers while a writer waits', async () =>
	{
		const lock = new ReaderWriterLock();
		const order: string[] = [];
		const firstRead = await lock.acquireRead();

		const write = lock.acquireWrite().then(release =>
		{
			order.push('write');
			release();
		});
		const lateRead = lock.acquireRead().then(release =>
		{
			order.push('read');
			release();
		});

		await tick();
		expect(order).toEqual([]);

		firstRead();
		await Promise.all([write, lateRead]);
		expect(order).toEqual(['write', 'read']);
	});

	it('should ignore a second call to the same release', async () =>
	{
		const lock = new ReaderWriterLock();
		const first = await lock.acquireRead();
		const second = await lock.acquireRead();

		first();
		first();

		expect(lock.readers).toBe(1);
		second();
	});

	it('should bypass the lock in none mode', async () =>
	{
		const lock = new ReaderWriterLock();
		const write = await lock.acquireWrite();

		const release = await lock.acquire('none');

		expect(lock.isWriteHeld).toBe(true);
		release();
		write();
	});
});
