/**
 * Lock mode a command asks for when it runs inside a locking execution context.
 * - `read`: shared with other readers
 * - `write`: exclusive
 * - `none`: bypasses the lock (the transport serializes on its own)
 */
export type LockMode = 'read' | 'write' | 'none';

/**
 * Releases a held lock. Calling it more than once has no effect.
 */
export type LockRelease = () => void;

interface Waiter
{
	mode: 'read' | 'write';
	grant: () => void;
}

/**
 * Asynchronous reader/writer lock.
 *
 * Readers share the lock; a writer holds it alone. Waiting writers block new readers,
 * so a steady stream of reads cannot starve a write. Waiters are granted in arrival order.
 */
export class ReaderWriterLock
{
	private activeReaders = 0;
	private writerActive = false;
	private readonly queue: Waiter[] = [];

	get readers(): number
	{
		return this.activeReaders;
	}

	get isWriteHeld(): boolean
	{
		return this.writerActive;
	}

	get waiting(): number
	{
		return this.queue.length;
	}

	acquireRead(): Promise<LockRelease>
	{
		return this.acquire('read');
	}

	acquireWrite(): Promise<LockRelease>
	{
		return this.acquire('write');
	}

	/**
	 * Acquires the lock in the given mode; `none` resolves immediately with a no-op release.
	 */
	acquire(mode: LockMode): Promise<LockRelease>
	{
		if (mode === 'none')
		{
			return Promise.resolve(() => { });
		}

		if (this.canGrant(mode) && this.queue.length === 0)
		{
			this.take(mode);
			return Promise.resolve(this.releaseFor(mode));
		}

		return new Promise<LockRelease>(resolve =>
		{
			this.queue.push({
				mode,
				grant: () => resolve(this.releaseFor(mode))
			});
		});
	}

	private canGrant(mode: 'read' | 'write'): boolean
	{
		if (mode === 'read')
		{
			return !this.writerActive;
		}
		return !this.writerActive && this.activeReaders === 0;
	}

	private take(mode: 'read' | 'write'): void
	{
		if (mode === 'read')
		{
			this.activeReaders++;
		}
		else
		{
			this.writerActive = true;
		}
	}

	private releaseFor(mode: 'read' | 'write'): LockRelease
	{
		let released = false;
		return () =>
		{
			if (released) return;
			released = true;

			if (mode === 'read')
			{
				this.activeReaders--;
			}
			else
			{
				this.writerActive = false;
			}
			this.drain();
		};
	}

	private drain(): void
	{
		while (this.queue.length > 0)
		{
			const next = this.queue[0];
			if (!this.canGrant(next.mode))
			{
				return;
			}

			this.queue.shift();
			this.take(next.mode);
			next.grant();

			// A writer takes the lock alone; stop handing it out.
			if (next.mode === 'write')
			{
				return;
			}
		}
	}
}
