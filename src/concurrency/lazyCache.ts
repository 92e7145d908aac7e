/**
 * Append-only caches that compute each key at most once.
 *
 * Both caches keep entries for their own lifetime; nothing is evicted.
 * They are owned by a data source (or by a metadata object), never module-global.
 */

/**
 * Synchronous single-computation cache.
 *
 * JavaScript runs one computation at a time, so "concurrent first access" can only
 * happen through re-entrancy: a factory asking for its own key while it runs.
 * That would observe a partial result, so it is rejected.
 */
export class LazyCache<K, V>
{
	private readonly values = new Map<K, { readonly value: V }>();
	private readonly pending = new Set<K>();

	get size(): number
	{
		return this.values.size;
	}

	has(key: K): boolean
	{
		return this.values.has(key);
	}

	/**
	 * Returns the cached value for the key, running the factory on first access only.
	 * A factory that throws leaves no entry behind.
	 */
	getOrAdd(key: K, factory: (key: K) => V): V
	{
		const cached = this.values.get(key);
		if (cached)
		{
			return cached.value;
		}

		if (this.pending.has(key))
		{
			throw new Error('LazyCache: re-entrant computation of a key that is still being computed');
		}

		this.pending.add(key);
		try
		{
			const value = factory(key);
			this.values.set(key, { value });
			return value;
		}
		finally
		{
			this.pending.delete(key);
		}
	}
}

/**
 * Asynchronous single-computation cache.
 *
 * The first caller for a key starts the computation; every caller arriving while it is
 * in flight receives the same promise. Settled values are kept, except those the
 * `keep` predicate rejects and failed computations, which are dropped once settled
 * so a later call can try again.
 */
export class AsyncLazyCache<K, V>
{
	private readonly entries = new Map<K, Promise<V>>();
	private readonly settled = new Map<K, V>();

	constructor(private readonly keep: (value: V) => boolean = () => true) { }

	/**
	 * Returns an already-settled value without starting a computation.
	 */
	peek(key: K): V | undefined
	{
		return this.settled.get(key);
	}

	values(): V[]
	{
		return [...this.settled.values()];
	}

	getOrAdd(key: K, factory: (key: K) => Promise<V>): Promise<V>
	{
		const existing = this.entries.get(key);
		if (existing)
		{
			return existing;
		}

		const promise = factory(key).then(
			value =>
			{
				if (this.keep(value))
				{
					this.settled.set(key, value);
				}
				else
				{
					this.entries.delete(key);
				}
				return value;
			},
			(error: unknown) =>
			{
				this.entries.delete(key);
				throw error;
			}
		);

		this.entries.set(key, promise);
		return promise;
	}
}
