import { LazyCache } from '../concurrency/lazyCache';
import { getLogger } from '../logger';
import type { ConstructorSignature, TypeDescriptor } from '../metadata/typeDescriptor';
import type { RowCursor } from '../rowCursor';
import { CompiledArgumentReader, CompiledRowBinder } from './rowBinder';

/**
 * Compiled binder plans keyed by (type descriptor, full statement text).
 * Owned by a data source and shared with its transactions. Entries are never evicted.
 */
export class CompiledBinderCache
{
	private readonly binders = new LazyCache<string, CompiledRowBinder>();
	private readonly argumentReaders = new LazyCache<string, CompiledArgumentReader>();
	private readonly logger = getLogger('CompiledBinderCache');

	get size(): number
	{
		return this.binders.size + this.argumentReaders.size;
	}

	/**
	 * The row binder for a statement and type, compiled from the cursor's shape on first use.
	 */
	getRowBinder(descriptor: TypeDescriptor<object>, statementText: string, cursor: RowCursor): CompiledRowBinder
	{
		return this.binders.getOrAdd(`${descriptor.id}\u0000${statementText}`, () =>
		{
			const binder = CompiledRowBinder.compile(descriptor, cursor);
			this.logger.debug('Compiled row binder', { type: descriptor.name, columns: cursor.fieldCount, steps: binder.stepCount });
			return binder;
		});
	}

	getArgumentReader(descriptor: TypeDescriptor<object>, signature: ConstructorSignature<object>, statementText: string, cursor: RowCursor): CompiledArgumentReader
	{
		return this.argumentReaders.getOrAdd(`${descriptor.id}\u0000${signature.name}\u0000${statementText}`, () =>
		{
			this.logger.debug('Compiled constructor arguments', { type: descriptor.name, constructor: signature.name });
			return CompiledArgumentReader.compile(descriptor, signature, cursor);
		});
	}
}
