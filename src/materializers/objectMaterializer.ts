import type { CommandDataSource } from '../commandDataSource';
import { MappingError, MissingDataError, UnexpectedDataError } from '../errors';
import { getLogger } from '../logger';
import { isChangeTracking } from '../metadata/typeDescriptor';
import type { ConstructorSignature, TypeDescriptor } from '../metadata/typeDescriptor';
import type { RowCursor } from '../rowCursor';
import { Materializer } from './materializer';
import type { DesiredColumns, ExecuteOptions, PreparableCommand } from './materializer';
import { bindRow, readConstructorArguments } from './rowBinder';

/**
 * How result objects are created.
 * - `default`: the descriptor's factory, then properties are set column by column
 * - `named`: a declared construction signature
 * - `infer`: the only declared construction signature
 */
export type ConstructionMode =
	| { readonly kind: 'default' }
	| { readonly kind: 'named'; readonly name: string }
	| { readonly kind: 'infer' };

export interface ObjectMaterializerOptions
{
	/** Use the compiled binder tier (default: false). */
	compiled?: boolean;
	construction?: ConstructionMode;
}

export interface SingleObjectOptions extends ObjectMaterializerOptions
{
	/** More than one row is an UnexpectedDataError instead of being ignored. */
	rejectExtraRows?: boolean;
}

const logger = getLogger('ObjectMaterializer');

/**
 * Turns cursor rows into objects of one described type.
 */
class ObjectReader<T extends object>
{
	constructor(
		private readonly descriptor: TypeDescriptor<T>,
		private readonly options: ObjectMaterializerOptions
	) { }

	signature(): ConstructorSignature<T> | undefined
	{
		const construction = this.options.construction ?? { kind: 'default' };
		switch (construction.kind)
		{
			case 'default':
				return undefined;
			case 'named':
			{
				const signature = this.descriptor.getConstructor(construction.name);
				if (!signature)
				{
					throw new MappingError(`The type ${this.descriptor.name} does not declare a constructor named ${construction.name}`);
				}
				return signature;
			}
			case 'infer':
				if (this.descriptor.constructors.length !== 1)
				{
					throw new MappingError(`Cannot infer a constructor for ${this.descriptor.name}: it declares ${this.descriptor.constructors.length} non-default constructors`);
				}
				return this.descriptor.constructors[0];
		}
	}

	desiredColumns(): DesiredColumns
	{
		return this.signature()?.parameters ?? this.descriptor.columnsFor;
	}

	/**
	 * Reads up to `limit` rows.
	 */
	read(dataSource: CommandDataSource, cursor: RowCursor | undefined, statementText: string, limit = Infinity): T[]
	{
		const result: T[] = [];
		if (!cursor)
		{
			return result;
		}
		// an empty result has no shape to compile against
		const compile = this.options.compiled === true && cursor.fieldCount > 0;

		const signature = this.signature();
		if (signature)
		{
			const compiled = compile ? dataSource.binders.getArgumentReader(this.descriptor, signature, statementText, cursor) : undefined;
			const reader = compiled?.matches(cursor) ? compiled : undefined;
			if (compiled && !reader) logger.debug('Result shape changed; reading constructor arguments interpreted', { type: this.descriptor.name });

			while (result.length < limit && cursor.read())
			{
				const item = signature.create(reader ? reader.read(cursor) : readConstructorArguments(this.descriptor, signature, cursor));
				if (isChangeTracking(item)) item.acceptChanges();
				result.push(item);
			}
			return result;
		}

		const compiled = compile ? dataSource.binders.getRowBinder(this.descriptor, statementText, cursor) : undefined;
		const binder = compiled?.matches(cursor) ? compiled : undefined;
		if (compiled && !binder) logger.debug('Result shape changed; binding interpreted', { type: this.descriptor.name });

		while (result.length < limit && cursor.read())
		{
			const item = this.descriptor.create();
			if (binder)
			{
				binder.bind(item, cursor);
			}
			else
			{
				bindRow(this.descriptor, item, cursor);
			}
			result.push(item);
		}
		return result;
	}
}

/**
 * Every row as an object of the described type.
 */
export class CollectionMaterializer<T extends object> extends Materializer<T[]>
{
	private readonly reader: ObjectReader<T>;

	constructor(command: PreparableCommand, private readonly descriptor: TypeDescriptor<T>, private readonly options: ObjectMaterializerOptions = {})
	{
		super(command);
		this.reader = new ObjectReader(descriptor, options);
	}

	/**
	 * Same materializer on the compiled binder tier.
	 */
	compile(): CollectionMaterializer<T>
	{
		return new CollectionMaterializer(this.command, this.descriptor, { ...this.options, compiled: true });
	}

	withConstructor(name: string): CollectionMaterializer<T>
	{
		return new CollectionMaterializer(this.command, this.descriptor, { ...this.options, construction: { kind: 'named', name } });
	}

	inferConstructor(): CollectionMaterializer<T>
	{
		return new CollectionMaterializer(this.command, this.descriptor, { ...this.options, construction: { kind: 'infer' } });
	}

	desiredColumns(): DesiredColumns
	{
		return this.reader.desiredColumns();
	}

	execute(options?: ExecuteOptions): Promise<T[]>
	{
		return this.run((result, token) => this.reader.read(this.command.dataSource, result.cursor, token.chainText), options);
	}
}

/**
 * Exactly one row as an object; no row is a MissingDataError.
 */
export class ObjectMaterializer<T extends object> extends Materializer<T>
{
	private readonly reader: ObjectReader<T>;

	constructor(command: PreparableCommand, private readonly descriptor: TypeDescriptor<T>, private readonly options: SingleObjectOptions = {})
	{
		super(command);
		this.reader = new ObjectReader(descriptor, options);
	}

	desiredColumns(): DesiredColumns
	{
		return this.reader.desiredColumns();
	}

	execute(options?: ExecuteOptions): Promise<T>
	{
		return this.run((result, token) =>
		{
			const rows = readSingle(this.reader, this.command.dataSource, result.cursor, token, this.options);
			if (rows.length === 0)
			{
				throw new MissingDataError(`${token.operationName} did not return a row for ${this.descriptor.name}`);
			}
			return rows[0];
		}, options);
	}
}

/**
 * At most one row as an object; no row resolves undefined.
 */
export class ObjectOrUndefinedMaterializer<T extends object> extends Materializer<T | undefined>
{
	private readonly reader: ObjectReader<T>;

	constructor(command: PreparableCommand, descriptor: TypeDescriptor<T>, private readonly options: SingleObjectOptions = {})
	{
		super(command);
		this.reader = new ObjectReader(descriptor, options);
	}

	desiredColumns(): DesiredColumns
	{
		return this.reader.desiredColumns();
	}

	execute(options?: ExecuteOptions): Promise<T | undefined>
	{
		return this.run((result, token) => readSingle(this.reader, this.command.dataSource, result.cursor, token, this.options)[0], options);
	}
}

function readSingle<T extends object>(
	reader: ObjectReader<T>,
	dataSource: CommandDataSource,
	cursor: RowCursor | undefined,
	token: { readonly operationName: string; readonly chainText: string },
	options: SingleObjectOptions
): T[]
{
	// a second row is only read to detect extras
	const rows = reader.read(dataSource, cursor, token.chainText, 2);
	if (rows.length > 1 && options.rejectExtraRows)
	{
		throw new UnexpectedDataError(`${token.operationName} returned more than one row`);
	}
	return rows;
}
