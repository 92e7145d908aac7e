import type { CommandDataSource } from '../commandDataSource';
import type { ExecutionToken } from '../executionToken';
import { convertToBigInt, convertToBoolean, convertToDate, convertToNumber, convertToString } from '../materializers/columnReader';
import type { Materializer } from '../materializers/materializer';
import { NonQueryMaterializer } from '../materializers/nonQueryMaterializer';
import { CollectionMaterializer, ObjectMaterializer, ObjectOrUndefinedMaterializer } from '../materializers/objectMaterializer';
import type { ObjectMaterializerOptions, SingleObjectOptions } from '../materializers/objectMaterializer';
import { RowsMaterializer } from '../materializers/rowsMaterializer';
import { ListMaterializer, ScalarMaterializer, ScalarOrNullMaterializer } from '../materializers/scalarMaterializer';
import type { ListOptions, ValueConverter } from '../materializers/scalarMaterializer';
import type { ColumnMetadata } from '../metadata/columnMetadata';
import type { TableOrViewMetadata } from '../metadata/tableOrViewMetadata';
import type { TypeDescriptor } from '../metadata/typeDescriptor';
import { SqlBuilder } from '../sqlBuilder';

/**
 * Base of every command builder: picks a materializer, which then prepares and runs the command.
 *
 * @example
 * const customers = await (await ds.from('Customer')).withFilter({ State: 'CA' }).toCollection(Customer).execute();
 */
export abstract class DbCommandBuilder
{
	constructor(readonly dataSource: CommandDataSource) { }

	/**
	 * Builds the execution token for a materializer. Nothing runs.
	 */
	abstract prepare(materializer: Materializer<unknown>): ExecutionToken;

	asNonQuery(): NonQueryMaterializer
	{
		return new NonQueryMaterializer(this);
	}

	toRows(): RowsMaterializer
	{
		return new RowsMaterializer(this);
	}

	toCollection<T extends object>(descriptor: TypeDescriptor<T>, options?: ObjectMaterializerOptions): CollectionMaterializer<T>
	{
		return new CollectionMaterializer(this, descriptor, options);
	}

	toObject<T extends object>(descriptor: TypeDescriptor<T>, options?: SingleObjectOptions): ObjectMaterializer<T>
	{
		return new ObjectMaterializer(this, descriptor, options);
	}

	toObjectOrUndefined<T extends object>(descriptor: TypeDescriptor<T>, options?: SingleObjectOptions): ObjectOrUndefinedMaterializer<T>
	{
		return new ObjectOrUndefinedMaterializer(this, descriptor, options);
	}

	toScalar<T>(convert: ValueConverter<T>, column?: string): ScalarMaterializer<T>
	{
		return new ScalarMaterializer(this, convert, column);
	}

	toScalarOrNull<T>(convert: ValueConverter<T>, column?: string): ScalarOrNullMaterializer<T>
	{
		return new ScalarOrNullMaterializer(this, convert, column);
	}

	toNumber(column?: string): ScalarMaterializer<number>
	{
		return this.toScalar(convertToNumber, column);
	}

	toNumberOrNull(column?: string): ScalarOrNullMaterializer<number>
	{
		return this.toScalarOrNull(convertToNumber, column);
	}

	toBigInt(column?: string): ScalarMaterializer<bigint>
	{
		return this.toScalar(convertToBigInt, column);
	}

	toBoolean(column?: string): ScalarMaterializer<boolean>
	{
		return this.toScalar(convertToBoolean, column);
	}

	toDate(column?: string): ScalarMaterializer<Date>
	{
		return this.toScalar(convertToDate, column);
	}

	/** String value of one column of the first row. */
	toText(column?: string): ScalarMaterializer<string>
	{
		return this.toScalar(convertToString, column);
	}

	toTextOrNull(column?: string): ScalarOrNullMaterializer<string>
	{
		return this.toScalarOrNull(convertToString, column);
	}

	toList<T>(convert: ValueConverter<T>, options?: ListOptions): ListMaterializer<T>
	{
		return new ListMaterializer(this, convert, options);
	}

	toNumberList(options?: ListOptions): ListMaterializer<number>
	{
		return this.toList(convertToNumber, options);
	}

	toTextList(options?: ListOptions): ListMaterializer<string>
	{
		return this.toList(convertToString, options);
	}
}

/**
 * A command against one table or view.
 */
export abstract class TableCommandBuilder extends DbCommandBuilder
{
	constructor(dataSource: CommandDataSource, readonly metadata: TableOrViewMetadata)
	{
		super(dataSource);
	}

	tryGetColumn(name: string): ColumnMetadata | undefined
	{
		return this.metadata.tryGetColumn(name);
	}

	/**
	 * A fresh builder with the materializer's desired columns applied.
	 */
	protected createBuilder(materializer: Materializer<unknown>): SqlBuilder
	{
		const builder = new SqlBuilder(this.metadata, this.dataSource.types, this.dataSource.strictMode);
		builder.applyDesiredColumns(materializer.desiredColumns());
		return builder;
	}
}
