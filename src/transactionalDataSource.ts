import { DataSourceBase } from './dataSourceBase';
import type { DataSourceContext } from './dataSourceBase';
import { DisposedError } from './errors';
import type { NativeSession } from './nativeCommand';

type TransactionState = 'active' | 'committed' | 'rolledBack';

/**
 * One native session holding one open transaction. Every command built from it runs on that
 * session, under the lock it shares with its data source.
 * After commit or rollback any further call throws DisposedError.
 */
export class TransactionalDataSource extends DataSourceBase
{
	private state: TransactionState = 'active';

	constructor(context: DataSourceContext, private readonly session: NativeSession)
	{
		super(context);
	}

	/**
	 * Opens a session and starts a transaction on it under the write lock.
	 */
	static async begin(context: DataSourceContext): Promise<TransactionalDataSource>
	{
		const session = await context.connection.openSession({ transactional: true });
		const transaction = new TransactionalDataSource(context, session);
		try
		{
			await transaction.runControl(context.dialect.beginTransactionSql());
		}
		catch (error)
		{
			await session.release();
			throw error;
		}
		transaction.logger.debug('Transaction started', { dialect: context.dialect.name });
		return transaction;
	}

	get isActive(): boolean
	{
		return this.state === 'active';
	}

	async commit(): Promise<void>
	{
		await this.finish('committed', this.dialect.commitSql());
	}

	async rollback(): Promise<void>
	{
		await this.finish('rolledBack', this.dialect.rollbackSql());
	}

	/**
	 * Rolls back unless already committed or rolled back.
	 */
	async dispose(): Promise<void>
	{
		if (this.state === 'active')
		{
			await this.rollback();
		}
	}

	protected ensureUsable(): void
	{
		if (this.state !== 'active')
		{
			throw new DisposedError();
		}
	}

	protected openSession(): Promise<NativeSession>
	{
		return Promise.resolve(this.session);
	}

	protected closeSession(): Promise<void>
	{
		// the session lives until commit or rollback
		return Promise.resolve();
	}

	private async finish(state: Exclude<TransactionState, 'active'>, commandText: string): Promise<void>
	{
		this.ensureUsable();
		// later calls fail right away, even while this one waits for the lock
		this.state = state;
		try
		{
			await this.runControl(commandText);
			this.logger.info(state === 'committed' ? 'Transaction committed' : 'Transaction rolled back');
		}
		finally
		{
			await this.session.release();
		}
	}

	private async runControl(commandText: string): Promise<void>
	{
		const release = await this.acquireLock('write');
		try
		{
			await this.session.execute({ commandText, commandType: 'text', executionMode: 'nonQuery', parameters: [] });
		}
		finally
		{
			release();
		}
	}
}
