import { AsyncLocalStorage } from 'node:async_hooks';
import type { Database } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgPageRepository } from './page-repository.js';
import { PgUpdateRequestRepository } from './update-request-repository.js';
import { PgTreasuryRepository } from './treasury-repository.js';
import { PgParticipantRepository } from './participant-repository.js';
import { PgReactionRepository } from './reaction-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 * const page = await repos.pages.get(1);
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return {
    pages: new PgPageRepository(db),
    updateRequests: new PgUpdateRequestRepository(db),
    treasuries: new PgTreasuryRepository(db),
    participants: new PgParticipantRepository(db),
    reactions: new PgReactionRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * This extends the basic RepositoryContext with transaction support,
 * allowing multiple operations to be executed atomically.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * await repos.transaction(async (tx) => {
 *   await tx.treasuries.credit(pageId, fee);
 *   await tx.updateRequests.create({ pageId, proposed, proposer, fee });
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly pages: PgPageRepository;
  readonly updateRequests: PgUpdateRequestRepository;
  readonly treasuries: PgTreasuryRepository;
  readonly participants: PgParticipantRepository;
  readonly reactions: PgReactionRepository;

  /** Handle of the transaction running in the current async context */
  private readonly active = new AsyncLocalStorage<Database>();

  constructor(private db: Database) {
    this.pages = new PgPageRepository(db);
    this.updateRequests = new PgUpdateRequestRepository(db);
    this.treasuries = new PgTreasuryRepository(db);
    this.participants = new PgParticipantRepository(db);
    this.reactions = new PgReactionRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   *
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back
   * - Called again while a transaction is running in the same async context,
   *   it opens a savepoint on that transaction
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    const runner = this.active.getStore() ?? this.db;
    return runner.transaction(async (tx) => {
      // Drizzle's transaction handle exposes the same query API as the database
      const txDb = tx as unknown as Database;
      return this.active.run(txDb, () => fn(createPgRepositoryContext(txDb)));
    });
  }
}
