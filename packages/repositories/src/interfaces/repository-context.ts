import type { PageRepository } from './page-repository.js';
import type { UpdateRequestRepository } from './update-request-repository.js';
import type { TreasuryRepository } from './treasury-repository.js';
import type { ParticipantRepository } from './participant-repository.js';
import type { ReactionRepository } from './reaction-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to any code that needs data access,
 * and you can swap implementations (Postgres, in-memory)
 * without changing the consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createTransactionalPgRepositoryContext(db);
 * const registry = createPageRegistry({ repos, payouts });
 * ```
 */
export interface RepositoryContext {
  readonly pages: PageRepository;
  readonly updateRequests: UpdateRequestRepository;
  readonly treasuries: TreasuryRepository;
  readonly participants: ParticipantRepository;
  readonly reactions: ReactionRepository;
}

/**
 * Factory type for creating a RepositoryContext.
 * Implementations can use this to provide their own initialization logic.
 */
export type RepositoryContextFactory<TConfig = unknown> = (
  config: TConfig
) => RepositoryContext | Promise<RepositoryContext>;

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (
  repos: RepositoryContext
) => Promise<T>;

/**
 * Extended context with transaction support.
 *
 * The runtime runs every mutating operation through transaction(); a
 * payout that fails inside it must discard every change the operation made.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a transaction.
   * All repository operations within the function will be atomic.
   *
   * @param fn Function to execute within the transaction
   * @returns The return value of the function
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
