// Operation context
//
// Everything an operation needs while it runs inside a transaction. The
// registry builds one per call; operations never reach for globals.

import type {
  Address,
  ContentValidator,
  Page,
  PageEvent,
  PageId,
  Timestamp,
  Treasury,
} from '@quire/protocol';
import type { RepositoryContext } from '@quire/repositories';
import type { Logger } from '../logger.js';
import type { PayoutGateway } from '../treasury/payouts.js';
import type { EntropySource } from '../treasury/entropy.js';
import { PageNotFoundError, ValidationError } from '../errors.js';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * An event before the registry stamps it with an id and timestamp.
 */
export type PageEventDraft = DistributiveOmit<PageEvent, 'id' | 'timestamp'>;

export type OperationContext = {
  /** Transaction-scoped repositories */
  repos: RepositoryContext;

  /** The invoking principal */
  caller: Address;

  /** Time of the operation, shared by every record it writes */
  timestamp: Timestamp;

  content: ContentValidator;
  payouts: PayoutGateway;
  entropy: EntropySource;
  logger: Logger;

  /**
   * Queue an event. Queued events are published only if the operation commits.
   */
  emit(event: PageEventDraft): void;
};

export async function requirePage(repos: RepositoryContext, pageId: PageId): Promise<Page> {
  if (!Number.isInteger(pageId) || pageId < 1) {
    throw new PageNotFoundError(pageId);
  }
  const page = await repos.pages.get(pageId);
  if (!page) {
    throw new PageNotFoundError(pageId);
  }
  return page;
}

export async function requireTreasury(repos: RepositoryContext, pageId: PageId): Promise<Treasury> {
  const treasury = await repos.treasuries.get(pageId);
  if (!treasury) {
    throw new Error(`Page ${pageId} has no treasury`);
  }
  return treasury;
}

/**
 * Like requireTreasury, but holds the row until the operation commits.
 * Anything that pays out plans from this read.
 */
export async function lockTreasury(repos: RepositoryContext, pageId: PageId): Promise<Treasury> {
  const treasury = await repos.treasuries.getForUpdate(pageId);
  if (!treasury) {
    throw new Error(`Page ${pageId} has no treasury`);
  }
  return treasury;
}

export function requireCaller(caller: Address): Address {
  if (!caller || caller.trim() === '') {
    throw new ValidationError('EMPTY_FIELD', 'caller address is required', { field: 'caller' });
  }
  return caller;
}
