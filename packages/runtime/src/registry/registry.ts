// PageRegistry - the operation boundary
//
// Every mutation goes through the registry:
// 1. Wraps the operation in a repository transaction
// 2. Buffers the events it emits and publishes them after commit
// 3. Folds committed events into the digest chain
// 4. Logs the outcome

import { AsyncLocalStorage } from 'node:async_hooks';
import type {
  Address,
  Amount,
  ContentValidator,
  Page,
  PageEvent,
  PageEventHandler,
  PageId,
  PageInfo,
  ReactionState,
  RequestId,
  Treasury,
  UpdateRequest,
} from '@quire/protocol';
import { createContentValidator, DEFAULT_CONTENT_FORMAT } from '@quire/protocol';
import type {
  PageFilter,
  RepositoryContext,
  TransactionalRepositoryContext,
  UpdateRequestFilter,
} from '@quire/repositories';
import { isRuntimeError, RequestNotFoundError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { listParticipants } from '../participants/index.js';
import { react, type ReactInput, type ReactResult } from '../reactions/index.js';
import {
  approveUpdate,
  submitUpdate,
  type ApproveUpdateInput,
  type ApproveUpdateResult,
  type SubmitUpdateInput,
  type SubmitUpdateResult,
} from '../requests/index.js';
import {
  distributeTreasury,
  withdrawFees,
  type DistributeTreasuryInput,
  type DistributeTreasuryResult,
  type WithdrawFeesInput,
  type WithdrawFeesResult,
} from '../treasury/treasury.js';
import { DigestChain, type EntropySource } from '../treasury/entropy.js';
import type { PayoutGateway } from '../treasury/payouts.js';
import {
  requireCaller,
  requirePage,
  requireTreasury,
  type OperationContext,
  type PageEventDraft,
} from './context.js';
import {
  changeOwnership,
  createPage,
  type ChangeOwnershipInput,
  type CreatePageInput,
} from './pages.js';

export type PageRegistryConfig = {
  /** Called once per event after the emitting operation commits */
  onEvent?: PageEventHandler;
};

/**
 * Options for creating a PageRegistry.
 */
export type PageRegistryOptions = {
  repos: TransactionalRepositoryContext;
  payouts: PayoutGateway;

  /** Defaults to the registry's own digest chain */
  entropy?: EntropySource;

  /** Defaults to DEFAULT_CONTENT_FORMAT */
  contentValidator?: ContentValidator;

  logger?: Logger;
  clock?: () => Date;
  config?: PageRegistryConfig;
};

/**
 * PageRegistry
 *
 * Owns the page arena and runs each public operation as one unit: either
 * every change it makes commits, or none does.
 *
 * @example
 * ```ts
 * const registry = createPageRegistry({
 *   repos: createInMemoryRepositoryContext(),
 *   payouts: createInMemoryPayoutGateway(),
 *   config: { onEvent: (event) => bus.publish(event) },
 * });
 *
 * const page = await registry.createPage('0xowner', {
 *   name: 'Home',
 *   thumbnail: 'https://example.com/home.png',
 *   content: '<html></html>',
 *   ownership: { kind: 'single', owners: ['0xowner'], threshold: 1 },
 *   updateFee: 1000n,
 * });
 * ```
 */
export class PageRegistry {
  private readonly repos: TransactionalRepositoryContext;
  private readonly payouts: PayoutGateway;
  private readonly chain: DigestChain;
  private readonly entropy: EntropySource;
  private readonly content: ContentValidator;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly onEvent: PageEventHandler;

  /** Event buffer of the outermost running operation */
  private readonly scope = new AsyncLocalStorage<PageEvent[]>();
  private nextEventId = 0;

  constructor(options: PageRegistryOptions) {
    this.repos = options.repos;
    this.payouts = options.payouts;
    this.clock = options.clock ?? (() => new Date());
    this.chain = new DigestChain({ clock: this.clock });
    this.entropy = options.entropy ?? this.chain;
    this.content = options.contentValidator ?? createContentValidator(DEFAULT_CONTENT_FORMAT);
    this.logger = options.logger ?? silentLogger;
    this.onEvent = options.config?.onEvent ?? (() => {});
  }

  // --- Mutations ---

  createPage(caller: Address, input: CreatePageInput): Promise<Page> {
    return this.run('createPage', caller, (ctx) => createPage(ctx, input));
  }

  requestUpdate(caller: Address, input: SubmitUpdateInput): Promise<SubmitUpdateResult> {
    return this.run('requestUpdate', caller, (ctx) => submitUpdate(ctx, input));
  }

  approveRequest(caller: Address, input: ApproveUpdateInput): Promise<ApproveUpdateResult> {
    return this.run('approveRequest', caller, (ctx) => approveUpdate(ctx, input));
  }

  withdrawPageFees(caller: Address, input: WithdrawFeesInput): Promise<WithdrawFeesResult> {
    return this.run('withdrawPageFees', caller, (ctx) => withdrawFees(ctx, input));
  }

  distributePageTreasury(
    caller: Address,
    input: DistributeTreasuryInput
  ): Promise<DistributeTreasuryResult> {
    return this.run('distributePageTreasury', caller, (ctx) => distributeTreasury(ctx, input));
  }

  changeOwnership(caller: Address, input: ChangeOwnershipInput): Promise<Page> {
    return this.run('changeOwnership', caller, (ctx) => changeOwnership(ctx, input));
  }

  vote(caller: Address, input: ReactInput): Promise<ReactResult> {
    return this.run('vote', caller, (ctx) => react(ctx, input));
  }

  // --- Reads ---
  //
  // Reads queue behind running operations like writes do, so they never see
  // a change that may still roll back.

  getPageInfo(pageId: PageId): Promise<PageInfo> {
    return this.read(async (repos) => {
      const { ownership, ...page } = await requirePage(repos, pageId);
      const treasury = await requireTreasury(repos, pageId);
      return {
        ...page,
        ownershipKind: ownership.kind,
        owners: ownership.owners,
        threshold: ownership.threshold,
        balance: treasury.balance,
      };
    });
  }

  getCurrentContent(pageId: PageId): Promise<string> {
    return this.read(async (repos) => (await requirePage(repos, pageId)).content);
  }

  getOwners(pageId: PageId): Promise<Address[]> {
    return this.read(async (repos) => (await requirePage(repos, pageId)).ownership.owners);
  }

  getUpdateRequest(pageId: PageId, requestId: RequestId): Promise<UpdateRequest> {
    return this.read(async (repos) => {
      const page = await requirePage(repos, pageId);
      const request = await repos.updateRequests.get(page.id, requestId);
      if (!request) {
        throw new RequestNotFoundError(page.id, requestId);
      }
      return request;
    });
  }

  listUpdateRequests(pageId: PageId, filter?: UpdateRequestFilter): Promise<UpdateRequest[]> {
    return this.read(async (repos) => {
      const page = await requirePage(repos, pageId);
      return repos.updateRequests.list(page.id, filter);
    });
  }

  async getBalance(pageId: PageId): Promise<Amount> {
    const treasury = await this.getTreasury(pageId);
    return treasury.balance;
  }

  getTreasury(pageId: PageId): Promise<Treasury> {
    return this.read(async (repos) => {
      const page = await requirePage(repos, pageId);
      return requireTreasury(repos, page.id);
    });
  }

  getParticipants(pageId: PageId): Promise<Address[]> {
    return this.read(async (repos) => {
      const page = await requirePage(repos, pageId);
      return listParticipants(repos, page.id);
    });
  }

  getReaction(pageId: PageId, address: Address): Promise<ReactionState> {
    return this.read(async (repos) => {
      const page = await requirePage(repos, pageId);
      return repos.reactions.get(page.id, address);
    });
  }

  getPageCount(): Promise<number> {
    return this.read((repos) => repos.pages.count());
  }

  listPages(filter?: PageFilter): Promise<Page[]> {
    return this.read((repos) => repos.pages.list(filter));
  }

  /**
   * Head of the digest chain over committed events.
   */
  get recentDigest(): string {
    return this.chain.current;
  }

  // --- Operation boundary ---

  private async run<T>(
    operation: string,
    caller: Address,
    fn: (ctx: OperationContext) => Promise<T>
  ): Promise<T> {
    const startTime = Date.now();
    const outer = this.scope.getStore();
    const events: PageEvent[] = [];
    const timestamp = this.clock().toISOString();

    try {
      requireCaller(caller);

      const result = await this.scope.run(outer ?? events, () =>
        this.repos.transaction((repos) =>
          fn({
            repos,
            caller,
            timestamp,
            content: this.content,
            payouts: this.payouts,
            entropy: this.entropy,
            logger: this.logger,
            emit: (draft) => events.push(this.stamp(draft, timestamp)),
          })
        )
      );

      if (outer) {
        // Nested in a running operation: its events commit with the outer one
        outer.push(...events);
      } else {
        this.chain.advance(events.map((e) => `${e.id}:${e.type}:${e.pageId}`));
      }

      this.logger.info(`${operation} committed`, {
        caller,
        events: events.map((e) => e.type),
        durationMs: Date.now() - startTime,
      });

      if (!outer) {
        await this.publish(events);
      }
      return result;
    } catch (error) {
      this.logger.warn(`${operation} failed`, {
        caller,
        code: isRuntimeError(error) ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - startTime,
      });
      throw error;
    }
  }

  private read<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
    return this.repos.transaction(fn);
  }

  private stamp(draft: PageEventDraft, timestamp: string): PageEvent {
    return { ...draft, id: `evt_${Date.now()}_${++this.nextEventId}`, timestamp };
  }

  private async publish(events: PageEvent[]): Promise<void> {
    for (const event of events) {
      try {
        await this.onEvent(event);
      } catch (error) {
        // The operation has committed; a failing subscriber does not undo it
        this.logger.error('Event handler failed', {
          eventId: event.id,
          type: event.type,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}

/**
 * Create a new PageRegistry instance.
 */
export function createPageRegistry(options: PageRegistryOptions): PageRegistry {
  return new PageRegistry(options);
}
