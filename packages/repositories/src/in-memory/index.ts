// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
//
// Data does not persist between restarts.
//
// Transactions run one at a time. Each one snapshots the store first and
// restores the snapshot if its function throws. A transaction opened while
// another is running in the same async context (a payout recipient calling
// back into the registry) joins it as a savepoint instead of queueing behind
// it.

import { AsyncLocalStorage } from 'node:async_hooks';
import type {
  Address,
  Page,
  PageId,
  ReactionState,
  Treasury,
  UpdateRequest,
} from '@quire/protocol';
import { NO_REACTION, updateRequestStatus } from '@quire/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
  PageRepository,
  UpdateRequestRepository,
  TreasuryRepository,
  ParticipantRepository,
  ReactionRepository,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  pages: Map<PageId, Page>;
  /** Requests per page, indexed by request id */
  updateRequests: Map<PageId, UpdateRequest[]>;
  treasuries: Map<PageId, Treasury>;
  participants: Map<PageId, Address[]>;
  /** Keyed by `${pageId}:${address}` */
  reactions: Map<string, ReactionState>;
  counters: { lastPageId: number };
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * const page = await repos.transaction((tx) =>
 *   tx.pages.create({ name: 'Home', ... })
 * );
 *
 * // Access underlying data for debugging
 * console.log(repos._data.pages.size);
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const data: InMemoryDataStore = {
    pages: new Map(),
    updateRequests: new Map(),
    treasuries: new Map(),
    participants: new Map(),
    reactions: new Map(),
    counters: { lastPageId: 0 },
  };
  const { pages, updateRequests, treasuries, participants, reactions, counters } = data;

  const now = () => new Date().toISOString();

  // Page repository
  const pageRepo: PageRepository = {
    async create(input) {
      const id = counters.lastPageId + 1;
      const timestamp = now();
      const page: Page = {
        id,
        name: input.name,
        thumbnail: input.thumbnail,
        content: input.content,
        immutable: input.immutable,
        updateFee: input.updateFee,
        ownership: {
          kind: input.ownership.kind,
          owners: [...input.ownership.owners],
          threshold: input.ownership.threshold,
        },
        creator: input.creator,
        requestCount: 0,
        likes: 0,
        dislikes: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
      };
      pages.set(id, page);
      counters.lastPageId = id;
      return structuredClone(page);
    },
    async get(id) {
      const page = pages.get(id);
      return page ? structuredClone(page) : null;
    },
    async list(filter) {
      let result = Array.from(pages.values()).sort((a, b) => a.id - b.id);
      if (filter?.offset) {
        result = result.slice(filter.offset);
      }
      if (filter?.limit) {
        result = result.slice(0, filter.limit);
      }
      return result.map((p) => structuredClone(p));
    },
    async count() {
      return counters.lastPageId;
    },
    async applyFields(id, fields) {
      const page = pages.get(id);
      if (!page) return null;
      if (fields.content) page.content = fields.content;
      if (fields.name) page.name = fields.name;
      if (fields.thumbnail) page.thumbnail = fields.thumbnail;
      page.updatedAt = now();
      return structuredClone(page);
    },
    async setOwnership(id, ownership) {
      const page = pages.get(id);
      if (!page) return null;
      page.ownership = {
        kind: ownership.kind,
        owners: [...ownership.owners],
        threshold: ownership.threshold,
      };
      page.updatedAt = now();
      return structuredClone(page);
    },
    async setTally(id, tally) {
      const page = pages.get(id);
      if (!page) return null;
      page.likes = tally.likes;
      page.dislikes = tally.dislikes;
      return structuredClone(page);
    },
  };

  // Update request repository
  const updateRequestRepo: UpdateRequestRepository = {
    async create(input) {
      const page = pages.get(input.pageId);
      if (!page) {
        throw new Error(`Cannot create request for unknown page: ${input.pageId}`);
      }
      const request: UpdateRequest = {
        pageId: input.pageId,
        id: page.requestCount,
        proposed: { ...input.proposed },
        proposer: input.proposer,
        fee: input.fee,
        executed: false,
        approvals: 0,
        voters: [],
        createdAt: now(),
      };
      page.requestCount += 1;
      const list = updateRequests.get(input.pageId) ?? [];
      list.push(request);
      updateRequests.set(input.pageId, list);
      return structuredClone(request);
    },
    async get(pageId, id) {
      const request = updateRequests.get(pageId)?.[id];
      return request ? structuredClone(request) : null;
    },
    // Transactions already run one at a time
    async getForUpdate(pageId, id) {
      return updateRequestRepo.get(pageId, id);
    },
    async list(pageId, filter) {
      let result = [...(updateRequests.get(pageId) ?? [])];
      if (filter?.status && filter.status.length > 0) {
        const statuses = filter.status;
        result = result.filter((r) => statuses.includes(updateRequestStatus(r)));
      }
      if (filter?.offset) {
        result = result.slice(filter.offset);
      }
      if (filter?.limit) {
        result = result.slice(0, filter.limit);
      }
      return result.map((r) => structuredClone(r));
    },
    async recordVote(pageId, id, voter) {
      const request = updateRequests.get(pageId)?.[id];
      if (!request) return null;
      if (!request.voters.includes(voter)) {
        request.voters.push(voter);
        request.approvals += 1;
      }
      return structuredClone(request);
    },
    async markExecuted(pageId, id, executedAt) {
      const request = updateRequests.get(pageId)?.[id];
      if (!request || request.executed) return null;
      request.executed = true;
      request.executedAt = executedAt;
      return structuredClone(request);
    },
  };

  // Treasury repository
  const treasuryRepo: TreasuryRepository = {
    async open(pageId) {
      const treasury: Treasury = {
        pageId,
        balance: 0n,
        retained: 0n,
        collected: 0n,
        paidOut: 0n,
      };
      treasuries.set(pageId, treasury);
      return { ...treasury };
    },
    async get(pageId) {
      const treasury = treasuries.get(pageId);
      return treasury ? { ...treasury } : null;
    },
    async getForUpdate(pageId) {
      return treasuryRepo.get(pageId);
    },
    async credit(pageId, amount) {
      const treasury = treasuries.get(pageId);
      if (!treasury) return null;
      treasury.balance += amount;
      treasury.collected += amount;
      return { ...treasury };
    },
    async settle(pageId, input) {
      const treasury = treasuries.get(pageId);
      if (!treasury) return null;
      treasury.balance = 0n;
      treasury.paidOut += input.paid;
      treasury.retained += input.retained;
      return { ...treasury };
    },
  };

  // Participant repository
  const participantRepo: ParticipantRepository = {
    async add(pageId, address) {
      const list = participants.get(pageId) ?? [];
      if (list.includes(address)) return false;
      list.push(address);
      participants.set(pageId, list);
      return true;
    },
    async list(pageId) {
      return [...(participants.get(pageId) ?? [])];
    },
    async count(pageId) {
      return participants.get(pageId)?.length ?? 0;
    },
  };

  // Reaction repository
  const reactionRepo: ReactionRepository = {
    async get(pageId, address) {
      return { ...(reactions.get(`${pageId}:${address}`) ?? NO_REACTION) };
    },
    async put(pageId, address, state) {
      reactions.set(`${pageId}:${address}`, { ...state });
    },
  };

  // Build context
  const context: RepositoryContext = {
    pages: pageRepo,
    updateRequests: updateRequestRepo,
    treasuries: treasuryRepo,
    participants: participantRepo,
    reactions: reactionRepo,
  };

  const scope = new AsyncLocalStorage<true>();
  let queue: Promise<unknown> = Promise.resolve();

  async function runWithSnapshot<T>(fn: TransactionFn<T>): Promise<T> {
    const snapshot = takeSnapshot(data);
    try {
      return await fn(context);
    } catch (error) {
      restoreSnapshot(data, snapshot);
      throw error;
    }
  }

  return {
    ...context,
    async transaction<T>(fn: TransactionFn<T>): Promise<T> {
      if (scope.getStore()) {
        return runWithSnapshot(fn);
      }
      const run = queue.then(() => scope.run(true, () => runWithSnapshot(fn)));
      // The queue moves on after a failed transaction; the caller still gets the rejection.
      queue = run.catch(() => undefined);
      return run;
    },
    _data: data,
    clear() {
      pages.clear();
      updateRequests.clear();
      treasuries.clear();
      participants.clear();
      reactions.clear();
      counters.lastPageId = 0;
    },
  };
}

type Snapshot = {
  pages: [PageId, Page][];
  updateRequests: [PageId, UpdateRequest[]][];
  treasuries: [PageId, Treasury][];
  participants: [PageId, Address[]][];
  reactions: [string, ReactionState][];
  lastPageId: number;
};

function takeSnapshot(data: InMemoryDataStore): Snapshot {
  return structuredClone({
    pages: Array.from(data.pages.entries()),
    updateRequests: Array.from(data.updateRequests.entries()),
    treasuries: Array.from(data.treasuries.entries()),
    participants: Array.from(data.participants.entries()),
    reactions: Array.from(data.reactions.entries()),
    lastPageId: data.counters.lastPageId,
  });
}

function restoreSnapshot(data: InMemoryDataStore, snapshot: Snapshot): void {
  refill(data.pages, snapshot.pages);
  refill(data.updateRequests, snapshot.updateRequests);
  refill(data.treasuries, snapshot.treasuries);
  refill(data.participants, snapshot.participants);
  refill(data.reactions, snapshot.reactions);
  data.counters.lastPageId = snapshot.lastPageId;
}

function refill<K, V>(target: Map<K, V>, entries: [K, V][]): void {
  target.clear();
  for (const [key, value] of entries) {
    target.set(key, value);
  }
}
