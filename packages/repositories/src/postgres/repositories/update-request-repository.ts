import { and, asc, eq, sql } from 'drizzle-orm';
import type { Database } from '../db.js';
import { pages, updateRequests, requestVotes } from '../schema/index.js';
import type {
  UpdateRequestRepository,
  CreateUpdateRequestInput,
  UpdateRequestFilter,
} from '../../interfaces/index.js';
import type {
  Address,
  PageId,
  RequestId,
  Timestamp,
  UpdateRequest,
} from '@quire/protocol';

export class PgUpdateRequestRepository implements UpdateRequestRepository {
  constructor(private db: Database) {}

  async create(input: CreateUpdateRequestInput): Promise<UpdateRequest> {
    // Claim the page's next sequence number
    const [page] = await this.db
      .update(pages)
      .set({ requestCount: sql`${pages.requestCount} + 1` })
      .where(eq(pages.id, input.pageId))
      .returning({ requestCount: pages.requestCount });

    if (!page) {
      throw new Error(`Cannot create request for unknown page: ${input.pageId}`);
    }

    const [row] = await this.db
      .insert(updateRequests)
      .values({
        pageId: input.pageId,
        requestId: page.requestCount - 1,
        proposed: input.proposed,
        proposer: input.proposer,
        fee: input.fee,
      })
      .returning();

    return rowToUpdateRequest(row, []);
  }

  async get(pageId: PageId, id: RequestId): Promise<UpdateRequest | null> {
    const [row] = await this.db
      .select()
      .from(updateRequests)
      .where(and(eq(updateRequests.pageId, pageId), eq(updateRequests.requestId, id)));

    if (!row) return null;
    return rowToUpdateRequest(row, await this.voters(pageId, id));
  }

  async getForUpdate(pageId: PageId, id: RequestId): Promise<UpdateRequest | null> {
    const [row] = await selectRequestForUpdate(this.db, pageId, id);
    if (!row) return null;
    return rowToUpdateRequest(row, await this.voters(pageId, id));
  }

  async list(pageId: PageId, filter?: UpdateRequestFilter): Promise<UpdateRequest[]> {
    const conditions = [eq(updateRequests.pageId, pageId)];

    const statuses = filter?.status ?? [];
    if (statuses.length === 1) {
      conditions.push(eq(updateRequests.executed, statuses[0] === 'executed'));
    }

    let query = this.db
      .select()
      .from(updateRequests)
      .where(and(...conditions))
      .orderBy(asc(updateRequests.requestId))
      .$dynamic();

    if (filter?.limit) {
      query = query.limit(filter.limit);
    }

    if (filter?.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    const result: UpdateRequest[] = [];
    for (const row of rows) {
      result.push(rowToUpdateRequest(row, await this.voters(pageId, row.requestId)));
    }
    return result;
  }

  async recordVote(pageId: PageId, id: RequestId, voter: Address): Promise<UpdateRequest | null> {
    const current = await this.get(pageId, id);
    if (!current) return null;
    if (current.voters.includes(voter)) return current;

    await this.db.insert(requestVotes).values({
      pageId,
      requestId: id,
      voter,
      ordinal: current.voters.length + 1,
    });

    await this.db
      .update(updateRequests)
      .set({ approvals: sql`${updateRequests.approvals} + 1` })
      .where(and(eq(updateRequests.pageId, pageId), eq(updateRequests.requestId, id)));

    return this.get(pageId, id);
  }

  async markExecuted(
    pageId: PageId,
    id: RequestId,
    executedAt: Timestamp
  ): Promise<UpdateRequest | null> {
    const [row] = await this.db
      .update(updateRequests)
      .set({ executed: true, executedAt: new Date(executedAt) })
      .where(
        and(
          eq(updateRequests.pageId, pageId),
          eq(updateRequests.requestId, id),
          eq(updateRequests.executed, false)
        )
      )
      .returning();

    if (!row) return null;
    return rowToUpdateRequest(row, await this.voters(pageId, id));
  }

  private async voters(pageId: PageId, id: RequestId): Promise<Address[]> {
    const rows = await this.db
      .select({ voter: requestVotes.voter })
      .from(requestVotes)
      .where(and(eq(requestVotes.pageId, pageId), eq(requestVotes.requestId, id)))
      .orderBy(asc(requestVotes.ordinal));
    return rows.map((r) => r.voter);
  }
}

/**
 * Row-locking read of one request. Concurrent approvals of the same request
 * queue here, so only the first sees it pending.
 */
export function selectRequestForUpdate(db: Database, pageId: PageId, id: RequestId) {
  return db
    .select()
    .from(updateRequests)
    .where(and(eq(updateRequests.pageId, pageId), eq(updateRequests.requestId, id)))
    .for('update');
}

function rowToUpdateRequest(
  row: typeof updateRequests.$inferSelect,
  voters: Address[]
): UpdateRequest {
  return {
    pageId: row.pageId,
    id: row.requestId,
    proposed: row.proposed,
    proposer: row.proposer,
    fee: row.fee,
    executed: row.executed,
    approvals: row.approvals,
    voters,
    createdAt: row.createdAt.toISOString(),
    executedAt: row.executedAt ? row.executedAt.toISOString() : undefined,
  };
}
