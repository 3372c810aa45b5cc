import { asc, eq, sql } from 'drizzle-orm';
import type { Database } from '../db.js';
import { pages, registryCounters } from '../schema/index.js';
import type {
  PageRepository,
  CreatePageInput,
  PageFilter,
} from '../../interfaces/index.js';
import type {
  OwnershipConfig,
  Page,
  PageFieldUpdate,
  PageId,
  ReactionTally,
} from '@quire/protocol';

const PAGE_COUNTER = 'page';

export class PgPageRepository implements PageRepository {
  constructor(private db: Database) {}

  async create(input: CreatePageInput): Promise<Page> {
    const [counter] = await this.db
      .insert(registryCounters)
      .values({ name: PAGE_COUNTER, value: 1 })
      .onConflictDoUpdate({
        target: registryCounters.name,
        set: { value: sql`${registryCounters.value} + 1` },
      })
      .returning();

    const now = new Date();
    const [row] = await this.db
      .insert(pages)
      .values({
        id: counter.value,
        name: input.name,
        thumbnail: input.thumbnail,
        content: input.content,
        immutable: input.immutable,
        updateFee: input.updateFee,
        ownershipKind: input.ownership.kind,
        owners: input.ownership.owners,
        threshold: input.ownership.threshold,
        creator: input.creator,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    return rowToPage(row);
  }

  async get(id: PageId): Promise<Page | null> {
    const [row] = await this.db.select().from(pages).where(eq(pages.id, id));
    return row ? rowToPage(row) : null;
  }

  async list(filter?: PageFilter): Promise<Page[]> {
    let query = this.db.select().from(pages).orderBy(asc(pages.id)).$dynamic();

    if (filter?.limit) {
      query = query.limit(filter.limit);
    }

    if (filter?.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    return rows.map(rowToPage);
  }

  async count(): Promise<number> {
    const [row] = await this.db
      .select({ value: registryCounters.value })
      .from(registryCounters)
      .where(eq(registryCounters.name, PAGE_COUNTER));
    return row?.value ?? 0;
  }

  async applyFields(id: PageId, fields: PageFieldUpdate): Promise<Page | null> {
    const set: Partial<typeof pages.$inferInsert> = { updatedAt: new Date() };
    if (fields.content) set.content = fields.content;
    if (fields.name) set.name = fields.name;
    if (fields.thumbnail) set.thumbnail = fields.thumbnail;

    const [row] = await this.db.update(pages).set(set).where(eq(pages.id, id)).returning();
    return row ? rowToPage(row) : null;
  }

  async setOwnership(id: PageId, ownership: OwnershipConfig): Promise<Page | null> {
    const [row] = await this.db
      .update(pages)
      .set({
        ownershipKind: ownership.kind,
        owners: ownership.owners,
        threshold: ownership.threshold,
        updatedAt: new Date(),
      })
      .where(eq(pages.id, id))
      .returning();

    return row ? rowToPage(row) : null;
  }

  async setTally(id: PageId, tally: ReactionTally): Promise<Page | null> {
    const [row] = await this.db
      .update(pages)
      .set({ likes: tally.likes, dislikes: tally.dislikes })
      .where(eq(pages.id, id))
      .returning();

    return row ? rowToPage(row) : null;
  }
}

export function rowToPage(row: typeof pages.$inferSelect): Page {
  return {
    id: row.id,
    name: row.name,
    thumbnail: row.thumbnail,
    content: row.content,
    immutable: row.immutable,
    updateFee: row.updateFee,
    ownership: {
      kind: row.ownershipKind,
      owners: row.owners,
      threshold: row.threshold,
    },
    creator: row.creator,
    requestCount: row.requestCount,
    likes: row.likes,
    dislikes: row.dislikes,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}
