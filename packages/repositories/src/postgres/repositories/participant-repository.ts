import { asc, eq, sql } from 'drizzle-orm';
import type { Database } from '../db.js';
import { participants } from '../schema/index.js';
import type { ParticipantRepository } from '../../interfaces/index.js';
import type { Address, PageId } from '@quire/protocol';

export class PgParticipantRepository implements ParticipantRepository {
  constructor(private db: Database) {}

  async add(pageId: PageId, address: Address): Promise<boolean> {
    const ordinal = (await this.count(pageId)) + 1;
    const inserted = await this.db
      .insert(participants)
      .values({ pageId, address, ordinal })
      .onConflictDoNothing()
      .returning();
    return inserted.length > 0;
  }

  async list(pageId: PageId): Promise<Address[]> {
    const rows = await this.db
      .select({ address: participants.address })
      .from(participants)
      .where(eq(participants.pageId, pageId))
      .orderBy(asc(participants.ordinal));
    return rows.map((r) => r.address);
  }

  async count(pageId: PageId): Promise<number> {
    const [row] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(participants)
      .where(eq(participants.pageId, pageId));
    return Number(row?.count ?? 0);
  }
}
