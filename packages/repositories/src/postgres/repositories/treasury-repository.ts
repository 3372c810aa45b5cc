import { eq } from 'drizzle-orm';
import type { Database } from '../db.js';
import { treasuries } from '../schema/index.js';
import type {
  TreasuryRepository,
  SettleTreasuryInput,
} from '../../interfaces/index.js';
import type { Amount, PageId, Treasury } from '@quire/protocol';

export class PgTreasuryRepository implements TreasuryRepository {
  constructor(private db: Database) {}

  async open(pageId: PageId): Promise<Treasury> {
    const [row] = await this.db.insert(treasuries).values({ pageId }).returning();
    return rowToTreasury(row);
  }

  async get(pageId: PageId): Promise<Treasury | null> {
    const [row] = await this.db.select().from(treasuries).where(eq(treasuries.pageId, pageId));
    return row ? rowToTreasury(row) : null;
  }

  async getForUpdate(pageId: PageId): Promise<Treasury | null> {
    const row = await this.lockedRow(pageId);
    return row ? rowToTreasury(row) : null;
  }

  async credit(pageId: PageId, amount: Amount): Promise<Treasury | null> {
    const current = await this.lockedRow(pageId);
    if (!current) return null;

    const [row] = await this.db
      .update(treasuries)
      .set({
        balance: current.balance + amount,
        collected: current.collected + amount,
      })
      .where(eq(treasuries.pageId, pageId))
      .returning();

    return rowToTreasury(row);
  }

  async settle(pageId: PageId, input: SettleTreasuryInput): Promise<Treasury | null> {
    const current = await this.lockedRow(pageId);
    if (!current) return null;

    const [row] = await this.db
      .update(treasuries)
      .set({
        balance: 0n,
        paidOut: current.paidOut + input.paid,
        retained: current.retained + input.retained,
      })
      .where(eq(treasuries.pageId, pageId))
      .returning();

    return rowToTreasury(row);
  }

  private async lockedRow(pageId: PageId): Promise<typeof treasuries.$inferSelect | null> {
    const [row] = await selectTreasuryForUpdate(this.db, pageId);
    return row ?? null;
  }
}

/**
 * Row-locking read of one treasury. Blocks while another transaction holds
 * the row, then sees that transaction's committed balance.
 */
export function selectTreasuryForUpdate(db: Database, pageId: PageId) {
  return db.select().from(treasuries).where(eq(treasuries.pageId, pageId)).for('update');
}

function rowToTreasury(row: typeof treasuries.$inferSelect): Treasury {
  return {
    pageId: row.pageId,
    balance: row.balance,
    retained: row.retained,
    collected: row.collected,
    paidOut: row.paidOut,
  };
}
