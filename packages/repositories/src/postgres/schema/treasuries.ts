import { pgTable, integer, text, bigint, primaryKey } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { pages } from './pages.js';

/**
 * Treasuries table - one fee balance per page.
 */
export const treasuries = pgTable('treasuries', {
  pageId: integer('page_id')
    .primaryKey()
    .references(() => pages.id, { onDelete: 'cascade' }),
  balance: bigint('balance', { mode: 'bigint' }).notNull().default(sql`0`),
  retained: bigint('retained', { mode: 'bigint' }).notNull().default(sql`0`),
  collected: bigint('collected', { mode: 'bigint' }).notNull().default(sql`0`),
  paidOut: bigint('paid_out', { mode: 'bigint' }).notNull().default(sql`0`),
});

/**
 * Participant ledger of permissionless pages, in first-submission order.
 */
export const participants = pgTable(
  'participants',
  {
    pageId: integer('page_id')
      .notNull()
      .references(() => pages.id, { onDelete: 'cascade' }),
    address: text('address').notNull(),
    ordinal: integer('ordinal').notNull(),
  },
  (table) => [primaryKey({ columns: [table.pageId, table.address] })]
);
