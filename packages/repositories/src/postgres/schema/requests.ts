import {
  pgTable,
  integer,
  text,
  boolean,
  bigint,
  jsonb,
  timestamp,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';
import type { PageFieldUpdate } from '@quire/protocol';
import { pages } from './pages.js';

/**
 * Update requests table - proposed page changes.
 *
 * Lifecycle: pending -> executed. Rows are never deleted.
 */
export const updateRequests = pgTable(
  'update_requests',
  {
    pageId: integer('page_id')
      .notNull()
      .references(() => pages.id, { onDelete: 'cascade' }),
    requestId: integer('request_id').notNull(),
    proposed: jsonb('proposed').$type<PageFieldUpdate>().notNull(),
    proposer: text('proposer').notNull(),
    fee: bigint('fee', { mode: 'bigint' }).notNull(),
    executed: boolean('executed').notNull().default(false),
    approvals: integer('approvals').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    executedAt: timestamp('executed_at', { withTimezone: true }),
  },
  (table) => [
    primaryKey({ columns: [table.pageId, table.requestId] }),
    index('update_requests_executed_idx').on(table.pageId, table.executed),
  ]
);

/**
 * One row per distinct approver of a request.
 */
export const requestVotes = pgTable(
  'request_votes',
  {
    pageId: integer('page_id').notNull(),
    requestId: integer('request_id').notNull(),
    voter: text('voter').notNull(),
    /** 1-based position in vote order */
    ordinal: integer('ordinal').notNull(),
    votedAt: timestamp('voted_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [primaryKey({ columns: [table.pageId, table.requestId, table.voter] })]
);
