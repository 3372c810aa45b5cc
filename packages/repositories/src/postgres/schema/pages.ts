import {
  pgTable,
  integer,
  text,
  boolean,
  bigint,
  jsonb,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { Address } from '@quire/protocol';

/**
 * Pages table - the managed resources and their ownership configuration.
 *
 * Ids come from registry_counters, not a sequence, so that an id is
 * consumed only when the creating transaction commits.
 */
export const pages = pgTable(
  'pages',
  {
    id: integer('id').primaryKey(),
    name: text('name').notNull(),
    thumbnail: text('thumbnail').notNull(),
    content: text('content').notNull(),
    immutable: boolean('immutable').notNull().default(false),
    updateFee: bigint('update_fee', { mode: 'bigint' }).notNull().default(sql`0`),
    ownershipKind: text('ownership_kind', {
      enum: ['single', 'multisig', 'permissionless'],
    }).notNull(),
    owners: jsonb('owners').$type<Address[]>().notNull(),
    threshold: integer('threshold').notNull(),
    creator: text('creator').notNull(),
    requestCount: integer('request_count').notNull().default(0),
    likes: integer('likes').notNull().default(0),
    dislikes: integer('dislikes').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('pages_ownership_kind_idx').on(table.ownershipKind)]
);

/**
 * Named monotonic counters.
 */
export const registryCounters = pgTable('registry_counters', {
  name: text('name').primaryKey(),
  value: integer('value').notNull(),
});
