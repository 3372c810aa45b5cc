import { pgTable, integer, text, boolean, primaryKey } from 'drizzle-orm/pg-core';
import { pages } from './pages.js';

/**
 * Per-address like/dislike flags. Counters live on the pages table.
 */
export const reactions = pgTable(
  'reactions',
  {
    pageId: integer('page_id')
      .notNull()
      .references(() => pages.id, { onDelete: 'cascade' }),
    address: text('address').notNull(),
    liked: boolean('liked').notNull().default(false),
    disliked: boolean('disliked').notNull().default(false),
  },
  (table) => [primaryKey({ columns: [table.pageId, table.address] })]
);
