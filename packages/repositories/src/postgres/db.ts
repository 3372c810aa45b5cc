import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
  /** Seconds before an idle connection is closed */
  idleTimeoutSeconds?: number;
  /** Log every statement through drizzle's default logger */
  logQueries?: boolean;
};

/**
 * Open the registry database.
 *
 * The client connects lazily on the first query, so building queries (or a
 * repository context) never touches the network by itself.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const [treasury] = await db
 *   .select()
 *   .from(schema.treasuries)
 *   .where(eq(schema.treasuries.pageId, 1));
 * const repos = createTransactionalPgRepositoryContext(db);
 * await client.end();
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
    idle_timeout: config.idleTimeoutSeconds ?? 30,
    onnotice: () => {},
  });

  const db = drizzle(client, { schema, logger: config.logQueries ?? false });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];
