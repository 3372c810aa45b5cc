// Storage selection
//
// Postgres when a connection string is configured, otherwise an in-memory
// store that lives as long as the process.

import {
  memory,
  postgres,
  type TransactionalRepositoryContext,
} from '@quire/repositories';
import type { AppConfig } from './config.js';

export type Storage = {
  kind: 'memory' | 'postgres';
  repos: TransactionalRepositoryContext;
  /** Release connections. A no-op for the in-memory store. */
  close(): Promise<void>;
};

export function openStorage(config: Pick<AppConfig, 'databaseUrl' | 'dbMaxConnections'>): Storage {
  if (!config.databaseUrl) {
    return {
      kind: 'memory',
      repos: memory.createInMemoryRepositoryContext(),
      close: async () => {},
    };
  }

  const { db, client } = postgres.createDatabase({
    connectionString: config.databaseUrl,
    maxConnections: config.dbMaxConnections,
  });

  return {
    kind: 'postgres',
    repos: postgres.createTransactionalPgRepositoryContext(db),
    close: async () => {
      await client.end();
    },
  };
}
