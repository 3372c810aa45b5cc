// Postgres substrate: connection, schema and repositories
export { createDatabase, type Database, type DatabaseConfig } from './db.js';
export * as schema from './schema/index.js';
export * from './repositories/index.js';
