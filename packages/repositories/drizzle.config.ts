import { defineConfig } from 'drizzle-kit';

// Migrations for the page registry tables (pages, registry_counters,
// update_requests, request_votes, treasuries, participants, reactions).
export default defineConfig({
  dialect: 'postgresql',
  schema: './src/postgres/schema/index.ts',
  out: './migrations',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/quire',
  },
  migrations: {
    table: 'quire_migrations',
  },
  strict: true,
});
