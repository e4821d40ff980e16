import { defineConfig } from 'drizzle-kit';

// Migrations for the entity_history table. DATABASE_URL is the same variable
// the bridge reads at startup.
export default defineConfig({
  dialect: 'postgresql',
  schema: './src/postgres/schema/history.ts',
  out: './migrations',
  tablesFilter: ['entity_history'],
  strict: true,
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/rvlink',
  },
});
