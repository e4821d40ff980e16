// Postgres connection for entity history

import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;

  /** History writes are small and sequential per entity. Default: 3 */
  maxConnections?: number;

  /** Seconds before an idle connection is released. Default: 30 */
  idleTimeoutSeconds?: number;
};

/**
 * Open a drizzle database over postgres.js.
 *
 * ```ts
 * const { db, close } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const history = new PgHistoryRepository(db);
 * ...
 * await close();
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 3,
    idle_timeout: config.idleTimeoutSeconds ?? 30,
  });

  const db = drizzle(client, { schema });

  return {
    db,
    close: async (): Promise<void> => {
      await client.end();
    },
  };
}

export type Database = ReturnType<typeof createDatabase>['db'];
