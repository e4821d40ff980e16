// Postgres implementations (drizzle-orm over postgres.js)
export { createDatabase, type Database, type DatabaseConfig } from './db.js';
export { PgHistoryRepository } from './repositories/history-repository.js';
export * as schema from './schema/index.js';
