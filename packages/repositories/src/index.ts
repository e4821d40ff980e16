// @rvlink/repositories
// Repository interfaces and implementations for storage-independent data access.
//
// This package defines the "contract" for persisted data. The actual
// implementations (in-memory, Postgres) fulfill these contracts, allowing the
// runtime to work with any storage backend.

export * from './interfaces/index.js';
export {
  InMemoryHistoryRepository,
  DEFAULT_MAX_ENTRIES_PER_ENTITY,
  DEFAULT_RETENTION_MS,
  type InMemoryHistoryOptions,
} from './in-memory/index.js';
export * as postgres from './postgres/index.js';
