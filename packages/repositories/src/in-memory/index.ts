// In-memory history repository for development and testing
//
// Data does not persist between restarts. Each entity keeps a bounded
// window of entries: at most `maxEntriesPerEntity`, none older than
// `retentionMs`.

import type { EntityId, Timestamp } from '@rvlink/protocol';
import type { EntityHistoryRepository, HistoryEntry, HistoryQuery } from '../interfaces/index.js';

export type InMemoryHistoryOptions = {
  /** Default: 1000 */
  maxEntriesPerEntity?: number;

  /** Default: 24 hours */
  retentionMs?: number;

  now?: () => Date;
};

export const DEFAULT_MAX_ENTRIES_PER_ENTITY = 1000;
export const DEFAULT_RETENTION_MS = 24 * 60 * 60 * 1000;

export class InMemoryHistoryRepository implements EntityHistoryRepository {
  private entries = new Map<EntityId, HistoryEntry[]>();
  private maxEntriesPerEntity: number;
  private retentionMs: number;
  private now: () => Date;

  constructor(options: InMemoryHistoryOptions = {}) {
    const {
      maxEntriesPerEntity = DEFAULT_MAX_ENTRIES_PER_ENTITY,
      retentionMs = DEFAULT_RETENTION_MS,
      now = () => new Date(),
    } = options;
    this.maxEntriesPerEntity = maxEntriesPerEntity;
    this.retentionMs = retentionMs;
    this.now = now;
  }

  async append(entry: HistoryEntry): Promise<void> {
    const cutoff = this.now().getTime() - this.retentionMs;
    const kept = (this.entries.get(entry.entityId) ?? []).filter(
      (existing) => Date.parse(existing.timestamp) >= cutoff
    );

    kept.push(entry);
    if (kept.length > this.maxEntriesPerEntity) {
      kept.splice(0, kept.length - this.maxEntriesPerEntity);
    }
    this.entries.set(entry.entityId, kept);
  }

  async list(entityId: EntityId, query: HistoryQuery = {}): Promise<HistoryEntry[]> {
    const { since, limit } = query;
    let result = this.entries.get(entityId) ?? [];

    if (since !== undefined) {
      const from = Date.parse(since);
      result = result.filter((entry) => Date.parse(entry.timestamp) >= from);
    }
    if (limit !== undefined && result.length > limit) {
      result = result.slice(result.length - limit);
    }
    return [...result];
  }

  async prune(before: Timestamp): Promise<number> {
    const cutoff = Date.parse(before);
    let removed = 0;

    for (const [entityId, entries] of this.entries) {
      const kept = entries.filter((entry) => Date.parse(entry.timestamp) >= cutoff);
      removed += entries.length - kept.length;
      if (kept.length === 0) {
        this.entries.delete(entityId);
      } else {
        this.entries.set(entityId, kept);
      }
    }
    return removed;
  }

  /** Clear all data */
  clear(): void {
    this.entries.clear();
  }
}
