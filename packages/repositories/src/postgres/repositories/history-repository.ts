import { and, desc, eq, gte, lt } from 'drizzle-orm';
import type { EntityId, Timestamp } from '@rvlink/protocol';
import type { Database } from '../db.js';
import { entityHistory } from '../schema/index.js';
import type {
  EntityHistoryRepository,
  HistoryEntry,
  HistoryQuery,
} from '../../interfaces/index.js';

type HistoryRow = typeof entityHistory.$inferSelect;

export class PgHistoryRepository implements EntityHistoryRepository {
  constructor(private db: Database) {}

  async append(entry: HistoryEntry): Promise<void> {
    await this.db.insert(entityHistory).values({
      entityId: entry.entityId,
      revision: entry.revision,
      cause: entry.cause,
      timestamp: new Date(entry.timestamp),
      signals: entry.signals,
      command: entry.command,
    });
  }

  async list(entityId: EntityId, query: HistoryQuery = {}): Promise<HistoryEntry[]> {
    const conditions = [eq(entityHistory.entityId, entityId)];
    if (query.since) {
      conditions.push(gte(entityHistory.timestamp, new Date(query.since)));
    }

    const base = this.db
      .select()
      .from(entityHistory)
      .where(and(...conditions))
      .orderBy(desc(entityHistory.timestamp), desc(entityHistory.revision));

    const rows = query.limit !== undefined ? await base.limit(query.limit) : await base;

    // Newest first from the query, oldest first to the caller
    return rows.reverse().map((row) => this.rowToEntry(row));
  }

  async prune(before: Timestamp): Promise<number> {
    const removed = await this.db
      .delete(entityHistory)
      .where(lt(entityHistory.timestamp, new Date(before)))
      .returning({ id: entityHistory.id });

    return removed.length;
  }

  private rowToEntry(row: HistoryRow): HistoryEntry {
    return {
      entityId: row.entityId,
      revision: row.revision,
      cause: row.cause,
      timestamp: row.timestamp.toISOString(),
      signals: row.signals,
      command: row.command ?? null,
    };
  }
}
