import type {
  ChangeCause,
  CommandStatus,
  DecodedSignal,
  EntityId,
  Timestamp,
} from '@rvlink/protocol';

/**
 * One recorded state change
 */
export type HistoryEntry = {
  entityId: EntityId;
  revision: number;
  cause: ChangeCause;
  timestamp: Timestamp;
  signals: Record<string, DecodedSignal>;
  command: CommandStatus | null;
};

/**
 * Filter for reading history
 */
export type HistoryQuery = {
  /** Only entries at or after this time */
  since?: Timestamp;

  /** Keep only the most recent `limit` entries */
  limit?: number;
};

/**
 * Repository interface for entity state history.
 *
 * Only actual state changes are recorded, never heartbeat repeats.
 * Entries are returned oldest first.
 */
export interface EntityHistoryRepository {
  /**
   * Record a state change.
   */
  append(entry: HistoryEntry): Promise<void>;

  /**
   * Read the history of one entity, oldest first.
   */
  list(entityId: EntityId, query?: HistoryQuery): Promise<HistoryEntry[]>;

  /**
   * Delete entries older than `before`.
   * @returns Number of entries removed
   */
  prune(before: Timestamp): Promise<number>;
}
