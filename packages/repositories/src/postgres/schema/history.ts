import { pgTable, bigserial, text, integer, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import type { CommandStatus, DecodedSignal } from '@rvlink/protocol';

/**
 * Entity history table - one row per state change.
 *
 * Signals are stored as the decoded map so a row can be served without the
 * specification table.
 */
export const entityHistory = pgTable(
  'entity_history',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    entityId: text('entity_id').notNull(),
    revision: integer('revision').notNull(),
    cause: text('cause', { enum: ['bus', 'command'] }).notNull(),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
    signals: jsonb('signals').$type<Record<string, DecodedSignal>>().notNull(),
    command: jsonb('command').$type<CommandStatus | null>(),
  },
  (table) => [
    index('entity_history_entity_time_idx').on(table.entityId, table.timestamp),
    index('entity_history_time_idx').on(table.timestamp),
  ]
);
