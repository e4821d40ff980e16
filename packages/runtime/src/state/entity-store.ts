// Entity state store
//
// The only owner of EntityState records. Every mutation for an entity goes
// through one serialized apply, so updates for the same entity never
// interleave while unrelated entities proceed independently.
//
// History writes run on their own per-entity chain. apply() hands the write
// off and returns; it never waits on the repository.

import type {
  ChangeCause,
  CommandAction,
  CommandParameters,
  DecodedSignal,
  EntityId,
  EntityState,
  InterfaceName,
  StateChangeEvent,
  Timestamp,
} from '@rvlink/protocol';
import type { EntityHistoryRepository } from '@rvlink/repositories';
import { EntityNotFoundError } from '../errors.js';
import type { Logger } from '../logging.js';
import { describeError, silentLogger } from '../logging.js';
import type { DeviceTable } from '../tables/device-table.js';
import { KeyedSerializer } from './serializer.js';

/**
 * The frame an update came from
 */
export type SourceFrame = {
  dgn: number;
  interface: InterfaceName;
  data: string;
};

export type ApplyOptions = {
  /** Default: 'bus' */
  cause?: ChangeCause;

  frame?: SourceFrame;
};

export type EntityStateStoreOptions = {
  devices: DeviceTable;

  /** Receives every state change in order; failures are logged, not raised */
  history?: EntityHistoryRepository;

  logger?: Logger;
};

function sameSignal(a: DecodedSignal, b: DecodedSignal): boolean {
  if (a.status === 'unknown' || b.status === 'unknown') {
    return a.status === b.status && a.raw === b.raw && a.reason === b.reason;
  }
  return (
    a.raw === b.raw &&
    a.value === b.value &&
    a.label === b.label &&
    (a.flags ?? []).join(',') === (b.flags ?? []).join(',')
  );
}

/**
 * Drop signals a short payload did not reach. They are unset, not unknown,
 * so they never overwrite a value the entity already has.
 */
function presentSignals(signals: Record<string, DecodedSignal>): Record<string, DecodedSignal> {
  return Object.fromEntries(
    Object.entries(signals).filter(([, signal]) => signal.status === 'ok' || signal.reason !== 'missing')
  );
}

/**
 * Compare two signal maps by value.
 */
export function signalsEqual(
  a: Record<string, DecodedSignal>,
  b: Record<string, DecodedSignal>
): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) {
    return false;
  }
  return keys.every((key) => key in b && sameSignal(a[key], b[key]));
}

export class EntityStateStore {
  private states = new Map<EntityId, EntityState>();
  private serializer = new KeyedSerializer();
  private recorder = new KeyedSerializer();
  private devices: DeviceTable;
  private history?: EntityHistoryRepository;
  private logger: Logger;

  constructor(options: EntityStateStoreOptions) {
    const { devices, history, logger = silentLogger } = options;
    this.devices = devices;
    this.history = history;
    this.logger = logger;
  }

  /**
   * Overlay decoded signals onto an entity's state. Signals missing from a
   * short payload leave the current value in place.
   *
   * The revision and timestamp always advance. An event is returned only when
   * the entity is new, a signal value changed, or the update acknowledged a
   * pending command.
   *
   * @throws EntityNotFoundError if the entity is not in the device table
   */
  apply(
    entityId: EntityId,
    signals: Record<string, DecodedSignal>,
    timestamp: Timestamp,
    options: ApplyOptions = {}
  ): Promise<StateChangeEvent | null> {
    return this.serializer.run(entityId, () => this.applyNow(entityId, signals, timestamp, options));
  }

  /**
   * Record a command issued to an entity. Always produces an event, since
   * the command status changes.
   *
   * @throws EntityNotFoundError if the entity is not in the device table
   */
  recordCommand(
    entityId: EntityId,
    action: CommandAction,
    parameters: CommandParameters,
    timestamp: Timestamp
  ): Promise<StateChangeEvent> {
    return this.serializer.run(entityId, async () => {
      this.requireDescriptor(entityId);
      const previous = this.states.get(entityId);

      const state: EntityState = {
        entityId,
        signals: previous?.signals ?? {},
        updatedAt: timestamp,
        revision: (previous?.revision ?? 0) + 1,
        lastFrame: previous?.lastFrame ?? null,
        command: {
          action,
          parameters: { ...parameters },
          issuedAt: timestamp,
          acknowledged: false,
          acknowledgedAt: null,
        },
      };
      this.states.set(entityId, state);

      return this.emit(state, 'command', timestamp);
    });
  }

  /**
   * Wait for every history write handed off so far.
   */
  flushHistory(): Promise<void> {
    return this.recorder.idle();
  }

  get(entityId: EntityId): EntityState | undefined {
    return this.states.get(entityId);
  }

  /**
   * All current states, ordered by entity id.
   */
  snapshot(): EntityState[] {
    return Array.from(this.states.values()).sort((a, b) => a.entityId.localeCompare(b.entityId));
  }

  get size(): number {
    return this.states.size;
  }

  private async applyNow(
    entityId: EntityId,
    signals: Record<string, DecodedSignal>,
    timestamp: Timestamp,
    options: ApplyOptions
  ): Promise<StateChangeEvent | null> {
    const descriptor = this.requireDescriptor(entityId);
    const { cause = 'bus', frame } = options;
    const previous = this.states.get(entityId);
    const merged = { ...previous?.signals, ...presentSignals(signals) };

    let command = previous?.command ?? null;
    let acknowledged = false;
    const statusDgn = descriptor.statusDgn ?? descriptor.dgn;
    if (command && !command.acknowledged && frame?.dgn === statusDgn) {
      command = { ...command, acknowledged: true, acknowledgedAt: timestamp };
      acknowledged = true;
    }

    const state: EntityState = {
      entityId,
      signals: merged,
      updatedAt: timestamp,
      revision: (previous?.revision ?? 0) + 1,
      lastFrame: frame ? { ...frame, timestamp } : previous?.lastFrame ?? null,
      command,
    };
    this.states.set(entityId, state);

    const changed = !previous || acknowledged || !signalsEqual(previous.signals, merged);
    if (!changed) {
      return null;
    }
    return this.emit(state, cause, timestamp);
  }

  private emit(state: EntityState, cause: ChangeCause, timestamp: Timestamp): StateChangeEvent {
    const event: StateChangeEvent = {
      entityId: state.entityId,
      revision: state.revision,
      state,
      cause,
      timestamp,
    };

    const history = this.history;
    if (history) {
      this.recorder.enqueue(state.entityId, async () => {
        try {
          await history.append({
            entityId: state.entityId,
            revision: state.revision,
            cause,
            timestamp,
            signals: state.signals,
            command: state.command,
          });
        } catch (error) {
          this.logger.warn('Failed to record entity history', {
            entityId: state.entityId,
            revision: state.revision,
            ...describeError(error),
          });
        }
      });
    }

    return event;
  }

  private requireDescriptor(entityId: EntityId) {
    const descriptor = this.devices.get(entityId);
    if (!descriptor) {
      throw new EntityNotFoundError(entityId);
    }
    return descriptor;
  }
}
