// Diagnostics - counters and registries for what the bridge saw but could not use
//
// Per-frame problems end up here instead of interrupting ingestion. Listeners
// receive each diagnostic as a typed event.

import type {
  CanFrame,
  CommandAction,
  DecodedFrame,
  DiagnosticCounters,
  DiagnosticsSnapshot,
  EntityId,
  InterfaceName,
  UnknownDgnEntry,
  UnmappedEntry,
} from '@rvlink/protocol';
import { formatArbitrationId, formatDgn, toHex } from '@rvlink/protocol';
import type { DecodeFailure, ResolutionMiss } from '../errors.js';
import type { Logger } from '../logging.js';
import { describeError, silentLogger } from '../logging.js';
import type { DeviceTable } from '../tables/device-table.js';

export type DiagnosticEvent =
  | { type: 'unknown_dgn'; entry: UnknownDgnEntry }
  | { type: 'unmapped'; entry: UnmappedEntry; miss: ResolutionMiss }
  | { type: 'decode_error'; interface: InterfaceName; failure: DecodeFailure }
  | { type: 'subscriber_drop'; subscriberId: number; dropped: number }
  | { type: 'command_sent'; entityId: EntityId; action: CommandAction; frames: number }
  | { type: 'disconnect'; interface: InterfaceName; reason: string }
  | { type: 'reconnect'; interface: InterfaceName; attempt: number };

export type DiagnosticListener = (event: DiagnosticEvent) => void;

export type DiagnosticsOptions = {
  /** Used to suggest entities for unmapped pairs */
  devices?: DeviceTable;

  logger?: Logger;
};

function emptyCounters(): DiagnosticCounters {
  return {
    framesReceived: 0,
    framesDecoded: 0,
    unknownDgn: 0,
    unmapped: 0,
    partialDecodes: 0,
    decodeErrors: 0,
    stateChanges: 0,
    subscriberDrops: 0,
    commandsSent: 0,
    disconnects: 0,
    reconnects: 0,
  };
}

export class Diagnostics {
  private counts = emptyCounters();
  private unknown = new Map<number, UnknownDgnEntry>();
  private unmappedEntries = new Map<string, UnmappedEntry>();
  private sources = new Set<number>();
  private listeners = new Set<DiagnosticListener>();
  private devices?: DeviceTable;
  private logger: Logger;

  constructor(options: DiagnosticsOptions = {}) {
    this.devices = options.devices;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Subscribe to diagnostic events.
   *
   * @returns Unsubscribe function
   */
  onEvent(listener: DiagnosticListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  recordFrame(sourceAddress: number): void {
    this.counts.framesReceived++;
    this.sources.add(sourceAddress);
  }

  recordDecoded(decoded: DecodedFrame): void {
    this.counts.framesDecoded++;
    if (decoded.partial) {
      this.counts.partialDecodes++;
    }
  }

  /**
   * Register a frame whose DGN the specification does not define.
   * Entries are keyed by arbitration id.
   */
  recordUnknownDgn(frame: CanFrame, decoded: DecodedFrame): UnknownDgnEntry {
    this.counts.unknownDgn++;

    const previous = this.unknown.get(frame.id);
    const entry: UnknownDgnEntry = {
      arbitrationId: formatArbitrationId(frame.id),
      dgn: formatDgn(decoded.dgn),
      interface: frame.interface,
      firstSeen: previous?.firstSeen ?? frame.timestamp,
      lastSeen: frame.timestamp,
      count: (previous?.count ?? 0) + 1,
      lastData: decoded.data,
    };
    this.unknown.set(frame.id, entry);

    this.emit({ type: 'unknown_dgn', entry });
    return entry;
  }

  /**
   * Register a decoded frame no entity is mapped to.
   * Entries are keyed by (DGN, instance).
   */
  recordUnmapped(frame: CanFrame, decoded: DecodedFrame, miss: ResolutionMiss): UnmappedEntry {
    this.counts.unmapped++;

    const key = `${formatDgn(miss.dgn)}:${miss.instance ?? 'none'}`;
    const previous = this.unmappedEntries.get(key);
    const entry: UnmappedEntry = {
      dgn: formatDgn(miss.dgn),
      name: decoded.name ?? formatDgn(miss.dgn),
      instance: miss.instance,
      interface: frame.interface,
      signals: decoded.signals,
      firstSeen: previous?.firstSeen ?? frame.timestamp,
      lastSeen: frame.timestamp,
      count: (previous?.count ?? 0) + 1,
      lastData: toHex(frame.data),
      suggestions: previous?.suggestions ?? this.suggest(miss.dgn),
    };
    this.unmappedEntries.set(key, entry);

    this.emit({ type: 'unmapped', entry, miss });
    return entry;
  }

  recordDecodeError(frameInterface: InterfaceName, failure: DecodeFailure): void {
    this.counts.decodeErrors++;
    this.logger.warn('Frame processing failed', {
      interface: frameInterface,
      arbitrationId: formatArbitrationId(failure.arbitrationId),
      error: failure.message,
    });
    this.emit({ type: 'decode_error', interface: frameInterface, failure });
  }

  recordStateChange(): void {
    this.counts.stateChanges++;
  }

  recordSubscriberDrop(subscriberId: number, dropped: number): void {
    this.counts.subscriberDrops++;
    this.emit({ type: 'subscriber_drop', subscriberId, dropped });
  }

  recordCommand(entityId: EntityId, action: CommandAction, frames: number): void {
    this.counts.commandsSent++;
    this.emit({ type: 'command_sent', entityId, action, frames });
  }

  recordDisconnect(frameInterface: InterfaceName, reason: string): void {
    this.counts.disconnects++;
    this.emit({ type: 'disconnect', interface: frameInterface, reason });
  }

  recordReconnect(frameInterface: InterfaceName, attempt: number): void {
    this.counts.reconnects++;
    this.emit({ type: 'reconnect', interface: frameInterface, attempt });
  }

  counters(): DiagnosticCounters {
    return { ...this.counts };
  }

  /**
   * Unknown DGNs, most frequent first
   */
  unknownDgns(): UnknownDgnEntry[] {
    return Array.from(this.unknown.values()).sort((a, b) => b.count - a.count);
  }

  /**
   * Unmapped pairs ordered by DGN, then instance
   */
  unmapped(): UnmappedEntry[] {
    return Array.from(this.unmappedEntries.values()).sort(
      (a, b) => a.dgn.localeCompare(b.dgn) || (a.instance ?? -1) - (b.instance ?? -1)
    );
  }

  snapshot(): DiagnosticsSnapshot {
    return {
      counters: this.counters(),
      unknownDgns: this.unknownDgns(),
      unmapped: this.unmapped(),
      sourceAddresses: Array.from(this.sources).sort((a, b) => a - b),
    };
  }

  private suggest(dgn: number): EntityId[] {
    return (this.devices?.onDgn(dgn) ?? []).map((descriptor) => descriptor.entityId);
  }

  private emit(event: DiagnosticEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn('Diagnostics listener failed', { type: event.type, ...describeError(error) });
      }
    }
  }
}
