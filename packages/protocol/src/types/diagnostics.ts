// Diagnostics shapes exposed to the observability layer

import type { EntityId, HexString, InterfaceName, Timestamp } from './common.js';
import type { DecodedSignal } from './frames.js';

/**
 * A DGN seen on the bus that the specification table does not define.
 */
export type UnknownDgnEntry = {
  arbitrationId: HexString;
  dgn: HexString;
  interface: InterfaceName;
  firstSeen: Timestamp;
  lastSeen: Timestamp;
  count: number;
  lastData: HexString;
};

/**
 * A decodable (DGN, instance) pair that no entity is mapped to.
 */
export type UnmappedEntry = {
  dgn: HexString;
  name: string;
  instance: number | null;
  interface: InterfaceName;
  signals: Record<string, DecodedSignal>;
  firstSeen: Timestamp;
  lastSeen: Timestamp;
  count: number;
  lastData: HexString;

  /** Entities mapped on the same DGN with another instance */
  suggestions: EntityId[];
};

export type DiagnosticCounters = {
  framesReceived: number;
  framesDecoded: number;
  unknownDgn: number;
  unmapped: number;
  partialDecodes: number;
  decodeErrors: number;
  stateChanges: number;
  subscriberDrops: number;
  commandsSent: number;
  disconnects: number;
  reconnects: number;
};

export type DiagnosticsSnapshot = {
  counters: DiagnosticCounters;
  unknownDgns: UnknownDgnEntry[];
  unmapped: UnmappedEntry[];

  /** Source addresses observed on the bus, ascending */
  sourceAddresses: number[];
};
