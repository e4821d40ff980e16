// Raw and decoded CAN frames

import type { HexString, InterfaceName, Timestamp } from './common.js';

/**
 * A frame as delivered by a bus interface.
 */
export type CanFrame = {
  /** 29-bit extended arbitration identifier */
  id: number;

  /** Up to 8 payload bytes */
  data: Uint8Array;

  /** Interface the frame was received on */
  interface: InterfaceName;

  timestamp: Timestamp;
};

/**
 * A frame to be written to a bus interface.
 */
export type OutboundFrame = Omit<CanFrame, 'timestamp'>;

/**
 * Fields carried by a 29-bit RV-C / J1939 identifier.
 */
export type ArbitrationFields = {
  priority: number;
  dgn: number;
  sourceAddress: number;
  /** PDU1 destination address, null for PDU2 (broadcast) DGNs */
  destinationAddress: number | null;
};

/**
 * Why a signal has no usable value.
 *
 * - not_available: the sender reported the all-ones "not available" pattern
 * - error: the sender reported the "error" pattern
 * - missing: the payload was too short to contain the signal
 */
export type UnknownReason = 'not_available' | 'error' | 'missing';

/**
 * A decoded signal value.
 */
export type DecodedSignal =
  | {
      status: 'ok';
      /** Raw integer before scaling (null for ascii) */
      raw: number | null;
      value: number | string;
      label?: string;
      flags?: string[];
      unit?: string;
    }
  | {
      status: 'unknown';
      raw: number | null;
      reason: UnknownReason;
    };

/**
 * Result of decoding one frame against the specification table.
 */
export type DecodedFrame = {
  dgn: number;

  /** Message name, null when the DGN is not in the specification */
  name: string | null;

  priority: number;
  sourceAddress: number;
  destinationAddress: number | null;

  /** Device instance, null when the message carries none or it is unavailable */
  instance: number | null;

  signals: Record<string, DecodedSignal>;

  /** A definition was found for the DGN */
  success: boolean;

  /** At least one signal lay beyond the end of the payload */
  partial: boolean;

  data: HexString;
};
