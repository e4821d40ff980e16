// 29-bit arbitration identifier helpers
//
// RV-C reuses the J1939 extended identifier layout:
//
//   bits 26..28  priority
//   bit  25      reserved
//   bit  24      data page
//   bits 16..23  PDU format (PF)
//   bits  8..15  PDU specific (PS)
//   bits  0..7   source address
//
// The DGN is data page + PF + PS. When PF < 0xF0 (PDU1) the PS byte is a
// destination address rather than part of the message type.

import type { ArbitrationFields } from './types/frames.js';
import type { HexString } from './types/common.js';

export const MAX_ARBITRATION_ID = 0x1fffffff;
export const BROADCAST_ADDRESS = 0xff;

/**
 * True when the DGN uses the PDU1 (destination-specific) format.
 */
export function isPdu1(dgn: number): boolean {
  return ((dgn >> 8) & 0xff) < 0xf0;
}

/**
 * Clear the destination byte of a PDU1 DGN. PDU2 DGNs are returned unchanged.
 */
export function dgnBase(dgn: number): number {
  return isPdu1(dgn) ? dgn & 0x1ff00 : dgn;
}

/**
 * Split an extended identifier into its fields.
 *
 * @example
 * parseArbitrationId(0x19fedbf9)
 * // { priority: 6, dgn: 0x1fedb, sourceAddress: 0xf9, destinationAddress: null }
 */
export function parseArbitrationId(id: number): ArbitrationFields {
  const masked = id & MAX_ARBITRATION_ID;
  const priority = (masked >>> 26) & 0x7;
  const dgn = (masked >>> 8) & 0x1ffff;
  const sourceAddress = masked & 0xff;

  return {
    priority,
    dgn,
    sourceAddress,
    destinationAddress: isPdu1(dgn) ? dgn & 0xff : null,
  };
}

/**
 * Build an extended identifier.
 * For PDU1 DGNs the destination address replaces the PS byte
 * (broadcast when omitted).
 */
export function buildArbitrationId(fields: {
  priority: number;
  dgn: number;
  sourceAddress: number;
  destinationAddress?: number | null;
}): number {
  const { priority, sourceAddress } = fields;
  let dgn = fields.dgn & 0x1ffff;

  if (isPdu1(dgn)) {
    dgn = (dgn & 0x1ff00) | ((fields.destinationAddress ?? BROADCAST_ADDRESS) & 0xff);
  }

  // Multiplication keeps the result positive; `<< 26` would overflow into the sign bit.
  return (priority & 0x7) * 0x4000000 + dgn * 0x100 + (sourceAddress & 0xff);
}

/**
 * Format a DGN as five upper-case hex digits.
 *
 * @example
 * formatDgn(0x1feda) // "1FEDA"
 */
export function formatDgn(dgn: number): HexString {
  return dgn.toString(16).toUpperCase().padStart(5, '0');
}

/**
 * Parse a hex DGN string ("1FEDA", "0x1FEDA"). Returns null when invalid.
 */
export function parseDgn(value: string): number | null {
  const trimmed = value.trim().replace(/^0x/i, '');
  if (!/^[0-9a-fA-F]{1,5}$/.test(trimmed)) {
    return null;
  }
  const dgn = parseInt(trimmed, 16);
  return dgn <= 0x1ffff ? dgn : null;
}

/**
 * Format an arbitration identifier as eight upper-case hex digits.
 */
export function formatArbitrationId(id: number): HexString {
  return (id >>> 0).toString(16).toUpperCase().padStart(8, '0');
}
