// Frame decoder
//
// Pure: (arbitration id, payload) -> DecodedFrame. Never throws on bus input;
// unknown DGNs and short payloads are reported in the result instead.

import type { CanFrame, DecodedFrame, DecodedSignal, SignalDefinition } from '@rvlink/protocol';
import { parseArbitrationId, toHex } from '@rvlink/protocol';
import type { SpecificationTable } from '../tables/specification-table.js';
import { extractBits, maxRaw, toSigned } from './bits.js';

/**
 * Whether a signal reserves its all-ones raw value for "not available"
 * (and, at a byte or wider, all-ones minus one for "error").
 */
export function usesSentinels(signal: SignalDefinition): boolean {
  if (signal.sentinels !== undefined) {
    return signal.sentinels;
  }
  return (signal.encoding === 'uint' || signal.encoding === 'enum') && signal.length >= 2;
}

/**
 * What a raw bit pattern stands for when it is a sentinel, or null for an
 * ordinary value. An enum label on the pattern takes precedence.
 */
export function sentinelReason(signal: SignalDefinition, bits: bigint): 'not_available' | 'error' | null {
  if (!usesSentinels(signal)) {
    return null;
  }
  if (signal.encoding === 'enum' && signal.labels?.[Number(bits)] !== undefined) {
    return null;
  }
  const max = maxRaw(signal.length);
  if (bits === max) {
    return 'not_available';
  }
  if (signal.length >= 8 && bits === max - 1n) {
    return 'error';
  }
  return null;
}

/**
 * Round away binary floating point noise (0.05 * 261 is 13.05, not
 * 13.050000000000001). Fifteen significant digits is the most a double
 * always round-trips.
 */
export function roundSignificant(value: number): number {
  return Number(value.toPrecision(15));
}

/**
 * raw * scale + offset
 */
export function scaleRaw(raw: number, signal: SignalDefinition): number {
  return roundSignificant(raw * signal.scale + signal.offset);
}

function decodeAscii(bytes: Uint8Array, signal: SignalDefinition): DecodedSignal {
  const start = signal.startBit >> 3;
  const end = start + (signal.length >> 3);
  if (end > bytes.length) {
    return { status: 'unknown', raw: null, reason: 'missing' };
  }

  const text = Array.from(bytes.subarray(start, end))
    .filter((byte) => byte !== 0x00 && byte !== 0xff)
    .map((byte) => String.fromCharCode(byte))
    .join('');
  return { status: 'ok', raw: null, value: text };
}

/**
 * Decode one signal from a payload.
 *
 * Labels take precedence over sentinels: an enum that names its top value
 * decodes to that label rather than to "not available".
 */
export function decodeSignal(bytes: Uint8Array, signal: SignalDefinition): DecodedSignal {
  if (signal.encoding === 'ascii') {
    return decodeAscii(bytes, signal);
  }

  const bits = extractBits(bytes, signal.startBit, signal.length);
  if (bits === null) {
    return { status: 'unknown', raw: null, reason: 'missing' };
  }

  const raw = Number(signal.encoding === 'int' ? toSigned(bits, signal.length) : bits);
  const sentinel = sentinelReason(signal, bits);
  if (sentinel) {
    return { status: 'unknown', raw, reason: sentinel };
  }

  const decoded: Extract<DecodedSignal, { status: 'ok' }> = { status: 'ok', raw, value: scaleRaw(raw, signal) };

  if (signal.encoding === 'enum') {
    const label = signal.labels?.[raw];
    if (label !== undefined) {
      decoded.label = label;
    }
  }

  if (signal.encoding === 'bitmask' && signal.labels) {
    decoded.flags = Object.entries(signal.labels)
      .filter(([bit]) => (bits >> BigInt(bit)) & 1n)
      .map(([, name]) => name);
  }

  if (signal.unit) {
    decoded.unit = signal.unit;
  }

  return decoded;
}

/**
 * Decode a frame against the specification table.
 *
 * @example
 * const decoded = decodeFrame({ id: 0x19feda80, data }, specification);
 * if (decoded.success) {
 *   console.log(decoded.name, decoded.instance, decoded.signals);
 * }
 */
export function decodeFrame(
  frame: Pick<CanFrame, 'id' | 'data'>,
  specification: SpecificationTable
): DecodedFrame {
  const { priority, dgn, sourceAddress, destinationAddress } = parseArbitrationId(frame.id);
  const data = toHex(frame.data);
  const definition = specification.lookup(dgn);

  if (!definition) {
    return {
      dgn,
      name: null,
      priority,
      sourceAddress,
      destinationAddress,
      instance: null,
      signals: {},
      success: false,
      partial: false,
      data,
    };
  }

  const signals: Record<string, DecodedSignal> = {};
  let partial = false;
  for (const signal of definition.signals) {
    const decoded = decodeSignal(frame.data, signal);
    if (decoded.status === 'unknown' && decoded.reason === 'missing') {
      partial = true;
    }
    signals[signal.name] = decoded;
  }

  let instance: number | null = null;
  if (definition.instanceSignal !== null) {
    const decoded = signals[definition.instanceSignal];
    if (decoded?.status === 'ok' && typeof decoded.raw === 'number') {
      instance = decoded.raw;
    }
  }

  return {
    dgn: definition.dgn,
    name: definition.name,
    priority,
    sourceAddress,
    destinationAddress,
    instance,
    signals,
    success: true,
    partial,
    data,
  };
}
