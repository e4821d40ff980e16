// Signal packing for outbound frames

import type { MessageDefinition, SignalDefinition } from '@rvlink/protocol';
import { InvalidParameterError, ValidationError } from '../errors.js';
import { roundSignificant, sentinelReason, usesSentinels } from '../decoder/decode.js';
import { insertBits, maxRaw } from '../decoder/bits.js';

/**
 * Inclusive range of engineering values a signal can carry
 */
export type LegalRange = {
  min: number;
  max: number;
};

/**
 * The range a signal accepts when encoding: whatever its raw bit range maps
 * to after scale and offset, narrowed by its declared min/max. An unsigned
 * signal with sentinels loses its reserved top values.
 */
export function legalRange(signal: SignalDefinition): LegalRange {
  const signed = signal.encoding === 'int';
  const rawMin = signed ? -Number(1n << BigInt(signal.length - 1)) : 0;
  let rawMax = signed ? Number((1n << BigInt(signal.length - 1)) - 1n) : Number(maxRaw(signal.length));
  if (signal.encoding === 'uint' && usesSentinels(signal)) {
    rawMax -= signal.length >= 8 ? 2 : 1;
  }

  const low = roundSignificant(rawMin * signal.scale + signal.offset);
  const high = roundSignificant(rawMax * signal.scale + signal.offset);
  const lower = Math.min(low, high);
  const upper = Math.max(low, high);

  return {
    min: signal.min === undefined ? lower : Math.max(signal.min, lower),
    max: signal.max === undefined ? upper : Math.min(signal.max, upper),
  };
}

/**
 * Check an engineering value against a signal's legal range. Values whose
 * raw pattern would decode as "not available" or "error" are refused.
 *
 * @param parameter - Name reported in the error (defaults to the signal name)
 * @throws InvalidParameterError when the value is not finite, out of range or reserved
 */
export function checkValue(signal: SignalDefinition, value: number, parameter = signal.name): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(parameter, 'must be a finite number', { value });
  }
  const { min, max } = legalRange(signal);
  if (value < min || value > max) {
    throw new InvalidParameterError(parameter, `must be between ${min} and ${max}`, { value, min, max });
  }
  if (sentinelReason(signal, rawPattern(signal, value)) !== null) {
    throw new InvalidParameterError(parameter, 'is a reserved value', { value });
  }
}

function rawPattern(signal: SignalDefinition, value: number): bigint {
  return BigInt.asUintN(signal.length, BigInt(toRaw(signal, value)));
}

/**
 * round((value - offset) / scale)
 */
export function toRaw(signal: SignalDefinition, value: number): number {
  return Math.round((value - signal.offset) / signal.scale);
}

/**
 * Pack engineering values into a zero-filled payload of the message's length.
 * Signals without a value stay zero.
 *
 * @throws InvalidParameterError when a value is out of range
 * @throws ValidationError when a value names no signal of the message
 */
export function encodeSignals(definition: MessageDefinition, values: Readonly<Record<string, number>>): Uint8Array {
  const bytes = new Uint8Array(definition.length);

  for (const [name, value] of Object.entries(values)) {
    const signal = definition.signals.find((candidate) => candidate.name === name);
    if (!signal) {
      throw new ValidationError(`${definition.name} has no signal "${name}"`, { field: name });
    }
    if (signal.encoding === 'ascii') {
      throw new ValidationError(`Signal "${name}" of ${definition.name} cannot be encoded from a number`, {
        field: name,
      });
    }

    checkValue(signal, value);
    insertBits(bytes, signal.startBit, signal.length, rawPattern(signal, value));
  }

  return bytes;
}
