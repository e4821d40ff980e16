// Bit-level packing for little-endian RV-C payloads
//
// Bit n lives in byte n >> 3 at position n & 7, so a field may start anywhere
// and cross byte boundaries freely. BigInt keeps 64-bit fields exact.

/**
 * Read `length` bits starting at `startBit`.
 *
 * @returns The unsigned field value, or null when the payload is too short
 *
 * @example
 * extractBits(new Uint8Array([0x34, 0x12]), 4, 8) // 0x23n
 */
export function extractBits(bytes: Uint8Array, startBit: number, length: number): bigint | null {
  if (length <= 0 || startBit < 0 || startBit + length > bytes.length * 8) {
    return null;
  }

  let value = 0n;
  for (let i = length - 1; i >= 0; i--) {
    const bit = startBit + i;
    value = (value << 1n) | BigInt((bytes[bit >> 3] >> (bit & 7)) & 1);
  }
  return value;
}

/**
 * Write the low `length` bits of `value` starting at `startBit`.
 * Bits outside the range are left untouched.
 */
export function insertBits(bytes: Uint8Array, startBit: number, length: number, value: bigint): void {
  for (let i = 0; i < length; i++) {
    const bit = startBit + i;
    const mask = 1 << (bit & 7);
    if ((value >> BigInt(i)) & 1n) {
      bytes[bit >> 3] |= mask;
    } else {
      bytes[bit >> 3] &= ~mask;
    }
  }
}

/**
 * Interpret an unsigned field as two's complement.
 */
export function toSigned(raw: bigint, length: number): bigint {
  const signBit = 1n << BigInt(length - 1);
  return raw & signBit ? raw - (1n << BigInt(length)) : raw;
}

/**
 * Largest unsigned value a field of `length` bits can hold.
 */
export function maxRaw(length: number): bigint {
  return (1n << BigInt(length)) - 1n;
}
