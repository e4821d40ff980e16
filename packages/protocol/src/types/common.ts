// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Stable, human-assigned entity identifier (e.g. "bedroom_ceiling_light")
 */
export type EntityId = string;

/**
 * Name of a physical CAN interface (e.g. "can0")
 */
export type InterfaceName = string;

/**
 * Upper-case hexadecimal string without prefix (e.g. "1FEDA", "19FEDBF9", "197C3200")
 */
export type HexString = string;

/**
 * Instance key used by the device mapping.
 * A numeric instance matches exactly; "default" matches any instance of the DGN.
 */
export type InstanceKey = number | 'default';

/**
 * Format a byte array as upper-case hex without separators.
 *
 * @example
 * toHex(new Uint8Array([0x19, 0x7c, 0x64])) // "197C64"
 */
export function toHex(bytes: Uint8Array | readonly number[]): HexString {
  let out = '';
  for (const byte of bytes) {
    out += (byte & 0xff).toString(16).toUpperCase().padStart(2, '0');
  }
  return out;
}

/**
 * Parse a hex string (whitespace allowed between bytes) into bytes.
 * Returns null when the string is not an even run of hex digits.
 */
export function fromHex(hex: string): Uint8Array | null {
  const compact = hex.replace(/\s+/g, '');
  if (compact.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(compact)) {
    return null;
  }

  const bytes = new Uint8Array(compact.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(compact.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
