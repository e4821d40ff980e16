// Message and signal definitions (the protocol specification table)

/**
 * How a signal's raw bits are interpreted.
 *
 * - uint: unsigned integer, scaled
 * - int: two's complement signed integer, scaled
 * - enum: unsigned integer with a label map
 * - bitmask: unsigned integer whose set bits name flags
 * - ascii: raw bytes read as text
 */
export type SignalEncoding = 'uint' | 'int' | 'enum' | 'bitmask' | 'ascii';

/**
 * One named value packed into a fixed bit range of a message payload.
 * Bits are numbered LSB-first across the little-endian payload, so bit 0 is
 * the lowest bit of byte 0 and bit 8 the lowest bit of byte 1.
 */
export type SignalDefinition = {
  name: string;

  /** First bit of the signal within the payload */
  startBit: number;

  /** Width in bits (1..64) */
  length: number;

  encoding: SignalEncoding;

  /** Engineering value = raw * scale + offset */
  scale: number;
  offset: number;

  unit?: string;

  /**
   * enum: raw value -> label.
   * bitmask: bit index -> flag name.
   */
  labels?: Readonly<Record<number, string>>;

  /** Lowest legal engineering value accepted when encoding */
  min?: number;

  /** Highest legal engineering value accepted when encoding */
  max?: number;

  /**
   * Whether the all-ones "not available" and all-ones-minus-one "error"
   * patterns decode to an unknown value. Defaults to true for uint and enum
   * signals of two or more bits.
   */
  sentinels?: boolean;
};

/**
 * A message type identified by its Data Group Number.
 */
export type MessageDefinition = {
  /** 17-bit Data Group Number */
  dgn: number;

  /** Protocol name, e.g. "DC_DIMMER_STATUS_3" */
  name: string;

  /** Payload length in bytes (8 for every single-frame RV-C message) */
  length: number;

  /**
   * Name of the signal carrying the device instance, or null when the
   * message has none.
   */
  instanceSignal: string | null;

  signals: readonly SignalDefinition[];
};
