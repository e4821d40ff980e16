// candump log format
//
// `candump -L` writes one frame per line:
//   (1714564800.123456) can0 19FEDBF9#197C6400FFFFFFFF

import type { CanFrame, OutboundFrame } from '../types/frames.js';
import { fromHex, toHex } from '../types/common.js';
import { formatArbitrationId } from '../identifiers.js';

const CANDUMP_LINE = /^\((\d+(?:\.\d+)?)\)\s+(\S+)\s+([0-9A-Fa-f]{3,8})#([0-9A-Fa-f]*)$/;

/**
 * Parse one candump log line. Returns null for blank, comment or
 * non-matching lines (remote frames, CAN FD frames).
 */
export function parseCandumpLine(line: string): CanFrame | null {
  const match = CANDUMP_LINE.exec(line.trim());
  if (!match) {
    return null;
  }

  const [, seconds, iface, id, payload] = match;
  const data = fromHex(payload);
  if (!data || data.length > 8) {
    return null;
  }

  return {
    id: parseInt(id, 16),
    data,
    interface: iface,
    timestamp: new Date(Math.round(parseFloat(seconds) * 1000)).toISOString(),
  };
}

/**
 * Format a frame the way `cansend` expects it: `19FEDBF9#197C6400FFFFFFFF`
 */
export function formatCansendArgument(frame: OutboundFrame): string {
  return `${formatArbitrationId(frame.id)}#${toHex(frame.data)}`;
}
