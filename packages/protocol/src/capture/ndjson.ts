// NDJSON frame captures
//
// One JSON object per line:
//   {"t":"2024-05-01T12:00:00.000Z","iface":"can0","id":"19FEDBF9","data":"197C6400FFFFFFFF"}
//
// Used for recording bus traffic and replaying it through the ingestion pipeline.

import { z } from 'zod';
import type { CanFrame } from '../types/frames.js';
import { fromHex, toHex } from '../types/common.js';
import { formatArbitrationId, MAX_ARBITRATION_ID } from '../identifiers.js';

const CaptureRecordSchema = z.object({
  t: z.string(),
  iface: z.string(),
  id: z.string(),
  data: z.string(),
});

/**
 * A frame as stored on one capture line
 */
export type CaptureRecord = z.infer<typeof CaptureRecordSchema>;

/**
 * Convert a capture record to a frame, or explain why it cannot be.
 */
function recordToFrame(record: unknown): CanFrame | string {
  const result = CaptureRecordSchema.safeParse(record);
  if (!result.success) {
    return 'fields t, iface, id and data must be strings';
  }

  const { t, iface, id, data } = result.data;

  const numericId = /^[0-9a-fA-F]{1,8}$/.test(id) ? parseInt(id, 16) : NaN;
  if (Number.isNaN(numericId) || numericId > MAX_ARBITRATION_ID) {
    return `invalid arbitration id "${id}"`;
  }

  const bytes = fromHex(data);
  if (!bytes || bytes.length > 8) {
    return `invalid payload "${data}"`;
  }

  return { id: numericId, data: bytes, interface: iface, timestamp: t };
}

/**
 * Parse a capture file into frames.
 *
 * @throws Error naming the first malformed line
 */
export function parseCapture(content: string): CanFrame[] {
  if (!content.trim()) {
    return [];
  }

  const lines = content.split('\n');
  const frames: CanFrame[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw new Error(
        `Failed to parse capture at line ${i + 1}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    const frame = recordToFrame(parsed);
    if (typeof frame === 'string') {
      throw new Error(`Invalid capture record at line ${i + 1}: ${frame}`);
    }
    frames.push(frame);
  }

  return frames;
}

/**
 * Format a single frame as a capture line (for appending)
 */
export function formatCaptureLine(frame: CanFrame): string {
  const record: CaptureRecord = {
    t: frame.timestamp,
    iface: frame.interface,
    id: formatArbitrationId(frame.id),
    data: toHex(frame.data),
  };
  return JSON.stringify(record) + '\n';
}

/**
 * Stringify frames to capture format
 */
export function stringifyCapture(frames: CanFrame[]): string {
  return frames.map(formatCaptureLine).join('');
}
