// Tests for frame capture formats

import { describe, it, expect } from 'vitest';
import { parseCapture, stringifyCapture, formatCaptureLine } from './ndjson.js';
import { parseCandumpLine, formatCansendArgument } from './candump.js';
import type { CanFrame } from '../types/frames.js';

function createMockFrame(overrides: Partial<CanFrame> = {}): CanFrame {
  return {
    id: 0x19fedbf9,
    data: new Uint8Array([0x19, 0x7c, 0x64, 0x00, 0x00, 0xff, 0xff, 0xff]),
    interface: 'can0',
    timestamp: '2024-05-01T12:00:00.000Z',
    ...overrides,
  };
}

describe('NDJSON captures', () => {
  it('formats one record per line', () => {
    expect(formatCaptureLine(createMockFrame())).toBe(
      '{"t":"2024-05-01T12:00:00.000Z","iface":"can0","id":"19FEDBF9","data":"197C640000FFFFFF"}\n'
    );
  });

  it('parses what it writes', () => {
    const frames = [createMockFrame(), createMockFrame({ id: 0x19feda80, interface: 'can1' })];
    const parsed = parseCapture(stringifyCapture(frames));

    expect(parsed).toHaveLength(2);
    expect(parsed[1].id).toBe(0x19feda80);
    expect(parsed[1].interface).toBe('can1');
    expect(Array.from(parsed[0].data)).toEqual([0x19, 0x7c, 0x64, 0x00, 0x00, 0xff, 0xff, 0xff]);
  });

  it('skips blank lines and returns nothing for empty content', () => {
    expect(parseCapture('')).toEqual([]);
    expect(parseCapture('\n\n')).toEqual([]);
  });

  it('names the line of a malformed record', () => {
    const content = formatCaptureLine(createMockFrame()) + '{"t":"x","iface":"can0","id":"ZZ","data":"00"}\n';
    expect(() => parseCapture(content)).toThrow('Invalid capture record at line 2: invalid arbitration id "ZZ"');
  });

  it('rejects lines that are not JSON', () => {
    expect(() => parseCapture('not json')).toThrow(/^Failed to parse capture at line 1/);
  });
});

describe('candump lines', () => {
  it('parses a log line', () => {
    const frame = parseCandumpLine('(1714564800.250000) can0 19FEDAF9#197C64');
    expect(frame).not.toBeNull();
    expect(frame?.id).toBe(0x19fedaf9);
    expect(frame?.interface).toBe('can0');
    expect(frame?.timestamp).toBe('2024-05-01T12:00:00.250Z');
    expect(Array.from(frame?.data ?? [])).toEqual([0x19, 0x7c, 0x64]);
  });

  it('ignores lines it cannot read', () => {
    expect(parseCandumpLine('')).toBeNull();
    expect(parseCandumpLine('# comment')).toBeNull();
    expect(parseCandumpLine('(1.0) can0 123#R')).toBeNull();
  });

  it('formats the cansend argument', () => {
    expect(formatCansendArgument(createMockFrame())).toBe('19FEDBF9#197C640000FFFFFF');
  });
});
