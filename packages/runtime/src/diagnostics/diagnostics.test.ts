// Tests for diagnostics counters and registries

import { describe, it, expect, vi } from 'vitest';
import type { CanFrame } from '@rvlink/protocol';
import { Diagnostics } from './diagnostics.js';
import type { DiagnosticEvent } from './diagnostics.js';
import { decodeFrame } from '../decoder/decode.js';
import { DecodeFailure, ResolutionMiss } from '../errors.js';
import { createCapturingLogger } from '../logging.js';
import { AMBIENT_STATUS_DGN, DIMMER_STATUS_DGN, createMockTables, statusId } from '../test-fixtures.js';

// --- Test Fixtures ---

function createMockFrame(id: number, data: number[], second: number): CanFrame {
  return {
    id,
    data: Uint8Array.from(data),
    interface: 'can0',
    timestamp: `2024-01-01T00:00:${String(second).padStart(2, '0')}.000Z`,
  };
}

function recordUnknown(diagnostics: Diagnostics, frame: CanFrame) {
  const { specification } = createMockTables();
  return diagnostics.recordUnknownDgn(frame, decodeFrame(frame, specification));
}

function recordUnmapped(diagnostics: Diagnostics, frame: CanFrame) {
  const { specification } = createMockTables();
  const decoded = decodeFrame(frame, specification);
  return diagnostics.recordUnmapped(frame, decoded, new ResolutionMiss(decoded.dgn, decoded.instance));
}

// --- Tests ---

describe('Diagnostics', () => {
  describe('unknown DGNs', () => {
    it('should aggregate repeats of the same identifier', () => {
      const diagnostics = new Diagnostics();

      recordUnknown(diagnostics, createMockFrame(0x18999980, [1], 1));
      const entry = recordUnknown(diagnostics, createMockFrame(0x18999980, [2], 5));

      expect(entry).toEqual({
        arbitrationId: '18999980',
        dgn: '09999',
        interface: 'can0',
        firstSeen: '2024-01-01T00:00:01.000Z',
        lastSeen: '2024-01-01T00:00:05.000Z',
        count: 2,
        lastData: '02',
      });
      expect(diagnostics.counters().unknownDgn).toBe(2);
    });

    it('should list the most frequent first', () => {
      const diagnostics = new Diagnostics();

      recordUnknown(diagnostics, createMockFrame(0x18999980, [], 1));
      recordUnknown(diagnostics, createMockFrame(0x19123480, [], 2));
      recordUnknown(diagnostics, createMockFrame(0x19123480, [], 3));

      expect(diagnostics.unknownDgns().map((entry) => entry.arbitrationId)).toEqual(['19123480', '18999980']);
    });
  });

  describe('unmapped pairs', () => {
    it('should suggest entities on the same DGN', () => {
      const { devices } = createMockTables();
      const diagnostics = new Diagnostics({ devices });

      const entry = recordUnmapped(diagnostics, createMockFrame(statusId(AMBIENT_STATUS_DGN), [9, 0xf0, 0x24], 1));

      expect(entry.instance).toBe(9);
      expect(entry.name).toBe('THERMOSTAT_AMBIENT_STATUS');
      expect(entry.suggestions).toEqual(['bedroom_thermometer', 'ambient_temperature']);
    });

    it('should order entries by DGN then instance', () => {
      const diagnostics = new Diagnostics();

      recordUnmapped(diagnostics, createMockFrame(statusId(AMBIENT_STATUS_DGN), [9, 0, 0], 1));
      recordUnmapped(diagnostics, createMockFrame(statusId(DIMMER_STATUS_DGN), [80, 0, 0, 0, 0, 0, 0, 0], 2));
      recordUnmapped(diagnostics, createMockFrame(statusId(DIMMER_STATUS_DGN), [70, 0, 0, 0, 0, 0, 0, 0], 3));

      expect(diagnostics.unmapped().map((entry) => `${entry.dgn}:${entry.instance}`)).toEqual([
        '1FEDA:70',
        '1FEDA:80',
        '1FF9C:9',
      ]);
      expect(diagnostics.unmapped()[0].suggestions).toEqual([]);
    });
  });

  describe('events', () => {
    it('should notify listeners until they unsubscribe', () => {
      const diagnostics = new Diagnostics();
      const events: DiagnosticEvent[] = [];
      const unsubscribe = diagnostics.onEvent((event) => events.push(event));

      diagnostics.recordDisconnect('can0', 'link down');
      unsubscribe();
      diagnostics.recordReconnect('can0', 1);

      expect(events).toEqual([{ type: 'disconnect', interface: 'can0', reason: 'link down' }]);
      expect(diagnostics.counters()).toMatchObject({ disconnects: 1, reconnects: 1 });
    });

    it('should log a failing listener and keep going', () => {
      const logger = createCapturingLogger();
      const diagnostics = new Diagnostics({ logger });
      const second = vi.fn();
      diagnostics.onEvent(() => {
        throw new Error('listener broke');
      });
      diagnostics.onEvent(second);

      diagnostics.recordSubscriberDrop(3, 12);

      expect(second).toHaveBeenCalledWith({ type: 'subscriber_drop', subscriberId: 3, dropped: 12 });
      expect(logger.entries).toHaveLength(1);
      expect(logger.entries[0]).toMatchObject({
        level: 'warn',
        message: 'Diagnostics listener failed',
        data: { type: 'subscriber_drop', error: 'listener broke' },
      });
    });
  });

  it('should log decode errors', () => {
    const logger = createCapturingLogger();
    const diagnostics = new Diagnostics({ logger });

    diagnostics.recordDecodeError('can1', new DecodeFailure(0x19feda80, 'bad payload'));

    expect(diagnostics.counters().decodeErrors).toBe(1);
    expect(logger.entries[0]).toMatchObject({
      level: 'warn',
      message: 'Frame processing failed',
      data: {
        interface: 'can1',
        arbitrationId: '19FEDA80',
        error: 'Cannot decode frame 19FEDA80: bad payload',
      },
    });
  });

  it('should count partial decodes', () => {
    const { specification } = createMockTables();
    const diagnostics = new Diagnostics();
    const frame = createMockFrame(statusId(DIMMER_STATUS_DGN), [25, 0x7c, 100], 1);

    diagnostics.recordDecoded(decodeFrame(frame, specification));

    expect(diagnostics.counters()).toMatchObject({ framesDecoded: 1, partialDecodes: 1 });
  });
});
