// Tests for entity resolution

import { describe, it, expect } from 'vitest';
import type { EntityDescriptor } from '@rvlink/protocol';
import { resolveEntity } from './resolve.js';
import { DeviceTable } from '../tables/device-table.js';
import {
  AMBIENT_STATUS_DGN,
  DIMMER_COMMAND_DGN,
  DIMMER_STATUS_DGN,
  LOCK_STATUS_DGN,
  createMockTables,
} from '../test-fixtures.js';

// --- Test Fixtures ---

function createMockDescriptor(overrides: Partial<EntityDescriptor> = {}): EntityDescriptor {
  return {
    entityId: 'test_entity',
    friendlyName: 'Test Entity',
    area: 'test',
    deviceClass: 'light',
    capabilities: ['on_off'],
    dgn: 0x1fedb,
    instance: 1,
    interface: 'can0',
    groups: [],
    ...overrides,
  };
}

// --- Tests ---

describe('resolveEntity', () => {
  const { devices } = createMockTables();

  function resolvedId(dgn: number, instance: number | null): string | null {
    return resolveEntity({ dgn, instance }, devices)?.entityId ?? null;
  }

  it('should resolve an exact primary key', () => {
    expect(resolvedId(DIMMER_COMMAND_DGN, 25)).toBe('bedroom_ceiling_light');
  });

  it('should resolve a companion status DGN to its entity', () => {
    expect(resolvedId(DIMMER_STATUS_DGN, 25)).toBe('bedroom_ceiling_light');
    expect(resolvedId(DIMMER_STATUS_DGN, 26)).toBe('galley_light');
    expect(resolvedId(LOCK_STATUS_DGN, 30)).toBe('entrance_door_lock');
  });

  it('should prefer an exact instance over the default', () => {
    expect(resolvedId(AMBIENT_STATUS_DGN, 1)).toBe('bedroom_thermometer');
  });

  it('should fall back to the default entry for other instances', () => {
    expect(resolvedId(AMBIENT_STATUS_DGN, 7)).toBe('ambient_temperature');
  });

  it('should use the default entry for frames without an instance', () => {
    expect(resolvedId(AMBIENT_STATUS_DGN, null)).toBe('ambient_temperature');
  });

  it('should return null for unmapped pairs', () => {
    expect(resolvedId(DIMMER_STATUS_DGN, 99)).toBeNull();
    expect(resolvedId(0x1ffb7, 0)).toBeNull();
  });

  it('should let an exact status key beat a default primary key', () => {
    const table = new DeviceTable([
      createMockDescriptor({ entityId: 'catch_all', dgn: 0x1fe00, instance: 'default' }),
      createMockDescriptor({ entityId: 'specific', dgn: 0x1fd00, instance: 5, statusDgn: 0x1fe00 }),
    ]);

    expect(resolveEntity({ dgn: 0x1fe00, instance: 5 }, table)?.entityId).toBe('specific');
    expect(resolveEntity({ dgn: 0x1fe00, instance: 6 }, table)?.entityId).toBe('catch_all');
  });
});
