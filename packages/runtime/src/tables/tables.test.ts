// Tests for the specification and device tables

import { describe, it, expect } from 'vitest';
import type { EntityDescriptor } from '@rvlink/protocol';
import { DeviceTable } from './device-table.js';
import { SpecificationTable } from './specification-table.js';
import { ConfigurationError } from '../errors.js';
import { createCapturingLogger } from '../logging.js';
import {
  DIMMER_COMMAND_DGN,
  DIMMER_STATUS_DGN,
  LOCK_STATUS_DGN,
  createMockSpecificationDocument,
  createMockTables,
} from '../test-fixtures.js';

// --- Test Fixtures ---

function createMockDescriptor(overrides: Partial<EntityDescriptor> = {}): EntityDescriptor {
  return {
    entityId: 'step_light',
    friendlyName: 'Step Light',
    area: 'entrance',
    deviceClass: 'light',
    capabilities: ['on_off'],
    dgn: DIMMER_COMMAND_DGN,
    instance: 40,
    interface: 'can0',
    groups: [],
    ...overrides,
  };
}

// --- Tests ---

describe('SpecificationTable', () => {
  it('should look up definitions by DGN and name', () => {
    const { specification } = createMockTables();

    expect(specification.size).toBe(5);
    expect(specification.get(DIMMER_STATUS_DGN)?.name).toBe('DC_DIMMER_STATUS_3');
    expect(specification.getByName('DC_DIMMER_COMMAND_2')?.dgn).toBe(DIMMER_COMMAND_DGN);
    expect(specification.has(0x1ffff)).toBe(false);
  });

  it('should fall back to the base DGN for destination-specific DGNs', () => {
    const specification = SpecificationTable.fromDocument({
      messages: [{ dgn: '0EA00', name: 'ISO_REQUEST', signals: [] }],
    });

    expect(specification.get(0x0ea80)).toBeUndefined();
    expect(specification.lookup(0x0ea80)?.name).toBe('ISO_REQUEST');
  });

  it('should throw a ConfigurationError listing every problem', () => {
    const document = createMockSpecificationDocument();
    document.messages.push({ dgn: '1FEDA', name: 'AGAIN', signals: [] });

    expect(() => SpecificationTable.fromDocument(document)).toThrow(ConfigurationError);
    expect(() => SpecificationTable.fromDocument(document)).toThrow(
      'Invalid specification:\n  - messages[5].dgn: DGN 1FEDA is defined more than once'
    );
  });

  it('should log validation warnings', () => {
    const logger = createCapturingLogger();
    SpecificationTable.fromDocument({ messages: [] }, logger);

    expect(logger.entries.map((entry) => entry.level)).toEqual(['warn']);
  });
});

describe('DeviceTable', () => {
  it('should index descriptors by primary and status key', () => {
    const { devices } = createMockTables();

    expect(devices.size).toBe(6);
    expect(devices.findPrimary(DIMMER_COMMAND_DGN, 25)?.entityId).toBe('bedroom_ceiling_light');
    expect(devices.findStatus(DIMMER_STATUS_DGN, 25)?.entityId).toBe('bedroom_ceiling_light');
    expect(devices.findStatus(LOCK_STATUS_DGN, 30)?.entityId).toBe('entrance_door_lock');
    expect(devices.findStatus(DIMMER_STATUS_DGN, 30)).toBeUndefined();
  });

  it('should keep the coach info', () => {
    const { devices } = createMockTables();
    expect(devices.coachInfo).toEqual({ make: 'Test Coach', model: 'T1', year: '2021' });
  });

  it('should filter listings', () => {
    const { devices } = createMockTables();

    expect(devices.list({ area: 'galley' }).map((d) => d.entityId)).toEqual(['galley_light']);
    expect(devices.list({ deviceClass: 'sensor' }).map((d) => d.entityId)).toEqual([
      'bedroom_thermometer',
      'ambient_temperature',
    ]);
    expect(devices.list({ group: 'interior' }).map((d) => d.entityId)).toEqual([
      'bedroom_ceiling_light',
      'galley_light',
    ]);
  });

  it('should reject two devices on the same key', () => {
    const descriptors = [
      createMockDescriptor(),
      createMockDescriptor({ entityId: 'other_step_light' }),
    ];

    expect(() => new DeviceTable(descriptors)).toThrow(
      'Invalid device table:\n  - More than one device is mapped to 1FEDB:40'
    );
  });

  it('should reject a reused entity id', () => {
    const descriptors = [createMockDescriptor(), createMockDescriptor({ instance: 41 })];

    expect(() => new DeviceTable(descriptors)).toThrow('Entity id "step_light" is used more than once');
  });
});
