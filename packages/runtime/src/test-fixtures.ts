// Shared test fixtures for runtime tests

import type { DeviceMappingDocument, SpecificationDocument } from '@rvlink/protocol';
import { buildArbitrationId } from '@rvlink/protocol';
import { SpecificationTable } from './tables/specification-table.js';
import { DeviceTable } from './tables/device-table.js';

export const DIMMER_STATUS_DGN = 0x1feda;
export const DIMMER_COMMAND_DGN = 0x1fedb;
export const LOCK_STATUS_DGN = 0x1fedc;
export const AMBIENT_STATUS_DGN = 0x1ff9c;
export const TANK_STATUS_DGN = 0x1ffb7;

export function createMockSpecificationDocument(): SpecificationDocument {
  return {
    version: 'test',
    messages: [
      {
        dgn: '1FEDA',
        name: 'DC_DIMMER_STATUS_3',
        signals: [
          { name: 'instance', start_bit: 0, length: 8 },
          { name: 'group', start_bit: 8, length: 8, type: 'bitmask' },
          { name: 'operating_status', start_bit: 16, length: 8, scale: 0.5, unit: '%' },
          { name: 'lock_status', start_bit: 24, length: 2, type: 'enum', values: { '0': 'unlocked', '1': 'locked' } },
          { name: 'delay_duration', start_bit: 32, length: 8, unit: 's' },
          {
            name: 'last_command',
            start_bit: 40,
            length: 8,
            type: 'enum',
            values: { '0': 'set_level', '3': 'off', '5': 'toggle' },
          },
        ],
      },
      {
        dgn: '1FEDB',
        name: 'DC_DIMMER_COMMAND_2',
        signals: [
          { name: 'instance', start_bit: 0, length: 8 },
          { name: 'group', start_bit: 8, length: 8, type: 'bitmask' },
          { name: 'desired_level', start_bit: 16, length: 8, scale: 0.5, min: 0, max: 100, unit: '%' },
          {
            name: 'command',
            start_bit: 24,
            length: 8,
            type: 'enum',
            values: { '0': 'set_level', '3': 'off', '5': 'toggle', '21': 'lock', '22': 'unlock' },
          },
          { name: 'delay_duration', start_bit: 32, length: 8, unit: 's' },
          { name: 'interlock', start_bit: 40, length: 2, type: 'enum' },
        ],
      },
      {
        dgn: '1FEDC',
        name: 'DOOR_LOCK_STATUS',
        signals: [
          { name: 'instance', start_bit: 0, length: 8 },
          { name: 'lock_status', start_bit: 8, length: 2, type: 'enum', values: { '0': 'unlocked', '1': 'locked' } },
        ],
      },
      {
        dgn: '1FF9C',
        name: 'THERMOSTAT_AMBIENT_STATUS',
        signals: [
          { name: 'instance', start_bit: 0, length: 8 },
          { name: 'ambient_temp', start_bit: 8, length: 16, scale: 0.03125, offset: -273, unit: '°C' },
        ],
      },
      {
        dgn: '1FFB7',
        name: 'TANK_STATUS',
        signals: [
          { name: 'instance', start_bit: 0, length: 8 },
          { name: 'relative_level', start_bit: 8, length: 8 },
          { name: 'resolution', start_bit: 16, length: 8 },
        ],
      },
    ],
  };
}

export function createMockMappingDocument(): DeviceMappingDocument {
  return {
    coach_info: { make: 'Test Coach', model: 'T1', year: 2021 },
    templates: {
      dimmable_light: {
        device_type: 'light',
        capabilities: ['on_off', 'brightness'],
        group_mask: '0x7C',
        groups: ['interior'],
      },
    },
    dgn_pairs: { '1FEDB': '1FEDA' },
    devices: {
      '1FEDB': {
        '25': [
          {
            template: 'dimmable_light',
            entity_id: 'bedroom_ceiling_light',
            friendly_name: 'Bedroom Ceiling Light',
            suggested_area: 'bedroom',
          },
        ],
        '26': [
          {
            template: 'dimmable_light',
            entity_id: 'galley_light',
            friendly_name: 'Galley Light',
            suggested_area: 'galley',
          },
        ],
        '27': [
          {
            entity_id: 'porch_light',
            friendly_name: 'Porch Light',
            suggested_area: 'exterior',
            device_type: 'switch',
            capabilities: ['on_off'],
            groups: ['exterior'],
          },
        ],
        '30': [
          {
            entity_id: 'entrance_door_lock',
            friendly_name: 'Entrance Door Lock',
            suggested_area: 'entrance',
            device_type: 'lock',
            capabilities: ['lock_unlock'],
            status_dgn: '1FEDC',
          },
        ],
      },
      '1FF9C': {
        '1': [
          {
            entity_id: 'bedroom_thermometer',
            friendly_name: 'Bedroom Thermometer',
            suggested_area: 'bedroom',
            device_type: 'sensor',
            capabilities: ['measurement'],
          },
        ],
        default: [
          {
            entity_id: 'ambient_temperature',
            friendly_name: 'Ambient Temperature',
            suggested_area: 'cabin',
            device_type: 'sensor',
            capabilities: ['measurement'],
          },
        ],
      },
    },
  };
}

export type MockTables = {
  specification: SpecificationTable;
  devices: DeviceTable;
};

export function createMockTables(): MockTables {
  const specification = SpecificationTable.fromDocument(createMockSpecificationDocument());
  const devices = DeviceTable.fromDocument(createMockMappingDocument(), specification);
  return { specification, devices };
}

/**
 * Identifier of a frame broadcast by a device at source address 0x80.
 */
export function statusId(dgn: number, sourceAddress = 0x80): number {
  return buildArbitrationId({ priority: 6, dgn, sourceAddress });
}

/**
 * DC_DIMMER_STATUS_3 payload for a dimmer instance at a brightness in percent.
 */
export function dimmerStatusPayload(instance: number, brightness: number): number[] {
  return [instance, 0x7c, brightness * 2, 0x00, 0x00, 0x00, 0xff, 0xff];
}

/**
 * Fixed clock for deterministic timestamps: each call advances one second.
 */
export function createMockClock(start = '2024-01-01T00:00:00.000Z'): () => Date {
  let tick = 0;
  const base = Date.parse(start);
  return () => new Date(base + 1000 * tick++);
}
