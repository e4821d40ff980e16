// Tests for specification and device mapping validation

import { describe, it, expect } from 'vitest';
import {
  validateSpecification,
  validateDeviceMapping,
  type SpecificationDocument,
  type DeviceMappingDocument,
} from './tables.js';

// --- Test Fixtures ---

function createMockSpecification(): SpecificationDocument {
  return {
    version: 'test',
    messages: [
      {
        dgn: '1FEDA',
        name: 'DC_DIMMER_STATUS_3',
        signals: [
          { name: 'instance', start_bit: 0, length: 8 },
          { name: 'operating_status', start_bit: 16, length: 8, scale: 0.5, unit: '%' },
        ],
      },
      {
        dgn: '1FEDB',
        name: 'DC_DIMMER_COMMAND_2',
        signals: [
          { name: 'instance', start_bit: 0, length: 8 },
          { name: 'group', start_bit: 8, length: 8, type: 'bitmask' },
          { name: 'desired_level', start_bit: 16, length: 8, scale: 0.5, min: 0, max: 100 },
          { name: 'command', start_bit: 24, length: 8, type: 'enum', values: { '0': 'set_level', '3': 'off' } },
        ],
      },
      {
        dgn: '1FEDC',
        name: 'LOCK_STATUS',
        signals: [{ name: 'lock_status', start_bit: 8, length: 2, type: 'enum' }],
      },
    ],
  };
}

function createMockMapping(): DeviceMappingDocument {
  return {
    coach_info: { make: 'Test Coach', year: 2021 },
    templates: {
      dimmable_light: { device_type: 'light', capabilities: ['on_off', 'brightness'], group_mask: '0x7C' },
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
            interface: 'can1',
            groups: ['interior'],
          },
        ],
        default: [
          {
            entity_id: 'entrance_door_lock',
            friendly_name: 'Entrance Door Lock',
            device_type: 'lock',
            capabilities: ['lock_unlock'],
            status_dgn: '1FEDC',
          },
        ],
      },
    },
  };
}

function specificationMessages() {
  return validateSpecification(createMockSpecification()).value;
}

// --- Tests ---

describe('validateSpecification', () => {
  it('should build frozen definitions with defaults applied', () => {
    const result = validateSpecification(createMockSpecification());

    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.value).toHaveLength(3);

    const status = result.value[0];
    expect(status.dgn).toBe(0x1feda);
    expect(status.length).toBe(8);
    expect(status.instanceSignal).toBe('instance');
    expect(status.signals[1]).toMatchObject({
      name: 'operating_status',
      startBit: 16,
      length: 8,
      encoding: 'uint',
      scale: 0.5,
      offset: 0,
      unit: '%',
    });
    expect(Object.isFrozen(status)).toBe(true);
  });

  it('should convert enum value keys to numbers', () => {
    const command = validateSpecification(createMockSpecification()).value[1];
    expect(command.signals[3].labels).toEqual({ 0: 'set_level', 3: 'off' });
  });

  it('should leave messages without an instance signal unkeyed', () => {
    const lock = validateSpecification(createMockSpecification()).value[2];
    expect(lock.instanceSignal).toBeNull();
  });

  it('should reject a document with the wrong shape', () => {
    const result = validateSpecification({ messages: [{ dgn: '1FEDA' }] });

    expect(result.valid).toBe(false);
    expect(result.errors[0].code).toBe('INVALID_SHAPE');
    expect(result.errors[0].path).toBe('specification.messages.0.name');
  });

  it('should reject duplicate DGNs', () => {
    const document = createMockSpecification();
    document.messages.push({ dgn: '1feda', name: 'AGAIN', signals: [] });

    const result = validateSpecification(document);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { path: 'messages[3].dgn', message: 'DGN 1FEDA is defined more than once', code: 'DUPLICATE_DEFINITION' },
    ]);
  });

  it('should reject signals that extend past the payload', () => {
    const result = validateSpecification({
      messages: [
        {
          dgn: '1FFB7',
          name: 'TANK_STATUS',
          length: 4,
          signals: [{ name: 'tank_size', start_bit: 24, length: 16 }],
        },
      ],
    });

    expect(result.valid).toBe(false);
    expect(result.errors[0].message).toBe('Signal "tank_size" extends past the end of a 4-byte payload');
  });

  it('should reject an instance signal that does not exist', () => {
    const result = validateSpecification({
      messages: [{ dgn: '1FFB7', name: 'TANK_STATUS', instance_signal: 'tank', signals: [] }],
    });

    expect(result.errors[0].code).toBe('INVALID_SIGNAL');
  });

  it('should warn about an empty table', () => {
    const result = validateSpecification({ messages: [] });
    expect(result.valid).toBe(true);
    expect(result.warnings[0].code).toBe('EMPTY_TABLE');
  });
});

describe('validateDeviceMapping', () => {
  it('should expand templates and companion pairs into descriptors', () => {
    const result = validateDeviceMapping(createMockMapping(), specificationMessages());

    expect(result.valid).toBe(true);
    expect(result.value.descriptors).toHaveLength(2);
    expect(result.value.descriptors[0]).toEqual({
      entityId: 'bedroom_ceiling_light',
      friendlyName: 'Bedroom Ceiling Light',
      area: 'bedroom',
      deviceClass: 'light',
      capabilities: ['on_off', 'brightness'],
      dgn: 0x1fedb,
      instance: 25,
      statusDgn: 0x1feda,
      groupMask: 0x7c,
      interface: 'can1',
      groups: ['interior'],
    });
  });

  it('should prefer an explicit status DGN over the pair table', () => {
    const result = validateDeviceMapping(createMockMapping(), specificationMessages());
    const lock = result.value.descriptors[1];

    expect(lock.instance).toBe('default');
    expect(lock.statusDgn).toBe(0x1fedc);
    expect(lock.interface).toBe('can0');
    expect(lock.area).toBe('unknown');
  });

  it('should use the configured default interface', () => {
    const result = validateDeviceMapping(createMockMapping(), specificationMessages(), {
      defaultInterface: 'vcan0',
    });
    expect(result.value.descriptors[1].interface).toBe('vcan0');
  });

  it('should stringify coach info', () => {
    const result = validateDeviceMapping(createMockMapping(), specificationMessages());
    expect(result.value.coachInfo).toEqual({ make: 'Test Coach', year: '2021' });
  });

  it('should reject duplicate entity ids', () => {
    const mapping = createMockMapping();
    mapping.devices['1FEDB']['26'] = [
      { template: 'dimmable_light', entity_id: 'bedroom_ceiling_light', friendly_name: 'Copy' },
    ];

    const result = validateDeviceMapping(mapping, specificationMessages());
    expect(result.valid).toBe(false);
    expect(result.errors.map((error) => error.code)).toEqual(['DUPLICATE_ENTITY_ID']);
  });

  it('should reject a status DGN missing from the specification', () => {
    const mapping = createMockMapping();
    mapping.dgn_pairs = { '1FEDB': '1FE99' };

    const result = validateDeviceMapping(mapping, specificationMessages());
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        path: 'devices.1FEDB.25[0].status_dgn',
        message: 'Status DGN 1FE99 of bedroom_ceiling_light is not in the specification',
        code: 'DANGLING_STATUS_DGN',
      },
    ]);
  });

  it('should reject an unknown template', () => {
    const mapping = createMockMapping();
    mapping.devices['1FEDB']['25'][0].template = 'missing';

    const result = validateDeviceMapping(mapping, specificationMessages());
    expect(result.errors[0].code).toBe('UNKNOWN_TEMPLATE');
    expect(result.warnings[0].code).toBe('UNUSED_TEMPLATE');
  });

  it('should reject devices on DGNs the specification does not define', () => {
    const mapping = createMockMapping();
    mapping.devices['1FFB7'] = {
      '0': [{ entity_id: 'fresh_water', friendly_name: 'Fresh Water', device_type: 'tank' }],
    };

    const result = validateDeviceMapping(mapping, specificationMessages());
    expect(result.errors[0].code).toBe('UNKNOWN_DGN');
  });

  it('should reject instance keys that are not a byte or default', () => {
    const mapping = createMockMapping();
    mapping.devices['1FEDB']['300'] = [];

    const result = validateDeviceMapping(mapping, specificationMessages());
    expect(result.errors[0].code).toBe('INVALID_INSTANCE');
  });

  it('should reject unknown device types', () => {
    const mapping = createMockMapping();
    mapping.devices['1FEDB']['26'] = [{ entity_id: 'x', friendly_name: 'X', device_type: 'toaster' }];

    const result = validateDeviceMapping(mapping, specificationMessages());
    expect(result.errors[0].message).toBe('Unknown device type "toaster"');
  });
});
