// Tests for loading tables from disk

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { findModelMapping, loadDeviceTable, loadSpecification, loadTables } from './loader.js';
import { ConfigurationError } from '../errors.js';
import { createCapturingLogger } from '../logging.js';
import { createMockMappingDocument, createMockSpecificationDocument } from '../test-fixtures.js';

// --- Test Fixtures ---

let directory: string;

async function writeJson(name: string, value: unknown): Promise<string> {
  const path = join(directory, name);
  await writeFile(path, JSON.stringify(value), 'utf-8');
  return path;
}

function createMockModelMapping() {
  const mapping = createMockMappingDocument();
  mapping.coach_info = { model: 'T2' };
  mapping.devices = {
    '1FEDB': {
      '27': [
        {
          entity_id: 'porch_light',
          friendly_name: 'Porch Light',
          device_type: 'switch',
          capabilities: ['on_off'],
        },
      ],
    },
  };
  return mapping;
}

beforeEach(async () => {
  directory = await mkdtemp(join(tmpdir(), 'rvlink-tables-'));
});

afterEach(async () => {
  await rm(directory, { recursive: true, force: true });
});

// --- Tests ---

describe('loadSpecification', () => {
  it('should load a specification file', async () => {
    const path = await writeJson('rvc-spec.json', createMockSpecificationDocument());

    const specification = await loadSpecification(path);
    expect(specification.size).toBe(5);
  });

  it('should fail on a missing file', async () => {
    const path = join(directory, 'missing.json');

    await expect(loadSpecification(path)).rejects.toThrow(ConfigurationError);
    await expect(loadSpecification(path)).rejects.toThrow(`Cannot read ${path}`);
  });

  it('should fail on malformed JSON', async () => {
    const path = join(directory, 'broken.json');
    await writeFile(path, '{ "messages": [', 'utf-8');

    await expect(loadSpecification(path)).rejects.toThrow(`Malformed JSON in ${path}`);
  });
});

describe('loadDeviceTable', () => {
  it('should validate the mapping against the specification', async () => {
    const specification = await loadSpecification(
      await writeJson('rvc-spec.json', createMockSpecificationDocument())
    );
    const mapping = createMockMappingDocument();
    mapping.dgn_pairs = { '1FEDB': '1FE99' };

    const path = await writeJson('device_mapping.json', mapping);
    await expect(loadDeviceTable(path, specification)).rejects.toThrow('Invalid device mapping');
  });

  it('should apply the default interface', async () => {
    const specification = await loadSpecification(
      await writeJson('rvc-spec.json', createMockSpecificationDocument())
    );
    const path = await writeJson('device_mapping.json', createMockMappingDocument());

    const devices = await loadDeviceTable(path, specification, { defaultInterface: 'vcan0' });
    expect(devices.get('galley_light')?.interface).toBe('vcan0');
  });
});

describe('findModelMapping', () => {
  it('should prefer a mapping named after the model', async () => {
    await writeJson('T2.json', createMockModelMapping());

    expect(await findModelMapping(directory, 'T2')).toBe(join(directory, 'T2.json'));
    expect(await findModelMapping(directory, 'T3')).toBe(join(directory, 'device_mapping.json'));
    expect(await findModelMapping(directory)).toBe(join(directory, 'device_mapping.json'));
  });
});

describe('loadTables', () => {
  it('should load both tables', async () => {
    const specificationPath = await writeJson('rvc-spec.json', createMockSpecificationDocument());
    await writeJson('device_mapping.json', createMockMappingDocument());
    await writeJson('T2.json', createMockModelMapping());

    const tables = await loadTables({ specificationPath, mappingDirectory: directory, model: 'T2' });

    expect(tables.mappingPath).toBe(join(directory, 'T2.json'));
    expect(tables.devices.list().map((descriptor) => descriptor.entityId)).toEqual(['porch_light']);
    expect(tables.devices.coachInfo).toEqual({ model: 'T2' });
  });

  it('should warn when the model has no mapping of its own', async () => {
    const logger = createCapturingLogger();
    const specificationPath = await writeJson('rvc-spec.json', createMockSpecificationDocument());
    await writeJson('device_mapping.json', createMockMappingDocument());

    const tables = await loadTables({ specificationPath, mappingDirectory: directory, model: 'T9', logger });

    expect(tables.devices.size).toBe(6);
    expect(logger.entries.filter((entry) => entry.level === 'warn').map((entry) => entry.message)).toEqual([
      'No mapping for coach model, using the default mapping',
    ]);
  });

  it('should load the bundled configuration', async () => {
    const configDirectory = fileURLToPath(new URL('../../../../config/', import.meta.url));
    const logger = createCapturingLogger();

    const tables = await loadTables({
      specificationPath: join(configDirectory, 'rvc-spec.json'),
      mappingDirectory: configDirectory,
      logger,
    });

    expect(tables.specification.size).toBe(9);
    expect(tables.devices.size).toBe(32);
    expect(tables.devices.get('entrance_door_lock')?.statusDgn).toBe(0x1fedc);
    expect(tables.devices.findStatus(0x1feda, 25)?.entityId).toBe('bedroom_ceiling_light');
    expect(logger.entries.filter((entry) => entry.level === 'warn')).toEqual([]);
  });
});
