// Table loader - read and validate the specification and device mapping files
//
// Load failures are fatal: every function here throws ConfigurationError
// rather than returning a partial table.

import { access, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '../errors.js';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';
import { SpecificationTable } from './specification-table.js';
import { DeviceTable } from './device-table.js';

export const DEFAULT_MAPPING_FILE = 'device_mapping.json';

/**
 * Options for loading both tables
 */
export type LoadTablesOptions = {
  specificationPath: string;

  /** Directory holding device_mapping.json and any model-specific mappings */
  mappingDirectory: string;

  /** Coach model selector, e.g. "2021_Entegra_Aspire_44R" */
  model?: string;

  /** Interface assigned to devices that do not name one */
  defaultInterface?: string;

  logger?: Logger;
};

export type LoadedTables = {
  specification: SpecificationTable;
  devices: DeviceTable;

  /** Mapping file actually used */
  mappingPath: string;
};

async function readJson(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Malformed JSON in ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load the protocol specification table.
 */
export async function loadSpecification(path: string, logger: Logger = silentLogger): Promise<SpecificationTable> {
  return SpecificationTable.fromDocument(await readJson(path), logger);
}

/**
 * Load the device mapping table, validated against a specification.
 */
export async function loadDeviceTable(
  path: string,
  specification: SpecificationTable,
  options: { defaultInterface?: string; logger?: Logger } = {}
): Promise<DeviceTable> {
  return DeviceTable.fromDocument(await readJson(path), specification, options);
}

/**
 * Pick the mapping file for a coach model: `<model>.json` in the mapping
 * directory when it exists, otherwise the default mapping.
 */
export async function findModelMapping(directory: string, model?: string): Promise<string> {
  if (model) {
    const candidate = join(directory, `${model}.json`);
    if (await exists(candidate)) {
      return candidate;
    }
  }
  return join(directory, DEFAULT_MAPPING_FILE);
}

/**
 * Load both tables.
 *
 * @throws ConfigurationError if either file is missing, malformed or inconsistent
 */
export async function loadTables(options: LoadTablesOptions): Promise<LoadedTables> {
  const { specificationPath, mappingDirectory, model, defaultInterface, logger = silentLogger } = options;

  const specification = await loadSpecification(specificationPath, logger);
  const mappingPath = await findModelMapping(mappingDirectory, model);
  if (model && !mappingPath.endsWith(`${model}.json`)) {
    logger.warn('No mapping for coach model, using the default mapping', { model, mappingPath });
  }

  const devices = await loadDeviceTable(mappingPath, specification, { defaultInterface, logger });

  logger.info('Tables loaded', {
    messages: specification.size,
    entities: devices.size,
    mappingPath,
  });

  return { specification, devices, mappingPath };
}
