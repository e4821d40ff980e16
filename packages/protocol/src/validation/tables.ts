// Specification and device mapping table validation
//
// Both tables are loaded from JSON documents. This module checks their shape
// with zod, then the cross-references between them, and produces frozen
// MessageDefinition and EntityDescriptor records. Device templates are fully
// expanded here so nothing downstream ever sees one.

import { z } from 'zod';
import type { MessageDefinition, SignalDefinition } from '../types/messages.js';
import type { Capability, EntityDescriptor } from '../types/entities.js';
import { descriptorKey, isCapability, isDeviceClass } from '../types/entities.js';
import type { InstanceKey } from '../types/common.js';
import { formatDgn, parseDgn } from '../identifiers.js';

/**
 * Result of validating a table document.
 * `value` holds whatever could be built; it is only safe to use when `valid`.
 */
export type TableValidationResult<T> = {
  valid: boolean;
  value: T;
  errors: TableValidationError[];
  warnings: TableValidationWarning[];
};

/**
 * A problem that prevents the table from being used
 */
export type TableValidationError = {
  path: string;
  message: string;
  code: TableValidationErrorCode;
};

/**
 * A problem worth reporting that does not prevent loading
 */
export type TableValidationWarning = {
  path: string;
  message: string;
  code: 'EMPTY_TABLE' | 'UNUSED_TEMPLATE';
};

export type TableValidationErrorCode =
  | 'INVALID_SHAPE'
  | 'INVALID_DGN'
  | 'INVALID_SIGNAL'
  | 'INVALID_INSTANCE'
  | 'INVALID_VALUE'
  | 'MISSING_FIELD'
  | 'DUPLICATE_DEFINITION'
  | 'DUPLICATE_ENTITY_ID'
  | 'DUPLICATE_KEY'
  | 'UNKNOWN_DGN'
  | 'UNKNOWN_TEMPLATE'
  | 'DANGLING_STATUS_DGN';

// --- Document schemas ---

const RawSignalSchema = z.object({
  name: z.string().min(1),
  start_bit: z.number().int().min(0),
  length: z.number().int().min(1).max(64),
  type: z.enum(['uint', 'int', 'enum', 'bitmask', 'ascii']).default('uint'),
  scale: z.number().default(1),
  offset: z.number().default(0),
  unit: z.string().optional(),
  values: z.record(z.string()).optional(),
  min: z.number().optional(),
  max: z.number().optional(),
  sentinels: z.boolean().optional(),
});

const RawMessageSchema = z.object({
  dgn: z.string(),
  name: z.string().min(1),
  length: z.number().int().min(1).max(8).default(8),
  instance_signal: z.string().nullable().optional(),
  signals: z.array(RawSignalSchema),
});

export const SpecificationDocumentSchema = z.object({
  version: z.string().optional(),
  messages: z.array(RawMessageSchema),
});

const RawDeviceFieldsSchema = z.object({
  entity_id: z.string().min(1).optional(),
  friendly_name: z.string().optional(),
  suggested_area: z.string().optional(),
  device_type: z.string().optional(),
  capabilities: z.array(z.string()).optional(),
  status_dgn: z.string().optional(),
  group_mask: z.union([z.number().int(), z.string()]).optional(),
  interface: z.string().optional(),
  groups: z.array(z.string()).optional(),
});

const RawDeviceEntrySchema = RawDeviceFieldsSchema.extend({
  template: z.string().optional(),
});

export const DeviceMappingDocumentSchema = z.object({
  coach_info: z.record(z.union([z.string(), z.number()])).default({}),
  templates: z.record(RawDeviceFieldsSchema).default({}),
  dgn_pairs: z.record(z.string()).default({}),
  devices: z.record(z.record(z.array(RawDeviceEntrySchema))),
});

export type SpecificationDocument = z.input<typeof SpecificationDocumentSchema>;
export type DeviceMappingDocument = z.input<typeof DeviceMappingDocumentSchema>;

type RawSignal = z.output<typeof RawSignalSchema>;
type RawDeviceFields = z.output<typeof RawDeviceFieldsSchema>;

/**
 * A validated device mapping
 */
export type DeviceMapping = {
  descriptors: EntityDescriptor[];

  /** Free-form coach metadata (make, model, year, ...) */
  coachInfo: Record<string, string>;
};

export type ValidateDeviceMappingOptions = {
  /** Interface assigned to devices that do not name one */
  defaultInterface?: string;
};

function shapeErrors(error: z.ZodError, root: string): TableValidationError[] {
  return error.issues.map((issue) => ({
    path: [root, ...issue.path].join('.'),
    message: issue.message,
    code: 'INVALID_SHAPE' as const,
  }));
}

// --- Specification ---

/**
 * Check a signal's layout against its message. Returns a description of the
 * first problem, or null.
 */
function checkSignal(signal: RawSignal, messageLength: number): string | null {
  if (signal.start_bit + signal.length > messageLength * 8) {
    return `extends past the end of a ${messageLength}-byte payload`;
  }
  if (signal.type === 'ascii' && (signal.start_bit % 8 !== 0 || signal.length % 8 !== 0)) {
    return 'must be byte aligned';
  }
  if (signal.scale === 0) {
    return 'has a zero scale';
  }
  if (signal.values && Object.keys(signal.values).some((key) => !Number.isInteger(Number(key)))) {
    return 'has a non-integer value key';
  }
  if (signal.min !== undefined && signal.max !== undefined && signal.min > signal.max) {
    return 'has min greater than max';
  }
  return null;
}

function toSignalDefinition(signal: RawSignal): SignalDefinition {
  const labels = signal.values
    ? Object.freeze(
        Object.fromEntries(Object.entries(signal.values).map(([key, label]) => [Number(key), label]))
      )
    : undefined;

  return Object.freeze({
    name: signal.name,
    startBit: signal.start_bit,
    length: signal.length,
    encoding: signal.type,
    scale: signal.scale,
    offset: signal.offset,
    unit: signal.unit,
    labels,
    min: signal.min,
    max: signal.max,
    sentinels: signal.sentinels,
  });
}

/**
 * Validate a specification document and build its message definitions.
 *
 * @param document - Parsed JSON content
 * @returns Validation result whose value is the list of definitions
 */
export function validateSpecification(document: unknown): TableValidationResult<MessageDefinition[]> {
  const parsed = SpecificationDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return { valid: false, value: [], errors: shapeErrors(parsed.error, 'specification'), warnings: [] };
  }

  const errors: TableValidationError[] = [];
  const warnings: TableValidationWarning[] = [];
  const messages: MessageDefinition[] = [];
  const seen = new Set<number>();

  parsed.data.messages.forEach((raw, index) => {
    const path = `messages[${index}]`;
    const dgn = parseDgn(raw.dgn);
    if (dgn === null) {
      errors.push({ path: `${path}.dgn`, message: `Invalid DGN "${raw.dgn}"`, code: 'INVALID_DGN' });
      return;
    }
    if (seen.has(dgn)) {
      errors.push({
        path: `${path}.dgn`,
        message: `DGN ${formatDgn(dgn)} is defined more than once`,
        code: 'DUPLICATE_DEFINITION',
      });
      return;
    }
    seen.add(dgn);

    const names = new Set<string>();
    const signals: SignalDefinition[] = [];
    raw.signals.forEach((signal, signalIndex) => {
      const signalPath = `${path}.signals[${signalIndex}]`;
      if (names.has(signal.name)) {
        errors.push({
          path: signalPath,
          message: `Signal "${signal.name}" is defined more than once in ${raw.name}`,
          code: 'DUPLICATE_DEFINITION',
        });
        return;
      }
      names.add(signal.name);

      const problem = checkSignal(signal, raw.length);
      if (problem) {
        errors.push({ path: signalPath, message: `Signal "${signal.name}" ${problem}`, code: 'INVALID_SIGNAL' });
        return;
      }
      signals.push(toSignalDefinition(signal));
    });

    let instanceSignal: string | null;
    if (raw.instance_signal === undefined) {
      instanceSignal = names.has('instance') ? 'instance' : null;
    } else {
      instanceSignal = raw.instance_signal;
    }
    if (instanceSignal !== null && !names.has(instanceSignal)) {
      errors.push({
        path: `${path}.instance_signal`,
        message: `Instance signal "${instanceSignal}" is not defined in ${raw.name}`,
        code: 'INVALID_SIGNAL',
      });
    }

    messages.push(
      Object.freeze({
        dgn,
        name: raw.name,
        length: raw.length,
        instanceSignal,
        signals: Object.freeze(signals),
      })
    );
  });

  if (messages.length === 0) {
    warnings.push({ path: 'messages', message: 'Specification defines no messages', code: 'EMPTY_TABLE' });
  }

  return { valid: errors.length === 0, value: messages, errors, warnings };
}

// --- Device mapping ---

function parseInstanceKey(key: string): InstanceKey | null {
  if (key === 'default') {
    return 'default';
  }
  if (!/^\d+$/.test(key)) {
    return null;
  }
  const instance = Number(key);
  return instance <= 0xff ? instance : null;
}

function parseGroupMask(value: number | string): number | null {
  const mask = typeof value === 'number' ? value : parseInt(value, 16);
  return Number.isInteger(mask) && mask >= 0 && mask <= 0xff ? mask : null;
}

/**
 * Validate a device mapping document against a set of message definitions,
 * expanding templates and companion-status pairs into concrete descriptors.
 *
 * Each entry under `devices.<DGN>.<instance>` may name a `template`; the
 * template's fields apply first and the entry's own fields override them.
 * An entry without `status_dgn` takes the one listed in `dgn_pairs`.
 *
 * @param document - Parsed JSON content
 * @param messages - Definitions the mapping may reference
 * @returns Validation result whose value holds the descriptors and coach info
 */
export function validateDeviceMapping(
  document: unknown,
  messages: readonly MessageDefinition[],
  options: ValidateDeviceMappingOptions = {}
): TableValidationResult<DeviceMapping> {
  const { defaultInterface = 'can0' } = options;

  const parsed = DeviceMappingDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return {
      valid: false,
      value: { descriptors: [], coachInfo: {} },
      errors: shapeErrors(parsed.error, 'mapping'),
      warnings: [],
    };
  }

  const { coach_info, templates, dgn_pairs, devices } = parsed.data;
  const errors: TableValidationError[] = [];
  const warnings: TableValidationWarning[] = [];
  const descriptors: EntityDescriptor[] = [];

  const knownDgns = new Set(messages.map((message) => message.dgn));
  const entityIds = new Set<string>();
  const primaryKeys = new Set<string>();
  const statusKeys = new Set<string>();
  const usedTemplates = new Set<string>();

  const pairs = new Map<number, string>();
  for (const [commandDgn, statusDgn] of Object.entries(dgn_pairs)) {
    const dgn = parseDgn(commandDgn);
    if (dgn === null) {
      errors.push({ path: `dgn_pairs.${commandDgn}`, message: `Invalid DGN "${commandDgn}"`, code: 'INVALID_DGN' });
      continue;
    }
    pairs.set(dgn, statusDgn);
  }

  for (const [dgnKey, instances] of Object.entries(devices)) {
    const dgn = parseDgn(dgnKey);
    if (dgn === null) {
      errors.push({ path: `devices.${dgnKey}`, message: `Invalid DGN "${dgnKey}"`, code: 'INVALID_DGN' });
      continue;
    }
    if (!knownDgns.has(dgn)) {
      errors.push({
        path: `devices.${dgnKey}`,
        message: `DGN ${formatDgn(dgn)} is not in the specification`,
        code: 'UNKNOWN_DGN',
      });
      continue;
    }

    for (const [instanceKey, entries] of Object.entries(instances)) {
      const instance = parseInstanceKey(instanceKey);
      if (instance === null) {
        errors.push({
          path: `devices.${dgnKey}.${instanceKey}`,
          message: `Instance must be "default" or 0-255, got "${instanceKey}"`,
          code: 'INVALID_INSTANCE',
        });
        continue;
      }

      entries.forEach((entry, index) => {
        const path = `devices.${dgnKey}.${instanceKey}[${index}]`;
        const { template: templateName, ...fields } = entry;

        let base: RawDeviceFields = {};
        if (templateName !== undefined) {
          const template = templates[templateName];
          if (!template) {
            errors.push({
              path: `${path}.template`,
              message: `Unknown template "${templateName}"`,
              code: 'UNKNOWN_TEMPLATE',
            });
            return;
          }
          usedTemplates.add(templateName);
          base = template;
        }
        const merged: RawDeviceFields = { ...base, ...fields };

        const { entity_id, friendly_name, device_type } = merged;
        if (!entity_id || friendly_name === undefined || device_type === undefined) {
          errors.push({
            path,
            message: 'Device entries need entity_id, friendly_name and device_type',
            code: 'MISSING_FIELD',
          });
          return;
        }
        if (!isDeviceClass(device_type)) {
          errors.push({
            path: `${path}.device_type`,
            message: `Unknown device type "${device_type}"`,
            code: 'INVALID_VALUE',
          });
          return;
        }

        const capabilities: Capability[] = [];
        for (const capability of merged.capabilities ?? []) {
          if (!isCapability(capability)) {
            errors.push({
              path: `${path}.capabilities`,
              message: `Unknown capability "${capability}" on ${entity_id}`,
              code: 'INVALID_VALUE',
            });
            return;
          }
          capabilities.push(capability);
        }

        let statusDgn: number | undefined;
        const statusSource = merged.status_dgn ?? pairs.get(dgn);
        if (statusSource !== undefined) {
          const parsedStatus = parseDgn(statusSource);
          if (parsedStatus === null) {
            errors.push({
              path: `${path}.status_dgn`,
              message: `Invalid status DGN "${statusSource}" on ${entity_id}`,
              code: 'INVALID_DGN',
            });
            return;
          }
          if (!knownDgns.has(parsedStatus)) {
            errors.push({
              path: `${path}.status_dgn`,
              message: `Status DGN ${formatDgn(parsedStatus)} of ${entity_id} is not in the specification`,
              code: 'DANGLING_STATUS_DGN',
            });
            return;
          }
          statusDgn = parsedStatus;
        }

        let groupMask: number | undefined;
        if (merged.group_mask !== undefined) {
          const mask = parseGroupMask(merged.group_mask);
          if (mask === null) {
            errors.push({
              path: `${path}.group_mask`,
              message: `Group mask of ${entity_id} must be a byte`,
              code: 'INVALID_VALUE',
            });
            return;
          }
          groupMask = mask;
        }

        if (entityIds.has(entity_id)) {
          errors.push({
            path: `${path}.entity_id`,
            message: `Entity id "${entity_id}" is used more than once`,
            code: 'DUPLICATE_ENTITY_ID',
          });
          return;
        }

        const primaryKey = descriptorKey(dgn, instance);
        if (primaryKeys.has(primaryKey)) {
          errors.push({
            path,
            message: `More than one device is mapped to ${primaryKey}`,
            code: 'DUPLICATE_KEY',
          });
          return;
        }

        if (statusDgn !== undefined) {
          const statusKey = descriptorKey(statusDgn, instance);
          if (statusKeys.has(statusKey)) {
            errors.push({
              path,
              message: `More than one device reports status on ${statusKey}`,
              code: 'DUPLICATE_KEY',
            });
            return;
          }
          statusKeys.add(statusKey);
        }

        entityIds.add(entity_id);
        primaryKeys.add(primaryKey);

        descriptors.push(
          Object.freeze({
            entityId: entity_id,
            friendlyName: friendly_name,
            area: merged.suggested_area ?? 'unknown',
            deviceClass: device_type,
            capabilities: Object.freeze(capabilities),
            dgn,
            instance,
            statusDgn,
            groupMask,
            interface: merged.interface ?? defaultInterface,
            groups: Object.freeze([...(merged.groups ?? [])]),
          })
        );
      });
    }
  }

  for (const name of Object.keys(templates)) {
    if (!usedTemplates.has(name)) {
      warnings.push({ path: `templates.${name}`, message: `Template "${name}" is never used`, code: 'UNUSED_TEMPLATE' });
    }
  }
  if (descriptors.length === 0 && errors.length === 0) {
    warnings.push({ path: 'devices', message: 'Mapping defines no devices', code: 'EMPTY_TABLE' });
  }

  const coachInfo: Record<string, string> = {};
  for (const [key, value] of Object.entries(coach_info)) {
    coachInfo[key] = String(value);
  }

  return {
    valid: errors.length === 0,
    value: { descriptors, coachInfo },
    errors,
    warnings,
  };
}
