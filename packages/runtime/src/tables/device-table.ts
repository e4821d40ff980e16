// Device mapping table
//
// Immutable index of entity descriptors. Every descriptor is reachable by
// entity id, by its primary (DGN, instance) key, and, when it has a companion
// status DGN, by (status DGN, instance).

import type {
  DeviceClass,
  EntityDescriptor,
  EntityId,
  InstanceKey,
} from '@rvlink/protocol';
import { descriptorKey, validateDeviceMapping } from '@rvlink/protocol';
import { ConfigurationError } from '../errors.js';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';
import type { SpecificationTable } from './specification-table.js';

/**
 * Filter for listing descriptors
 */
export type DeviceFilter = {
  deviceClass?: DeviceClass;
  area?: string;
  group?: string;
};

export type DeviceTableOptions = {
  coachInfo?: Record<string, string>;
};

export class DeviceTable {
  readonly coachInfo: Readonly<Record<string, string>>;

  private byEntityId = new Map<EntityId, EntityDescriptor>();
  private primary = new Map<string, EntityDescriptor>();
  private status = new Map<string, EntityDescriptor>();

  /**
   * @throws ConfigurationError on duplicate entity ids or lookup keys
   */
  constructor(descriptors: readonly EntityDescriptor[], options: DeviceTableOptions = {}) {
    this.coachInfo = Object.freeze({ ...options.coachInfo });

    const issues: string[] = [];
    for (const descriptor of descriptors) {
      if (this.byEntityId.has(descriptor.entityId)) {
        issues.push(`Entity id "${descriptor.entityId}" is used more than once`);
        continue;
      }

      const primaryKey = descriptorKey(descriptor.dgn, descriptor.instance);
      if (this.primary.has(primaryKey)) {
        issues.push(`More than one device is mapped to ${primaryKey}`);
        continue;
      }

      if (descriptor.statusDgn !== undefined) {
        const statusKey = descriptorKey(descriptor.statusDgn, descriptor.instance);
        if (this.status.has(statusKey)) {
          issues.push(`More than one device reports status on ${statusKey}`);
          continue;
        }
        this.status.set(statusKey, descriptor);
      }

      this.byEntityId.set(descriptor.entityId, descriptor);
      this.primary.set(primaryKey, descriptor);
    }

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid device table', issues);
    }
  }

  /**
   * Validate a parsed mapping document against the specification and build
   * the table. Templates are expanded here.
   *
   * @throws ConfigurationError listing every problem found
   */
  static fromDocument(
    document: unknown,
    specification: SpecificationTable,
    options: { defaultInterface?: string; logger?: Logger } = {}
  ): DeviceTable {
    const { defaultInterface, logger = silentLogger } = options;
    const result = validateDeviceMapping(document, specification.list(), { defaultInterface });

    for (const warning of result.warnings) {
      logger.warn(warning.message, { path: warning.path });
    }
    if (!result.valid) {
      throw new ConfigurationError(
        'Invalid device mapping',
        result.errors.map((error) => `${error.path}: ${error.message}`)
      );
    }

    return new DeviceTable(result.value.descriptors, { coachInfo: result.value.coachInfo });
  }

  get(entityId: EntityId): EntityDescriptor | undefined {
    return this.byEntityId.get(entityId);
  }

  has(entityId: EntityId): boolean {
    return this.byEntityId.has(entityId);
  }

  /**
   * Descriptor whose primary key is exactly (dgn, instance)
   */
  findPrimary(dgn: number, instance: InstanceKey): EntityDescriptor | undefined {
    return this.primary.get(descriptorKey(dgn, instance));
  }

  /**
   * Descriptor that reports status on exactly (dgn, instance)
   */
  findStatus(dgn: number, instance: InstanceKey): EntityDescriptor | undefined {
    return this.status.get(descriptorKey(dgn, instance));
  }

  /**
   * All descriptors commanded or reporting on a DGN, whatever their instance.
   */
  onDgn(dgn: number): EntityDescriptor[] {
    return this.list().filter((descriptor) => descriptor.dgn === dgn || descriptor.statusDgn === dgn);
  }

  /**
   * List descriptors in table order, optionally filtered.
   */
  list(filter: DeviceFilter = {}): EntityDescriptor[] {
    const { deviceClass, area, group } = filter;
    return Array.from(this.byEntityId.values()).filter(
      (descriptor) =>
        (deviceClass === undefined || descriptor.deviceClass === deviceClass) &&
        (area === undefined || descriptor.area === area) &&
        (group === undefined || descriptor.groups.includes(group))
    );
  }

  get size(): number {
    return this.byEntityId.size;
  }
}
