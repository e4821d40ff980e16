// Entity descriptors, live state and change events

import type { EntityId, HexString, InstanceKey, InterfaceName, Timestamp } from './common.js';
import type { DecodedSignal } from './frames.js';
import type { CommandAction, CommandParameters } from './commands.js';

/**
 * Device classes known to the bridge.
 */
export type DeviceClass =
  | 'light'
  | 'lock'
  | 'switch'
  | 'sensor'
  | 'tank'
  | 'thermostat'
  | 'pump'
  | 'fan';

export const DEVICE_CLASSES: readonly DeviceClass[] = [
  'light',
  'lock',
  'switch',
  'sensor',
  'tank',
  'thermostat',
  'pump',
  'fan',
];

/**
 * Capabilities an entity may advertise.
 */
export type Capability = 'on_off' | 'brightness' | 'lock_unlock' | 'measurement';

export const CAPABILITIES: readonly Capability[] = [
  'on_off',
  'brightness',
  'lock_unlock',
  'measurement',
];

export function isDeviceClass(value: string): value is DeviceClass {
  return DEVICE_CLASSES.some((deviceClass) => deviceClass === value);
}

export function isCapability(value: string): value is Capability {
  return CAPABILITIES.some((capability) => capability === value);
}

/**
 * Immutable description of one mapped device.
 */
export type EntityDescriptor = {
  entityId: EntityId;
  friendlyName: string;

  /** Location tag, e.g. "bedroom" */
  area: string;

  deviceClass: DeviceClass;
  capabilities: readonly Capability[];

  /** Primary (command) DGN */
  dgn: number;

  instance: InstanceKey;

  /** DGN on which the device reports its status, when it differs from dgn */
  statusDgn?: number;

  /** Group bitmask written into command frames */
  groupMask?: number;

  /** Bus the device is reachable on */
  interface: InterfaceName;

  groups: readonly string[];
};

/**
 * The last command issued to an entity.
 */
export type CommandStatus = {
  action: CommandAction;
  parameters: CommandParameters;
  issuedAt: Timestamp;

  /** Set once a status frame is observed after the command */
  acknowledged: boolean;
  acknowledgedAt: Timestamp | null;
};

/**
 * Current state of one entity, owned by the entity state store.
 */
export type EntityState = {
  entityId: EntityId;
  signals: Record<string, DecodedSignal>;
  updatedAt: Timestamp;

  /** Starts at 1 and increments on every applied update */
  revision: number;

  lastFrame: {
    dgn: number;
    interface: InterfaceName;
    data: HexString;
    timestamp: Timestamp;
  } | null;

  command: CommandStatus | null;
};

/**
 * What caused a state change.
 */
export type ChangeCause = 'bus' | 'command';

/**
 * Published whenever an entity's state actually changes.
 * Carries the full snapshot rather than a diff.
 */
export type StateChangeEvent = {
  entityId: EntityId;
  revision: number;
  state: EntityState;
  cause: ChangeCause;
  timestamp: Timestamp;
};

/**
 * Lookup key for a (DGN, instance) pair.
 *
 * @example
 * descriptorKey(0x1fedb, 25) // "1FEDB:25"
 * descriptorKey(0x1fedb, 'default') // "1FEDB:default"
 */
export function descriptorKey(dgn: number, instance: InstanceKey): string {
  return `${dgn.toString(16).toUpperCase().padStart(5, '0')}:${instance}`;
}
