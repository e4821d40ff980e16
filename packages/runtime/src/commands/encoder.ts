// Command encoder
//
// Turns a validated (entity, action, parameters) triple into CAN frames.
// Every check happens before any frame exists, so a rejected command never
// reaches the bus.

import type { CommandAction, CommandParameters, EntityId, OutboundFrame } from '@rvlink/protocol';
import { buildArbitrationId } from '@rvlink/protocol';
import { EntityNotFoundError, InvalidParameterError, UnsupportedCapabilityError } from '../errors.js';
import type { DeviceTable } from '../tables/device-table.js';
import type { SpecificationTable } from '../tables/specification-table.js';
import { encodeSignals } from './packing.js';
import type { CommandStrategyRegistry } from './strategies.js';
import { createDefaultStrategies } from './strategies.js';

/** Priority of command frames */
export const COMMAND_PRIORITY = 6;

/** Source address the bridge transmits from */
export const BRIDGE_SOURCE_ADDRESS = 0xf9;

/** Group mask used when a descriptor names none */
export const DEFAULT_GROUP_MASK = 0xff;

export type EncoderTables = {
  specification: SpecificationTable;
  devices: DeviceTable;
};

const defaultStrategies = createDefaultStrategies();

/**
 * Encode a command for an entity.
 *
 * @example
 * encodeCommand('bedroom_ceiling_light', 'set_brightness', { level: 50 }, tables);
 * // [{ id: 0x19fedbf9, data: 19 7C 64 00 00 00 00 00, interface: 'can0' }]
 *
 * @throws EntityNotFoundError if the entity is not mapped
 * @throws UnsupportedCapabilityError if the entity cannot perform the action
 * @throws InvalidParameterError if a parameter is missing or out of range
 */
export function encodeCommand(
  entityId: EntityId,
  action: CommandAction,
  parameters: CommandParameters,
  tables: EncoderTables,
  strategies: CommandStrategyRegistry = defaultStrategies
): OutboundFrame[] {
  const descriptor = tables.devices.get(entityId);
  if (!descriptor) {
    throw new EntityNotFoundError(entityId);
  }

  const strategy = strategies.get(descriptor.deviceClass, action);
  if (!strategy) {
    throw new UnsupportedCapabilityError(entityId, action, `no ${descriptor.deviceClass} command for this action`);
  }
  if (!descriptor.capabilities.includes(strategy.capability)) {
    throw new UnsupportedCapabilityError(entityId, action, `missing capability "${strategy.capability}"`);
  }
  if (descriptor.instance === 'default') {
    throw new UnsupportedCapabilityError(entityId, action, 'entity is mapped to every instance of its DGN');
  }

  for (const [name, value] of Object.entries(parameters)) {
    if (!Number.isFinite(value)) {
      throw new InvalidParameterError(name, 'must be a finite number', { value });
    }
  }

  const definition = tables.specification.get(descriptor.dgn);
  if (!definition) {
    throw new UnsupportedCapabilityError(entityId, action, 'command DGN is not in the specification');
  }

  const fixed: Record<string, number> = {};
  if (definition.instanceSignal !== null) {
    fixed[definition.instanceSignal] = descriptor.instance;
  }
  if (definition.signals.some((signal) => signal.name === 'group')) {
    fixed.group = descriptor.groupMask ?? DEFAULT_GROUP_MASK;
  }

  const id = buildArbitrationId({
    priority: COMMAND_PRIORITY,
    dgn: definition.dgn,
    sourceAddress: BRIDGE_SOURCE_ADDRESS,
  });

  return strategy.build({ descriptor, definition, parameters }).map((values) => ({
    id,
    data: encodeSignals(definition, { ...fixed, ...values }),
    interface: descriptor.interface,
  }));
}
