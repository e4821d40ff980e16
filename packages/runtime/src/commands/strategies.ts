// Command strategies - how each device class turns an action into signal values
//
// A strategy names the capability an action needs and fills in the command
// message's signals. Instance and group mask are added by the encoder.

import type {
  Capability,
  CommandAction,
  CommandParameters,
  DeviceClass,
  EntityDescriptor,
  MessageDefinition,
  SignalDefinition,
} from '@rvlink/protocol';
import { COMMAND_ACTIONS } from '@rvlink/protocol';
import { InvalidParameterError, UnsupportedCapabilityError } from '../errors.js';
import { checkValue } from './packing.js';

/**
 * What a strategy sees when building a frame
 */
export type StrategyContext = {
  descriptor: EntityDescriptor;
  definition: MessageDefinition;
  parameters: CommandParameters;
};

export type CommandStrategy = {
  capability: Capability;

  /** Signal values of one frame per entry */
  build(context: StrategyContext): Array<Record<string, number>>;
};

export type DeviceStrategies = Partial<Record<CommandAction, CommandStrategy>>;

/**
 * Strategies keyed by device class, then action.
 */
export class CommandStrategyRegistry {
  private strategies = new Map<DeviceClass, DeviceStrategies>();

  /**
   * Register the strategies for a device class, replacing any registered before.
   */
  register(deviceClass: DeviceClass, strategies: DeviceStrategies): this {
    this.strategies.set(deviceClass, strategies);
    return this;
  }

  get(deviceClass: DeviceClass, action: CommandAction): CommandStrategy | undefined {
    return this.strategies.get(deviceClass)?.[action];
  }

  /**
   * Actions a device class supports.
   */
  actions(deviceClass: DeviceClass): CommandAction[] {
    const strategies = this.strategies.get(deviceClass) ?? {};
    return COMMAND_ACTIONS.filter((action) => strategies[action] !== undefined);
  }
}

// --- Helpers ---

function requireSignal(context: StrategyContext, action: string, name: string): SignalDefinition {
  const signal = context.definition.signals.find((candidate) => candidate.name === name);
  if (!signal) {
    throw new UnsupportedCapabilityError(
      context.descriptor.entityId,
      action,
      `${context.definition.name} has no "${name}" signal`
    );
  }
  return signal;
}

/**
 * Raw code of a command label, e.g. "off" -> 3
 */
function commandCode(context: StrategyContext, action: string, label: string): number {
  const signal = requireSignal(context, action, 'command');
  for (const [code, name] of Object.entries(signal.labels ?? {})) {
    if (name === label) {
      return Number(code);
    }
  }
  throw new UnsupportedCapabilityError(
    context.descriptor.entityId,
    action,
    `${context.definition.name} defines no "${label}" command`
  );
}

/**
 * Read and range-check the `level` parameter against desired_level.
 */
function level(context: StrategyContext, action: string, fallback?: number): number {
  const signal = requireSignal(context, action, 'desired_level');
  const value = context.parameters.level ?? fallback;
  if (value === undefined) {
    throw new InvalidParameterError('level', 'is required');
  }
  checkValue(signal, value, 'level');
  return value;
}

function setLevel(context: StrategyContext, action: string, value: number) {
  return { desired_level: value, command: commandCode(context, action, 'set_level') };
}

function simpleCommand(label: string): (context: StrategyContext) => Array<Record<string, number>> {
  return (context) => [{ command: commandCode(context, label, label) }];
}

// --- Built-in strategies ---

const turnOff: CommandStrategy = {
  capability: 'on_off',
  build: simpleCommand('off'),
};

const toggle: CommandStrategy = {
  capability: 'on_off',
  build: simpleCommand('toggle'),
};

export const lightStrategies: DeviceStrategies = {
  turn_on: {
    capability: 'on_off',
    build: (context) => [setLevel(context, 'turn_on', level(context, 'turn_on', 100))],
  },
  turn_off: turnOff,
  toggle,
  set_brightness: {
    capability: 'brightness',
    build: (context) => [setLevel(context, 'set_brightness', level(context, 'set_brightness'))],
  },
};

export const switchStrategies: DeviceStrategies = {
  turn_on: {
    capability: 'on_off',
    build: (context) => [setLevel(context, 'turn_on', 100)],
  },
  turn_off: turnOff,
  toggle,
};

export const lockStrategies: DeviceStrategies = {
  lock: {
    capability: 'lock_unlock',
    build: simpleCommand('lock'),
  },
  unlock: {
    capability: 'lock_unlock',
    build: simpleCommand('unlock'),
  },
};

/**
 * Registry with the built-in light, switch and lock strategies.
 */
export function createDefaultStrategies(): CommandStrategyRegistry {
  return new CommandStrategyRegistry()
    .register('light', lightStrategies)
    .register('switch', switchStrategies)
    .register('lock', lockStrategies);
}
