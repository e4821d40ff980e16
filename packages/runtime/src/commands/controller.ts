// Command controller - turns API control requests into sent commands
//
// Requests like "toggle" or "brightness_up" depend on what the entity is
// doing now, so the controller reads the store to pick a concrete action.
// Everything is validated before the first frame is written.

import type {
  CommandAction,
  CommandParameters,
  ControlRequest,
  EntityDescriptor,
  EntityId,
  StateChangeEvent,
} from '@rvlink/protocol';
import { formatCansendArgument } from '@rvlink/protocol';
import { EntityNotFoundError } from '../errors.js';
import type { Diagnostics } from '../diagnostics/diagnostics.js';
import type { FanoutHub } from '../fanout/hub.js';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';
import type { EntityStateStore } from '../state/entity-store.js';
import type { Transmitter } from '../transmit/transmitter.js';
import type { EncoderTables } from './encoder.js';
import { encodeCommand } from './encoder.js';
import type { CommandStrategyRegistry } from './strategies.js';

export const BRIGHTNESS_STEP = 10;
export const DEFAULT_BRIGHTNESS = 100;

/**
 * Result of a sent command
 */
export type CommandReceipt = {
  entityId: EntityId;
  action: CommandAction;
  parameters: CommandParameters;

  /** Frames as written, in cansend notation ("19FEDBF9#197C640000000000") */
  frames: string[];

  event: StateChangeEvent;
};

export type CommandControllerOptions = {
  tables: EncoderTables;
  store: EntityStateStore;
  transmitter: Transmitter;
  hub: FanoutHub;
  diagnostics: Diagnostics;
  strategies?: CommandStrategyRegistry;
  now?: () => Date;
  logger?: Logger;
};

type PlannedCommand = {
  action: CommandAction;
  parameters: CommandParameters;

  /** Brightness to remember once the command is sent */
  remember?: number;
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export class CommandController {
  private options: CommandControllerOptions;
  private lastBrightness = new Map<EntityId, number>();
  private now: () => Date;
  private logger: Logger;

  constructor(options: CommandControllerOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Carry out a control request.
   *
   * @throws EntityNotFoundError, UnsupportedCapabilityError or
   *   InvalidParameterError before anything is sent
   * @throws ConnectivityError if the bus write fails
   */
  async control(entityId: EntityId, request: ControlRequest): Promise<CommandReceipt> {
    const descriptor = this.options.tables.devices.get(entityId);
    if (!descriptor) {
      throw new EntityNotFoundError(entityId);
    }

    const planned = this.plan(descriptor, request);
    const receipt = await this.issue(entityId, planned.action, planned.parameters);
    if (planned.remember !== undefined && planned.remember > 0) {
      this.lastBrightness.set(entityId, planned.remember);
    }
    return receipt;
  }

  /**
   * Encode, send and record a concrete action.
   */
  async issue(entityId: EntityId, action: CommandAction, parameters: CommandParameters = {}): Promise<CommandReceipt> {
    const { tables, store, transmitter, hub, diagnostics, strategies } = this.options;

    const frames = encodeCommand(entityId, action, parameters, tables, strategies);
    await transmitter.send(frames);
    diagnostics.recordCommand(entityId, action, frames.length);

    const event = await store.recordCommand(entityId, action, parameters, this.now().toISOString());
    diagnostics.recordStateChange();
    hub.publish(event);

    const written = frames.map(formatCansendArgument);
    this.logger.info('Command sent', { entityId, action, parameters, frames: written });

    return { entityId, action, parameters, frames: written, event };
  }

  /**
   * Current brightness in percent, or null when no status has been seen.
   */
  brightness(entityId: EntityId): number | null {
    const signal = this.options.store.get(entityId)?.signals.operating_status;
    if (signal?.status === 'ok' && typeof signal.value === 'number') {
      return signal.value;
    }
    return null;
  }

  /**
   * Brightness a light returns to when switched on without a level.
   */
  lastKnownBrightness(entityId: EntityId): number {
    return this.lastBrightness.get(entityId) ?? DEFAULT_BRIGHTNESS;
  }

  private plan(descriptor: EntityDescriptor, request: ControlRequest): PlannedCommand {
    const { entityId } = descriptor;
    const dimmable = descriptor.capabilities.includes('brightness');
    const current = this.brightness(entityId) ?? 0;
    const on = current > 0;

    switch (request.command) {
      case 'set':
        if (request.state === 'off') {
          return { action: 'turn_off', parameters: {}, remember: current };
        }
        if (request.brightness !== undefined) {
          return { action: 'set_brightness', parameters: { level: request.brightness } };
        }
        if (!dimmable) {
          return { action: 'turn_on', parameters: {} };
        }
        return { action: 'turn_on', parameters: { level: on ? current : this.lastKnownBrightness(entityId) } };

      case 'toggle':
        if (!dimmable) {
          return { action: 'toggle', parameters: {} };
        }
        if (on) {
          return { action: 'turn_off', parameters: {}, remember: current };
        }
        return { action: 'turn_on', parameters: { level: this.lastKnownBrightness(entityId) } };

      case 'brightness_up':
        return {
          action: 'set_brightness',
          parameters: { level: on ? clamp(current + BRIGHTNESS_STEP, 0, 100) : BRIGHTNESS_STEP },
        };

      case 'brightness_down':
        return { action: 'set_brightness', parameters: { level: clamp(current - BRIGHTNESS_STEP, 0, 100) } };

      case 'lock':
        return { action: 'lock', parameters: {} };

      case 'unlock':
        return { action: 'unlock', parameters: {} };
    }
  }
}
