// Outbound control commands

/**
 * Actions the command encoder understands.
 */
export type CommandAction =
  | 'turn_on'
  | 'turn_off'
  | 'toggle'
  | 'set_brightness'
  | 'lock'
  | 'unlock';

export const COMMAND_ACTIONS: readonly CommandAction[] = [
  'turn_on',
  'turn_off',
  'toggle',
  'set_brightness',
  'lock',
  'unlock',
];

/**
 * Numeric parameters for an action, e.g. { level: 50 }
 */
export type CommandParameters = Record<string, number>;

/**
 * A control request as accepted by the API. The controller turns it into a
 * concrete action using the entity's current state.
 */
export type ControlRequest =
  | { command: 'set'; state: 'on' | 'off'; brightness?: number }
  | { command: 'toggle' }
  | { command: 'brightness_up' }
  | { command: 'brightness_down' }
  | { command: 'lock' }
  | { command: 'unlock' };
