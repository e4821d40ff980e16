// Bus collaborator contract

import type { CanFrame, InterfaceName, OutboundFrame } from '@rvlink/protocol';

/**
 * One physical (or simulated) CAN interface.
 *
 * Implementations must:
 * - resolve receive() with frames in arrival order
 * - reject receive() with ReceiveCancelledError when the signal aborts
 * - reject receive() and send() with ConnectivityError once the link is gone
 */
export interface CanBus {
  readonly name: InterfaceName;

  /** True once close() was called or the link failed */
  readonly closed: boolean;

  /**
   * Wait for the next frame.
   * Blocks until a frame arrives, the link fails, or the signal aborts.
   */
  receive(signal?: AbortSignal): Promise<CanFrame>;

  /**
   * Write a frame to the bus.
   */
  send(frame: OutboundFrame): Promise<void>;

  /**
   * Release the interface. Pending receives reject with ConnectivityError.
   */
  close(): Promise<void>;
}

/**
 * Opens a bus by interface name. Used by supervisors to reconnect.
 */
export type CanBusFactory = (name: InterfaceName) => Promise<CanBus>;
