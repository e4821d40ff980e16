// In-memory CAN bus
//
// Stands in for a physical interface in tests and local development.
// Frames are injected by the caller; frames sent are recorded.

import type { CanFrame, InterfaceName, OutboundFrame } from '@rvlink/protocol';
import type { CanBus } from './types.js';
import { ConnectivityError } from './errors.js';
import { FrameQueue } from './frame-queue.js';

export type VirtualCanBusOptions = {
  /** Deliver sent frames back to receive(), like a vcan loopback */
  loopback?: boolean;

  /** Clock used for injected frames without a timestamp */
  now?: () => Date;

  /** Frames buffered for receive() before the oldest is discarded */
  queueCapacity?: number;
};

/**
 * Frame to inject. Interface and timestamp default to the bus name and now.
 */
export type InjectedFrame = {
  id: number;
  data: Uint8Array | number[];
  timestamp?: string;
};

export class VirtualCanBus implements CanBus {
  readonly name: InterfaceName;
  readonly sent: OutboundFrame[] = [];

  private queue: FrameQueue;
  private sendFailure: ConnectivityError | null = null;
  private isClosed = false;
  private loopback: boolean;
  private now: () => Date;

  constructor(name: InterfaceName, options: VirtualCanBusOptions = {}) {
    const { loopback = false, now = () => new Date(), queueCapacity } = options;
    this.name = name;
    this.queue = new FrameQueue({ capacity: queueCapacity });
    this.loopback = loopback;
    this.now = now;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Injected frames discarded before anyone received them */
  get droppedFrames(): number {
    return this.queue.dropped;
  }

  /**
   * Make a frame available to receive().
   *
   * @returns The frame as delivered
   */
  inject(frame: InjectedFrame): CanFrame {
    const delivered: CanFrame = {
      id: frame.id,
      data: frame.data instanceof Uint8Array ? frame.data : Uint8Array.from(frame.data),
      interface: this.name,
      timestamp: frame.timestamp ?? this.now().toISOString(),
    };
    this.queue.push(delivered);
    return delivered;
  }

  receive(signal?: AbortSignal): Promise<CanFrame> {
    return this.queue.next(signal);
  }

  async send(frame: OutboundFrame): Promise<void> {
    if (this.isClosed) {
      throw new ConnectivityError(this.name, 'bus is closed');
    }
    if (this.sendFailure) {
      throw this.sendFailure;
    }

    this.sent.push(frame);
    if (this.loopback) {
      this.inject({ id: frame.id, data: frame.data });
    }
  }

  /**
   * Make subsequent sends fail without dropping the receive side.
   * Pass null to restore.
   */
  failSends(reason: string | null): void {
    this.sendFailure = reason === null ? null : new ConnectivityError(this.name, reason);
  }

  /**
   * Simulate the link going down. Buffered frames are still delivered.
   */
  disconnect(reason = 'link down'): void {
    this.isClosed = true;
    this.queue.fail(new ConnectivityError(this.name, reason));
  }

  async close(): Promise<void> {
    this.disconnect('bus is closed');
  }
}
