// Transmitter - writes command frames to the bus of their interface

import type { CanBus } from '@rvlink/bus';
import { ConnectivityError } from '@rvlink/bus';
import type { InterfaceName, OutboundFrame } from '@rvlink/protocol';
import { formatArbitrationId, toHex } from '@rvlink/protocol';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';

export type TransmitterOptions = {
  /** Writes per frame. RV-C devices commonly expect commands twice. Default 2. */
  repeat?: number;

  /** Delay between repeated writes. Default 50 ms. */
  repeatDelayMs?: number;

  logger?: Logger;
};

export class Transmitter {
  private buses = new Map<InterfaceName, CanBus>();
  private repeat: number;
  private repeatDelayMs: number;
  private logger: Logger;

  constructor(options: TransmitterOptions = {}) {
    const { repeat = 2, repeatDelayMs = 50, logger = silentLogger } = options;
    this.repeat = Math.max(1, repeat);
    this.repeatDelayMs = repeatDelayMs;
    this.logger = logger;
  }

  /**
   * Route frames for an interface to a bus, replacing any previous bus.
   */
  register(bus: CanBus): void {
    this.buses.set(bus.name, bus);
  }

  /**
   * Stop routing to a bus. Only removes it if it is still the registered one.
   */
  unregister(bus: CanBus): void {
    if (this.buses.get(bus.name) === bus) {
      this.buses.delete(bus.name);
    }
  }

  interfaces(): InterfaceName[] {
    return Array.from(this.buses.keys());
  }

  /**
   * Write every frame in order, each repeated.
   *
   * @throws ConnectivityError if a frame's interface has no bus or the write fails
   */
  async send(frames: readonly OutboundFrame[]): Promise<void> {
    for (const frame of frames) {
      const bus = this.buses.get(frame.interface);
      if (!bus || bus.closed) {
        throw new ConnectivityError(frame.interface, 'no open bus for interface');
      }

      for (let attempt = 0; attempt < this.repeat; attempt++) {
        if (attempt > 0 && this.repeatDelayMs > 0) {
          await sleep(this.repeatDelayMs);
        }
        try {
          await bus.send(frame);
        } catch (error) {
          if (error instanceof ConnectivityError) {
            throw error;
          }
          throw new ConnectivityError(
            frame.interface,
            'send failed',
            error instanceof Error ? error : new Error(String(error))
          );
        }
      }

      this.logger.debug('Frame sent', {
        interface: frame.interface,
        id: formatArbitrationId(frame.id),
        data: toHex(frame.data),
        repeat: this.repeat,
      });
    }
  }
}
