// Interface supervisor - keeps an interface's pipeline connected
//
// Opens the bus, runs the pipeline until the bus drops, then reopens with
// exponential backoff. Only the abort signal ends supervision.

import type { CanBus, CanBusFactory } from '@rvlink/bus';
import { isAbortError } from '@rvlink/bus';
import type { InterfaceName } from '@rvlink/protocol';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Diagnostics } from '../diagnostics/diagnostics.js';
import type { Logger } from '../logging.js';
import { describeError, silentLogger } from '../logging.js';
import type { IngestionPipeline } from './pipeline.js';

export type BackoffOptions = {
  /** Default 500 ms */
  initialDelayMs?: number;

  /** Default 2 */
  factor?: number;

  /** Default 30 s */
  maxDelayMs?: number;
};

export type InterfaceSupervisorOptions = {
  interfaceName: InterfaceName;
  open: CanBusFactory;
  pipeline: IngestionPipeline;
  diagnostics: Diagnostics;
  backoff?: BackoffOptions;

  /** Called with each newly opened bus before frames flow */
  onConnect?: (bus: CanBus) => void;

  /** Called when a bus is given up */
  onDisconnect?: (bus: CanBus) => void;

  logger?: Logger;
};

/**
 * Delay before retry number `attempt` (0-based).
 */
export function backoffDelay(attempt: number, options: BackoffOptions = {}): number {
  const { initialDelayMs = 500, factor = 2, maxDelayMs = 30_000 } = options;
  return Math.min(initialDelayMs * factor ** attempt, maxDelayMs);
}

export class InterfaceSupervisor {
  readonly interfaceName: InterfaceName;

  private open: CanBusFactory;
  private pipeline: IngestionPipeline;
  private diagnostics: Diagnostics;
  private backoff: BackoffOptions;
  private onConnect?: (bus: CanBus) => void;
  private onDisconnect?: (bus: CanBus) => void;
  private logger: Logger;

  constructor(options: InterfaceSupervisorOptions) {
    this.interfaceName = options.interfaceName;
    this.open = options.open;
    this.pipeline = options.pipeline;
    this.diagnostics = options.diagnostics;
    this.backoff = options.backoff ?? {};
    this.onConnect = options.onConnect;
    this.onDisconnect = options.onDisconnect;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Supervise until the signal aborts.
   */
  async run(signal: AbortSignal): Promise<void> {
    const onAbort = () => this.pipeline.requestStop();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      let retries = 0;
      let connectedBefore = false;

      while (!signal.aborted) {
        if (retries > 0 && !(await this.wait(retries - 1, signal))) {
          break;
        }

        let bus: CanBus;
        try {
          bus = await this.open(this.interfaceName);
        } catch (error) {
          retries++;
          this.logger.warn('Cannot open interface', {
            interface: this.interfaceName,
            retries,
            ...describeError(error),
          });
          continue;
        }

        if (connectedBefore) {
          this.diagnostics.recordReconnect(this.interfaceName, retries);
          this.logger.info('Interface reconnected', { interface: this.interfaceName, retries });
        }
        connectedBefore = true;
        retries = 0;

        const reason = await this.runOn(bus, signal);
        if (reason === 'stopped') {
          break;
        }
        retries = 1;
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async runOn(bus: CanBus, signal: AbortSignal) {
    this.onConnect?.(bus);
    this.pipeline.start(bus);
    if (signal.aborted) {
      this.pipeline.requestStop();
    }

    const reason = await this.pipeline.done;
    this.onDisconnect?.(bus);

    try {
      await bus.close();
    } catch (error) {
      this.logger.warn('Failed to close interface', { interface: this.interfaceName, ...describeError(error) });
    }
    return reason;
  }

  /**
   * @returns false if the signal aborted during the wait
   */
  private async wait(attempt: number, signal: AbortSignal): Promise<boolean> {
    const delay = backoffDelay(attempt, this.backoff);
    this.logger.debug('Waiting before reconnect', { interface: this.interfaceName, delay });
    try {
      await sleep(delay, undefined, { signal });
      return true;
    } catch (error) {
      if (isAbortError(error)) {
        return false;
      }
      throw error;
    }
  }
}
