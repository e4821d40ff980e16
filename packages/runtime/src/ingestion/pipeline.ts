// Ingestion pipeline - the path every received frame takes
//
// One pipeline per interface. Frames are handled strictly in arrival order:
// decode, resolve, apply to the store, publish. Per-frame problems become
// diagnostics and the loop carries on; only losing the bus ends it.

import type { CanBus } from '@rvlink/bus';
import { ConnectivityError, isAbortError } from '@rvlink/bus';
import type { CanFrame, InterfaceName } from '@rvlink/protocol';
import { DecodeFailure, ResolutionMiss, RuntimeError } from '../errors.js';
import { decodeFrame } from '../decoder/decode.js';
import type { Diagnostics } from '../diagnostics/diagnostics.js';
import type { FanoutHub } from '../fanout/hub.js';
import type { Logger } from '../logging.js';
import { describeError, silentLogger } from '../logging.js';
import { resolveEntity } from '../resolver/resolve.js';
import type { EntityStateStore } from '../state/entity-store.js';
import type { DeviceTable } from '../tables/device-table.js';
import type { SpecificationTable } from '../tables/specification-table.js';

export type PipelineState = 'stopped' | 'listening';

/**
 * Why the receive loop ended
 *
 * - stopped: stop() was called
 * - disconnected: the bus reported a connectivity failure
 */
export type PipelineStopReason = 'stopped' | 'disconnected';

/**
 * What happened to one frame
 */
export type FrameOutcome = 'unknown_dgn' | 'unmapped' | 'unchanged' | 'changed' | 'failed';

export type IngestionPipelineOptions = {
  interfaceName: InterfaceName;
  specification: SpecificationTable;
  devices: DeviceTable;
  store: EntityStateStore;
  hub: FanoutHub;
  diagnostics: Diagnostics;
  logger?: Logger;
};

export class IngestionPipeline {
  readonly interfaceName: InterfaceName;

  private specification: SpecificationTable;
  private devices: DeviceTable;
  private store: EntityStateStore;
  private hub: FanoutHub;
  private diagnostics: Diagnostics;
  private logger: Logger;

  private currentState: PipelineState = 'stopped';
  private controller: AbortController | null = null;
  private loop: Promise<PipelineStopReason> = Promise.resolve('stopped');
  private currentBus: CanBus | null = null;

  constructor(options: IngestionPipelineOptions) {
    this.interfaceName = options.interfaceName;
    this.specification = options.specification;
    this.devices = options.devices;
    this.store = options.store;
    this.hub = options.hub;
    this.diagnostics = options.diagnostics;
    this.logger = options.logger ?? silentLogger;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  get bus(): CanBus | null {
    return this.currentBus;
  }

  /**
   * Resolves with the reason the current (or last) receive loop ended.
   */
  get done(): Promise<PipelineStopReason> {
    return this.loop;
  }

  /**
   * Start receiving from a bus. A stopped pipeline can be started again on a
   * new bus; the store is untouched.
   *
   * @throws RuntimeError if the pipeline is already listening
   */
  start(bus: CanBus): void {
    if (this.currentState === 'listening') {
      throw new RuntimeError('PIPELINE_ACTIVE', `Pipeline for ${this.interfaceName} is already listening`);
    }

    const controller = new AbortController();
    this.controller = controller;
    this.currentBus = bus;
    this.currentState = 'listening';
    this.logger.info('Pipeline listening', { interface: this.interfaceName, bus: bus.name });

    this.loop = this.run(bus, controller.signal).finally(() => {
      this.currentState = 'stopped';
      this.controller = null;
    });
  }

  /**
   * Cancel the pending receive without waiting. A frame being applied
   * finishes first.
   */
  requestStop(): void {
    this.controller?.abort();
  }

  /**
   * Stop the loop and wait for it to end.
   */
  async stop(): Promise<PipelineStopReason> {
    this.requestStop();
    return this.loop;
  }

  /**
   * Run one frame through decode, resolve, apply and publish.
   * Never throws; failures are recorded as diagnostics.
   */
  async processFrame(frame: CanFrame): Promise<FrameOutcome> {
    try {
      const decoded = decodeFrame(frame, this.specification);
      this.diagnostics.recordFrame(decoded.sourceAddress);

      if (!decoded.success) {
        this.diagnostics.recordUnknownDgn(frame, decoded);
        return 'unknown_dgn';
      }
      this.diagnostics.recordDecoded(decoded);

      const descriptor = resolveEntity(decoded, this.devices);
      if (!descriptor) {
        this.diagnostics.recordUnmapped(frame, decoded, new ResolutionMiss(decoded.dgn, decoded.instance));
        return 'unmapped';
      }

      const event = await this.store.apply(descriptor.entityId, decoded.signals, frame.timestamp, {
        cause: 'bus',
        frame: { dgn: decoded.dgn, interface: frame.interface, data: decoded.data },
      });
      if (!event) {
        return 'unchanged';
      }

      this.diagnostics.recordStateChange();
      this.hub.publish(event);
      return 'changed';
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.diagnostics.recordDecodeError(frame.interface, new DecodeFailure(frame.id, reason));
      return 'failed';
    }
  }

  private async run(bus: CanBus, signal: AbortSignal): Promise<PipelineStopReason> {
    while (!signal.aborted) {
      let frame: CanFrame;
      try {
        frame = await bus.receive(signal);
      } catch (error) {
        if (signal.aborted || isAbortError(error)) {
          break;
        }

        const reason = error instanceof ConnectivityError ? error.message : `receive failed: ${String(error)}`;
        this.diagnostics.recordDisconnect(this.interfaceName, reason);
        this.logger.warn('Interface disconnected', { interface: this.interfaceName, ...describeError(error) });
        return 'disconnected';
      }

      await this.processFrame(frame);
    }

    this.logger.info('Pipeline stopped', { interface: this.interfaceName });
    return 'stopped';
  }
}
