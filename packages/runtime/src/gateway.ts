// Gateway - builds and wires the runtime components
//
// Every collaborator is created here and passed explicitly; there is no
// module-level state. One gateway serves any number of interfaces.

import type { CanBus, CanBusFactory } from '@rvlink/bus';
import type { InterfaceName } from '@rvlink/protocol';
import type { EntityHistoryRepository } from '@rvlink/repositories';
import type { CommandStrategyRegistry } from './commands/strategies.js';
import { CommandController } from './commands/controller.js';
import { Diagnostics } from './diagnostics/diagnostics.js';
import { FanoutHub } from './fanout/hub.js';
import type { PipelineState } from './ingestion/pipeline.js';
import { IngestionPipeline } from './ingestion/pipeline.js';
import type { BackoffOptions } from './ingestion/supervisor.js';
import { InterfaceSupervisor } from './ingestion/supervisor.js';
import type { Logger } from './logging.js';
import { silentLogger } from './logging.js';
import { EntityStateStore } from './state/entity-store.js';
import type { DeviceTable } from './tables/device-table.js';
import type { SpecificationTable } from './tables/specification-table.js';
import type { TransmitterOptions } from './transmit/transmitter.js';
import { Transmitter } from './transmit/transmitter.js';

export type GatewayOptions = {
  specification: SpecificationTable;
  devices: DeviceTable;
  history?: EntityHistoryRepository;
  logger?: Logger;

  /** Default queue capacity per subscriber */
  hubCapacity?: number;

  transmit?: Omit<TransmitterOptions, 'logger'>;
  backoff?: BackoffOptions;
  strategies?: CommandStrategyRegistry;
  now?: () => Date;
};

export type InterfaceStatus = {
  interface: InterfaceName;
  state: PipelineState;
  bus: InterfaceName | null;
};

export type Gateway = {
  specification: SpecificationTable;
  devices: DeviceTable;
  store: EntityStateStore;
  hub: FanoutHub;
  diagnostics: Diagnostics;
  transmitter: Transmitter;
  controller: CommandController;
  history?: EntityHistoryRepository;

  /**
   * Start ingesting from an already open bus.
   */
  attachInterface(bus: CanBus): IngestionPipeline;

  /**
   * Keep an interface connected, reopening it after failures, until the
   * signal aborts or stop() is called.
   */
  supervise(interfaceName: InterfaceName, open: CanBusFactory, signal?: AbortSignal): Promise<void>;

  pipeline(interfaceName: InterfaceName): IngestionPipeline | undefined;

  status(): InterfaceStatus[];

  /**
   * Stop every pipeline and supervisor, close subscriptions and wait for
   * pending history writes.
   */
  stop(): Promise<void>;
};

export function createGateway(options: GatewayOptions): Gateway {
  const { specification, devices, history, logger = silentLogger, hubCapacity, backoff, strategies, now } = options;

  const diagnostics = new Diagnostics({ devices, logger });
  const store = new EntityStateStore({ devices, history, logger });
  const hub = new FanoutHub({
    snapshot: () => store.snapshot(),
    capacity: hubCapacity,
    onDrop: (subscription) => diagnostics.recordSubscriberDrop(subscription.id, subscription.dropped),
    logger,
  });
  const transmitter = new Transmitter({ ...options.transmit, logger });
  const controller = new CommandController({
    tables: { specification, devices },
    store,
    transmitter,
    hub,
    diagnostics,
    strategies,
    now,
    logger,
  });

  const pipelines = new Map<InterfaceName, IngestionPipeline>();
  const supervision = new AbortController();
  const supervisors = new Set<Promise<void>>();

  function pipelineFor(interfaceName: InterfaceName): IngestionPipeline {
    let pipeline = pipelines.get(interfaceName);
    if (!pipeline) {
      pipeline = new IngestionPipeline({ interfaceName, specification, devices, store, hub, diagnostics, logger });
      pipelines.set(interfaceName, pipeline);
    }
    return pipeline;
  }

  return {
    specification,
    devices,
    store,
    hub,
    diagnostics,
    transmitter,
    controller,
    history,

    attachInterface(bus) {
      const pipeline = pipelineFor(bus.name);
      transmitter.register(bus);
      pipeline.start(bus);
      return pipeline;
    },

    supervise(interfaceName, open, signal) {
      const combined = signal ? AbortSignal.any([signal, supervision.signal]) : supervision.signal;
      const supervisor = new InterfaceSupervisor({
        interfaceName,
        open,
        pipeline: pipelineFor(interfaceName),
        diagnostics,
        backoff,
        onConnect: (bus) => transmitter.register(bus),
        onDisconnect: (bus) => transmitter.unregister(bus),
        logger,
      });

      const running = supervisor.run(combined).finally(() => {
        supervisors.delete(running);
      });
      supervisors.add(running);
      return running;
    },

    pipeline(interfaceName) {
      return pipelines.get(interfaceName);
    },

    status() {
      return Array.from(pipelines.values()).map((pipeline) => ({
        interface: pipeline.interfaceName,
        state: pipeline.state,
        bus: pipeline.bus?.name ?? null,
      }));
    },

    async stop() {
      supervision.abort();
      await Promise.all(Array.from(pipelines.values()).map((pipeline) => pipeline.stop()));
      await Promise.all(Array.from(supervisors));
      hub.close();
      await store.flushHistory();
      logger.info('Gateway stopped', { interfaces: pipelines.size });
    },
  };
}
