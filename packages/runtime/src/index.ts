// @rvlink/runtime
// Decoding, entity state, command encoding and fan-out for an RV-C bus

// Gateway (wires everything below together)
export {
  createGateway,
  type Gateway,
  type GatewayOptions,
  type InterfaceStatus,
} from './gateway.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  InvalidParameterError,
  UnsupportedCapabilityError,
  EntityNotFoundError,
  ConfigurationError,
  DecodeFailure,
  ResolutionMiss,
  isRuntimeError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createLevelLogger,
  createCapturingLogger,
  describeError,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logging.js';

// Tables
export { SpecificationTable } from './tables/specification-table.js';
export { DeviceTable, type DeviceFilter, type DeviceTableOptions } from './tables/device-table.js';
export {
  loadSpecification,
  loadDeviceTable,
  loadTables,
  findModelMapping,
  DEFAULT_MAPPING_FILE,
  type LoadTablesOptions,
  type LoadedTables,
} from './tables/loader.js';

// Decoding and resolution
export { decodeFrame, decodeSignal, scaleRaw, usesSentinels } from './decoder/decode.js';
export { extractBits, insertBits } from './decoder/bits.js';
export { resolveEntity } from './resolver/resolve.js';

// Entity state
export {
  EntityStateStore,
  signalsEqual,
  type ApplyOptions,
  type SourceFrame,
  type EntityStateStoreOptions,
} from './state/entity-store.js';

// Commands
export {
  encodeCommand,
  COMMAND_PRIORITY,
  BRIDGE_SOURCE_ADDRESS,
  DEFAULT_GROUP_MASK,
  type EncoderTables,
} from './commands/encoder.js';
export { encodeSignals, legalRange, type LegalRange } from './commands/packing.js';
export {
  CommandStrategyRegistry,
  createDefaultStrategies,
  type CommandStrategy,
  type DeviceStrategies,
  type StrategyContext,
} from './commands/strategies.js';
export {
  CommandController,
  BRIGHTNESS_STEP,
  DEFAULT_BRIGHTNESS,
  type CommandReceipt,
  type CommandControllerOptions,
} from './commands/controller.js';
export { Transmitter, type TransmitterOptions } from './transmit/transmitter.js';

// Ingestion
export {
  IngestionPipeline,
  type IngestionPipelineOptions,
  type PipelineState,
  type PipelineStopReason,
  type FrameOutcome,
} from './ingestion/pipeline.js';
export {
  InterfaceSupervisor,
  backoffDelay,
  type BackoffOptions,
  type InterfaceSupervisorOptions,
} from './ingestion/supervisor.js';

// Fan-out
export {
  FanoutHub,
  DEFAULT_SUBSCRIBER_CAPACITY,
  type FanoutHubOptions,
  type SubscribeOptions,
  type HubSink,
  type HubStats,
} from './fanout/hub.js';
export { Subscription, type HubMessage } from './fanout/subscription.js';

// Diagnostics
export {
  Diagnostics,
  type DiagnosticEvent,
  type DiagnosticListener,
  type DiagnosticsOptions,
} from './diagnostics/diagnostics.js';
