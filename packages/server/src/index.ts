// @rvlink/server
// HTTP surface for the bridge: tRPC API, event stream, configuration

export { loadConfig, type ServerConfig, type BusKind } from './config.js';
export { createBusFactory, type BusConfig } from './buses.js';
export { createApp, TRPC_ENDPOINT, type AppOptions } from './http.js';
export {
  createEventsHandler,
  streamEvents,
  formatServerEvent,
  HEARTBEAT_INTERVAL_MS,
  type EventStreamOptions,
  type StreamEventsOptions,
} from './events/stream.js';
export { createContext, type Context } from './trpc/context.js';
export { appRouter, type AppRouter } from './trpc/routers/index.js';
export type { EntityView } from './trpc/routers/entities.js';
export type { BridgeMeta } from './trpc/routers/meta.js';
export { translateError } from './trpc/errors.js';
export { createBridgeClient, type BridgeClient, type BridgeClientOptions } from './client.js';
