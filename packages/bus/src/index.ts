// @rvlink/bus
// Bus interface contract and its implementations.
//
// The runtime only ever talks to a CanBus. Which one backs an interface
// (SocketCAN, a recorded capture, or an in-memory stand-in) is a deployment
// decision.

export type { CanBus, CanBusFactory } from './types.js';
export { ConnectivityError, ReceiveCancelledError, isAbortError } from './errors.js';
export { FrameQueue, DEFAULT_FRAME_QUEUE_CAPACITY, type FrameQueueOptions } from './frame-queue.js';
export { VirtualCanBus, type VirtualCanBusOptions, type InjectedFrame } from './virtual.js';
export { ReplayCanBus, parseCaptureFile, type ReplayCanBusOptions } from './replay.js';
export { SocketCanBus, type SocketCanBusOptions, type DumpProcess } from './socketcan.js';
