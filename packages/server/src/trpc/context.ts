// tRPC request context

import type { Gateway, Logger } from '@rvlink/runtime';

/**
 * Context available to all tRPC procedures.
 */
export type Context = {
  gateway: Gateway;
  logger: Logger;
};

export type CreateContextOptions = {
  gateway: Gateway;
  logger: Logger;
};

/**
 * Create the context for one request. The gateway is shared; nothing here
 * is per request.
 */
export function createContext(options: CreateContextOptions): Context {
  return { gateway: options.gateway, logger: options.logger };
}
