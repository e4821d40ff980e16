// Typed tRPC client for the bridge API

import { createTRPCClient, httpBatchLink } from '@trpc/client';
import superjson from 'superjson';
import type { AppRouter } from './trpc/routers/index.js';

export type BridgeClientOptions = {
  /** Base URL of the tRPC endpoint, e.g. "http://coach.local:8000/trpc" */
  url: string;

  /** Custom fetch, e.g. to add headers or route in-process */
  fetch?: Parameters<typeof httpBatchLink>[0]['fetch'];
};

/**
 * Create a typed client. Requests made in the same tick are batched.
 *
 * @example
 * const client = createBridgeClient({ url: 'http://coach.local:8000/trpc' });
 * const lights = await client.entities.list.query({ deviceClass: 'light' });
 */
export function createBridgeClient(options: BridgeClientOptions) {
  return createTRPCClient<AppRouter>({
    links: [
      httpBatchLink({
        url: options.url,
        transformer: superjson,
        fetch: options.fetch,
      }),
    ],
  });
}

export type BridgeClient = ReturnType<typeof createBridgeClient>;
