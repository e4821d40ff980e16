// HTTP surface - tRPC, the event stream and a health check

import express from 'express';
import type { Express } from 'express';
import { createExpressMiddleware } from '@trpc/server/adapters/express';
import type { Gateway, Logger } from '@rvlink/runtime';
import { describeError, silentLogger } from '@rvlink/runtime';
import { createEventsHandler } from './events/stream.js';
import { createContext } from './trpc/context.js';
import { appRouter } from './trpc/routers/index.js';

export const TRPC_ENDPOINT = '/trpc';

export type AppOptions = {
  gateway: Gateway;
  logger?: Logger;
  heartbeatMs?: number;
};

/**
 * Build the express app.
 *
 * - `/trpc/*`: the tRPC API
 * - `GET /events`: state change stream
 * - `GET /health`: interface states
 */
export function createApp(options: AppOptions): Express {
  const { gateway, logger = silentLogger, heartbeatMs } = options;
  const app = express();
  app.disable('x-powered-by');

  app.use(
    TRPC_ENDPOINT,
    createExpressMiddleware({
      router: appRouter,
      createContext: () => createContext({ gateway, logger }),
      onError({ error, path }) {
        if (error.code === 'INTERNAL_SERVER_ERROR') {
          logger.error('tRPC procedure failed', { path, ...describeError(error) });
        }
      },
    })
  );

  app.get('/events', createEventsHandler({ hub: gateway.hub, heartbeatMs, logger }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', interfaces: gateway.status() });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
