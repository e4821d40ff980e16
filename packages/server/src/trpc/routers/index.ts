// Root router - combines all domain routers

import { router } from '../index.js';
import { entitiesRouter } from './entities.js';
import { metaRouter } from './meta.js';
import { diagnosticsRouter } from './diagnostics.js';
import { busRouter } from './bus.js';

/**
 * Usage from a client:
 * ```ts
 * const lights = await client.entities.list.query({ deviceClass: 'light' });
 * await client.entities.control.mutate({
 *   id: 'bedroom_ceiling_light',
 *   request: { command: 'set', state: 'on', brightness: 50 },
 * });
 * ```
 */
export const appRouter = router({
  entities: entitiesRouter,
  meta: metaRouter,
  diagnostics: diagnosticsRouter,
  bus: busRouter,
});

export type AppRouter = typeof appRouter;
