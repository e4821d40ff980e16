// Diagnostics router

import { router, publicProcedure } from '../index.js';

export const diagnosticsRouter = router({
  snapshot: publicProcedure.query(({ ctx }) => ctx.gateway.diagnostics.snapshot()),

  unmapped: publicProcedure.query(({ ctx }) => ctx.gateway.diagnostics.unmapped()),

  unknownDgns: publicProcedure.query(({ ctx }) => ctx.gateway.diagnostics.unknownDgns()),

  hub: publicProcedure.query(({ ctx }) => ctx.gateway.hub.stats()),
});
