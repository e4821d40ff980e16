// Bus router - interface state

import { router, publicProcedure } from '../index.js';

export const busRouter = router({
  /**
   * Pipeline state per interface, and which interfaces can transmit.
   */
  status: publicProcedure.query(({ ctx }) => ({
    interfaces: ctx.gateway.status(),
    transmitting: ctx.gateway.transmitter.interfaces(),
  })),
});
