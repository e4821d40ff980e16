// tRPC initialization
//
// superjson on the wire; every procedure runs behind the error translation
// middleware, so routers can throw runtime errors as they are.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import type { Context } from './context.js';
import { translateError } from './errors.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        code: error.code,
        // Runtime error code, e.g. UNSUPPORTED_CAPABILITY
        reason: translateError(error).reason,
      },
    };
  },
});

export const router = t.router;

export const middleware = t.middleware;

export const createCallerFactory = t.createCallerFactory;

const translateErrors = middleware(async ({ next }) => {
  const result = await next();
  if (!result.ok) {
    throw translateError(result.error).error;
  }
  return result;
});

/**
 * Base procedure. The bridge has no authentication; it is meant for the
 * coach's private network.
 */
export const publicProcedure = t.procedure.use(translateErrors);

export { TRPCError };
