// Runtime errors to tRPC errors
//
// EntityNotFound        -> NOT_FOUND
// Unsupported/Invalid   -> BAD_REQUEST
// Connectivity          -> INTERNAL_SERVER_ERROR (message kept)

import { TRPCError } from '@trpc/server';
import { ConnectivityError } from '@rvlink/bus';
import {
  EntityNotFoundError,
  UnsupportedCapabilityError,
  ValidationError,
  isRuntimeError,
} from '@rvlink/runtime';

export type TranslatedError = {
  error: TRPCError;

  /** Code of the underlying runtime error, if any */
  reason: string | null;
};

/**
 * Map a procedure failure to the tRPC error the client sees. Errors tRPC
 * raised itself (input validation, unknown procedure) pass through.
 */
export function translateError(error: TRPCError): TranslatedError {
  const cause = error.cause;

  if (cause instanceof EntityNotFoundError) {
    return { error: new TRPCError({ code: 'NOT_FOUND', message: cause.message, cause }), reason: cause.code };
  }
  if (cause instanceof UnsupportedCapabilityError || cause instanceof ValidationError) {
    return { error: new TRPCError({ code: 'BAD_REQUEST', message: cause.message, cause }), reason: cause.code };
  }
  if (cause instanceof ConnectivityError) {
    return {
      error: new TRPCError({ code: 'INTERNAL_SERVER_ERROR', message: cause.message, cause }),
      reason: 'CONNECTIVITY',
    };
  }
  if (isRuntimeError(cause)) {
    return { error, reason: cause.code };
  }
  return { error, reason: null };
}
