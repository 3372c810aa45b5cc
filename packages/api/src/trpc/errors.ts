// Runtime error to tRPC error mapping

import { TRPCError } from '@trpc/server';
import type { RuntimeError } from '@quire/runtime';
import { AuthorizationError, StateConflictError, ValidationError } from '@quire/runtime';

type TRPCErrorCode = TRPCError['code'];

export function trpcCodeFor(error: RuntimeError): TRPCErrorCode {
  if (error.code === 'PAGE_NOT_FOUND' || error.code === 'INVALID_REQUEST') {
    return 'NOT_FOUND';
  }
  if (error instanceof ValidationError) {
    return 'BAD_REQUEST';
  }
  if (error instanceof AuthorizationError) {
    return 'FORBIDDEN';
  }
  if (error instanceof StateConflictError) {
    return 'CONFLICT';
  }
  // TRANSFER_FAILED: the payout side refused, nothing the caller can fix
  return 'INTERNAL_SERVER_ERROR';
}

/**
 * Wrap a runtime error, keeping it as the cause.
 */
export function toTRPCError(error: RuntimeError): TRPCError {
  return new TRPCError({ code: trpcCodeFor(error), message: error.message, cause: error });
}
