// tRPC initialization
//
// Sets up tRPC with the superjson transformer so that bigint amounts cross
// the wire intact. Runtime errors are translated to tRPC codes in one place
// and their own code is exposed to clients as data.runtimeCode.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import { isRuntimeError } from '@quire/runtime';
import type { Context } from './context.js';
import { toTRPCError } from './errors.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        // Include the runtime code for client-side handling
        runtimeCode: isRuntimeError(error.cause) ? error.cause.code : null,
      },
    };
  },
});

/**
 * Export router factory.
 */
export const router = t.router;

/**
 * Export middleware factory.
 */
export const middleware = t.middleware;

export const createCallerFactory = t.createCallerFactory;

const runtimeErrors = middleware(async ({ ctx, path, next }) => {
  const result = await next();
  if (!result.ok && isRuntimeError(result.error.cause)) {
    ctx.logger.debug('Operation rejected', { path, code: result.error.cause.code });
    throw toTRPCError(result.error.cause);
  }
  return result;
});

/**
 * Base procedure. No caller required (reads).
 */
export const publicProcedure = t.procedure.use(runtimeErrors);

/**
 * Re-export TRPCError for use in routers.
 */
export { TRPCError };
