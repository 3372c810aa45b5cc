// tRPC middleware for caller identity

import { middleware, publicProcedure, TRPCError } from './index.js';

/**
 * Middleware that requires a caller address.
 *
 * Ensures ctx.caller is not null and passes the narrowed context on.
 */
const hasCaller = middleware(async ({ ctx, next }) => {
  if (!ctx.caller) {
    throw new TRPCError({
      code: 'UNAUTHORIZED',
      message: 'Caller address required',
    });
  }

  return next({
    ctx: {
      ...ctx,
      caller: ctx.caller,
    },
  });
});

/**
 * Caller procedure - every mutation runs as some address.
 */
export const callerProcedure = publicProcedure.use(hasCaller);
