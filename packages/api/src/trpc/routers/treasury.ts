// Treasury router - balances, withdrawal and distribution

import { router, publicProcedure } from '../index.js';
import { callerProcedure } from '../middleware.js';
import { PageRefSchema } from './schemas.js';

export const treasuryRouter = router({
  get: publicProcedure.input(PageRefSchema).query(({ ctx, input }) => {
    return ctx.registry.getTreasury(input.pageId);
  }),

  balance: publicProcedure.input(PageRefSchema).query(({ ctx, input }) => {
    return ctx.registry.getBalance(input.pageId);
  }),

  participants: publicProcedure.input(PageRefSchema).query(({ ctx, input }) => {
    return ctx.registry.getParticipants(input.pageId);
  }),

  withdraw: callerProcedure
    .input(PageRefSchema)
    .mutation(({ ctx, input }) => ctx.registry.withdrawPageFees(ctx.caller, input)),

  distribute: callerProcedure
    .input(PageRefSchema)
    .mutation(({ ctx, input }) => ctx.registry.distributePageTreasury(ctx.caller, input)),
});
