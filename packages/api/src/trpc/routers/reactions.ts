// Reactions router - like / dislike

import { z } from 'zod';
import { router, publicProcedure } from '../index.js';
import { callerProcedure } from '../middleware.js';
import { AddressSchema, PageIdSchema } from './schemas.js';

export const reactionsRouter = router({
  get: publicProcedure
    .input(z.object({ pageId: PageIdSchema, address: AddressSchema }))
    .query(({ ctx, input }) => ctx.registry.getReaction(input.pageId, input.address)),

  vote: callerProcedure
    .input(z.object({ pageId: PageIdSchema, kind: z.enum(['like', 'dislike']) }))
    .mutation(({ ctx, input }) => ctx.registry.vote(ctx.caller, input)),
});
