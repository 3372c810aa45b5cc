// Pages router - creation, ownership and page reads

import { z } from 'zod';
import { router, publicProcedure } from '../index.js';
import { callerProcedure } from '../middleware.js';
import { AmountSchema, OwnershipSchema, PageRefSchema, PaginationSchema } from './schemas.js';

export const pagesRouter = router({
  /**
   * List pages in id order.
   */
  list: publicProcedure.input(PaginationSchema.optional()).query(({ ctx, input }) => {
    return ctx.registry.listPages(input);
  }),

  /**
   * Number of pages created so far.
   */
  count: publicProcedure.query(({ ctx }) => ctx.registry.getPageCount()),

  /**
   * Page metadata with ownership and balance.
   */
  get: publicProcedure.input(PageRefSchema).query(({ ctx, input }) => {
    return ctx.registry.getPageInfo(input.pageId);
  }),

  content: publicProcedure.input(PageRefSchema).query(({ ctx, input }) => {
    return ctx.registry.getCurrentContent(input.pageId);
  }),

  owners: publicProcedure.input(PageRefSchema).query(({ ctx, input }) => {
    return ctx.registry.getOwners(input.pageId);
  }),

  /**
   * Register a new page. The caller is recorded as its creator.
   */
  create: callerProcedure
    .input(
      z.object({
        name: z.string(),
        thumbnail: z.string(),
        content: z.string(),
        ownership: OwnershipSchema,
        updateFee: AmountSchema,
        immutable: z.boolean().optional(),
      })
    )
    .mutation(({ ctx, input }) => ctx.registry.createPage(ctx.caller, input)),

  /**
   * Move a single-owner page to a new ownership configuration.
   */
  changeOwnership: callerProcedure
    .input(PageRefSchema.merge(OwnershipSchema))
    .mutation(({ ctx, input }) => ctx.registry.changeOwnership(ctx.caller, input)),
});
