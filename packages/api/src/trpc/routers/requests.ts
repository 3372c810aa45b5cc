// Requests router - update submission and approval

import { z } from 'zod';
import { router, publicProcedure } from '../index.js';
import { callerProcedure } from '../middleware.js';
import {
  AmountSchema,
  FieldUpdateSchema,
  PageIdSchema,
  PageRefSchema,
  PaginationSchema,
  RequestIdSchema,
} from './schemas.js';

const RequestRefSchema = z.object({ pageId: PageIdSchema, requestId: RequestIdSchema });

export const requestsRouter = router({
  get: publicProcedure.input(RequestRefSchema).query(({ ctx, input }) => {
    return ctx.registry.getUpdateRequest(input.pageId, input.requestId);
  }),

  /**
   * List a page's requests, optionally by status.
   */
  list: publicProcedure
    .input(
      PageRefSchema.merge(PaginationSchema).extend({
        status: z.array(z.enum(['pending', 'executed'])).optional(),
      })
    )
    .query(({ ctx, input }) => {
      const { pageId, ...filter } = input;
      return ctx.registry.listUpdateRequests(pageId, filter);
    }),

  /**
   * Propose new field values and pay the page's fee.
   */
  submit: callerProcedure
    .input(
      z.object({
        pageId: PageIdSchema,
        proposed: FieldUpdateSchema,
        paidFee: AmountSchema,
      })
    )
    .mutation(({ ctx, input }) => ctx.registry.requestUpdate(ctx.caller, input)),

  approve: callerProcedure
    .input(RequestRefSchema)
    .mutation(({ ctx, input }) => ctx.registry.approveRequest(ctx.caller, input)),
});
