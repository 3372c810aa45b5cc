// Root router - combines all domain routers

import { router } from '../index.js';
import { pagesRouter } from './pages.js';
import { requestsRouter } from './requests.js';
import { treasuryRouter } from './treasury.js';
import { reactionsRouter } from './reactions.js';

/**
 * The root router that combines all domain routers.
 *
 * Usage from a client (with the superjson transformer):
 * ```ts
 * const page = await client.pages.create.mutate({ name: 'Home', ..., updateFee: 1000n });
 * await client.requests.submit.mutate({ pageId: page.id, proposed: { name: 'New' }, paidFee: 1000n });
 * ```
 */
export const appRouter = router({
  pages: pagesRouter,
  requests: requestsRouter,
  treasury: treasuryRouter,
  reactions: reactionsRouter,
});

/**
 * Type of the root router, for typing clients.
 */
export type AppRouter = typeof appRouter;
