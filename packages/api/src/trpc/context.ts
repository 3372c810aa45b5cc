// tRPC request context
//
// Creates the context available to all tRPC procedures: the registry that
// performs every operation, the event bus, and the caller's address.

import type { CreateHTTPContextOptions } from '@trpc/server/adapters/standalone';
import type { Address } from '@quire/protocol';
import type { Logger, PageRegistry } from '@quire/runtime';
import { getCallerFromHeaders } from '../auth/caller.js';
import type { EventBus } from '../events/bus.js';

/**
 * Context available to all tRPC procedures.
 */
export type Context = {
  /** All reads and mutations go through the registry */
  registry: PageRegistry;

  /** Event bus for page notifications */
  eventBus: EventBus;

  logger: Logger;

  /** Caller address (null if the request carried none) */
  caller: Address | null;
};

export type ContextDependencies = Omit<Context, 'caller'>;

/**
 * Build the per-request context factory for the HTTP adapter.
 */
export function createContextFactory(deps: ContextDependencies) {
  return ({ req }: CreateHTTPContextOptions): Context => {
    const result = getCallerFromHeaders(req.headers);
    return {
      ...deps,
      caller: result.success ? result.caller : null,
    };
  };
}
