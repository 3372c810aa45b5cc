// Application wiring
//
// One registry per process. Committed events flow from the registry into the
// event bus; the tRPC router and the event stream share both.

import type { TransactionalRepositoryContext } from '@quire/repositories';
import { createContentValidator, type ContentFormatRules } from '@quire/protocol';
import {
  createPageRegistry,
  type EntropySource,
  type Logger,
  type PageRegistry,
  type PayoutGateway,
} from '@quire/runtime';
import { createEventBus, type EventBus } from './events/bus.js';
import type { Context } from './trpc/context.js';

export type AppOptions = {
  repos: TransactionalRepositoryContext;
  payouts: PayoutGateway;
  contentFormat: ContentFormatRules;
  logger: Logger;
  entropy?: EntropySource;
  clock?: () => Date;
};

export type App = {
  registry: PageRegistry;
  eventBus: EventBus;
  logger: Logger;
};

export function createApp(options: AppOptions): App {
  const eventBus = createEventBus(options.logger);
  const registry = createPageRegistry({
    repos: options.repos,
    payouts: options.payouts,
    entropy: options.entropy,
    contentValidator: createContentValidator(options.contentFormat),
    logger: options.logger,
    clock: options.clock,
    config: {
      onEvent: (event) => eventBus.publish(event),
    },
  });

  return { registry, eventBus, logger: options.logger };
}

/**
 * Context for in-process calls, bypassing HTTP.
 */
export function createAppContext(app: App, caller: string | null): Context {
  return { ...app, caller };
}
