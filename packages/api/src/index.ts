// @quire/api
// tRPC API and event stream over the page registry

export { createApp, createAppContext, type App, type AppOptions } from './app.js';
export { createHttpServer } from './server.js';
export { loadConfig, ConfigError, type AppConfig } from './config.js';
export { openStorage, type Storage } from './db.js';
export { getCallerFromHeaders, CALLER_HEADER, type CallerResult } from './auth/caller.js';
export { EventBus, createEventBus } from './events/bus.js';
export { handleEventStream, formatEventMessage, EVENTS_PATH } from './events/stream.js';
export { appRouter, type AppRouter } from './trpc/routers/index.js';
export { createCallerFactory } from './trpc/index.js';
export { createContextFactory, type Context, type ContextDependencies } from './trpc/context.js';
export { toTRPCError, trpcCodeFor } from './trpc/errors.js';
