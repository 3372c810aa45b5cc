// HTTP server
//
// tRPC procedures are served at /<router>.<procedure>; the page event
// stream is served at /events.

import { createServer, type Server } from 'node:http';
import { createHTTPHandler } from '@trpc/server/adapters/standalone';
import type { App } from './app.js';
import { EVENTS_PATH, handleEventStream } from './events/stream.js';
import { createContextFactory } from './trpc/context.js';
import { appRouter } from './trpc/routers/index.js';

export function createHttpServer(app: App): Server {
  const trpcHandler = createHTTPHandler({
    router: appRouter,
    createContext: createContextFactory(app),
    onError({ error, path }) {
      if (error.code === 'INTERNAL_SERVER_ERROR') {
        app.logger.error(`tRPC error on ${path ?? '<unknown>'}`, { error: error.message });
      }
    },
  });

  return createServer((req, res) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (req.method === 'GET' && pathname === EVENTS_PATH) {
      handleEventStream(req, res, app.eventBus);
      return;
    }
    void trpcHandler(req, res);
  });
}
