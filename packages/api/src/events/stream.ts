// Server-sent event stream of page notifications
//
// GET /events?pageId=1 keeps the connection open and writes one SSE message
// per committed event on that page. Payloads are superjson-encoded so that
// bigint amounts survive.

import type { IncomingMessage, ServerResponse } from 'node:http';
import superjson from 'superjson';
import type { PageEvent } from '@quire/protocol';
import type { EventBus } from './bus.js';

export const EVENTS_PATH = '/events';
const HEARTBEAT_MS = 30_000;

/**
 * Format one SSE message.
 */
export function formatEventMessage(event: PageEvent): string {
  return `event: ${event.type}\ndata: ${superjson.stringify(event)}\n\n`;
}

export function handleEventStream(
  req: IncomingMessage,
  res: ServerResponse,
  bus: EventBus
): void {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const pageId = Number(url.searchParams.get('pageId'));

  if (!Number.isInteger(pageId) || pageId < 1) {
    res.writeHead(400, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'pageId query parameter must be a positive integer' }));
    return;
  }

  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache, no-transform',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no',
  });
  res.write(`event: connected\ndata: ${JSON.stringify({ pageId })}\n\n`);

  const unsubscribe = bus.subscribe(pageId, (event) => {
    res.write(formatEventMessage(event));
  });

  const heartbeat = setInterval(() => {
    res.write(': heartbeat\n\n');
  }, HEARTBEAT_MS);

  req.on('close', () => {
    clearInterval(heartbeat);
    unsubscribe();
    res.end();
  });
}
