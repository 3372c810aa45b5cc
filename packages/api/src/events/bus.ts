// In-memory event pub/sub for page notifications
//
// The registry publishes each committed PageEvent here. Subscribers listen
// per page. For more than one server process this would be replaced with a
// shared broker.

import type { PageEvent, PageEventHandler, PageId } from '@quire/protocol';
import { silentLogger, type Logger } from '@quire/runtime';

type Subscription = {
  pageId: PageId;
  handler: PageEventHandler;
};

/**
 * In-memory event bus for pub/sub.
 *
 * Subscribers receive events for the pages they subscribed to.
 */
export class EventBus {
  private subscriptions: Map<PageId, Set<Subscription>> = new Map();

  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Subscribe to events for a specific page.
   *
   * @returns Unsubscribe function
   */
  subscribe(pageId: PageId, handler: PageEventHandler): () => void {
    const subscription: Subscription = { pageId, handler };

    let subs = this.subscriptions.get(pageId);
    if (!subs) {
      subs = new Set();
      this.subscriptions.set(pageId, subs);
    }
    subs.add(subscription);

    return () => {
      const current = this.subscriptions.get(pageId);
      if (current) {
        current.delete(subscription);
        if (current.size === 0) {
          this.subscriptions.delete(pageId);
        }
      }
    };
  }

  /**
   * Publish an event to all subscribers of the event's page.
   */
  async publish(event: PageEvent): Promise<void> {
    const subs = this.subscriptions.get(event.pageId);
    if (!subs || subs.size === 0) {
      return;
    }

    // Fan out; one failing handler does not stop the others
    const results = await Promise.allSettled(
      Array.from(subs, async (sub) => sub.handler(event))
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error('Event subscriber failed', {
          eventId: event.id,
          pageId: event.pageId,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    }
  }

  subscriberCount(pageId: PageId): number {
    return this.subscriptions.get(pageId)?.size ?? 0;
  }

  totalSubscriptions(): number {
    let total = 0;
    for (const subs of this.subscriptions.values()) {
      total += subs.size;
    }
    return total;
  }
}

export function createEventBus(logger?: Logger): EventBus {
  return new EventBus(logger);
}
