import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../../common/utils/error';
import { ContentEventHandler, ContentEventName, ContentEventPayload } from './content-events';

/**
 * In-process publish/subscribe channel for content mutations
 */
@Injectable()
export class ContentEventBus {
  private readonly logger = new Logger(ContentEventBus.name);
  private readonly handlers = new Map<ContentEventName, Set<ContentEventHandler>>();

  /**
   * @returns a function that removes the subscription
   */
  subscribe(event: ContentEventName, handler: ContentEventHandler): () => void {
    let handlers = this.handlers.get(event);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(event, handlers);
    }
    handlers.add(handler);

    return () => {
      this.handlers.get(event)?.delete(handler);
    };
  }

  listenerCount(event: ContentEventName): number {
    return this.handlers.get(event)?.size ?? 0;
  }

  /**
   * Runs every handler of the event and waits for all of them. A failing
   * handler is logged and does not stop the others.
   *
   * @returns the number of handlers run
   */
  async publish(event: ContentEventName, payload: ContentEventPayload = {}): Promise<number> {
    const handlers = Array.from(this.handlers.get(event) ?? []);
    if (handlers.length === 0) {
      this.logger.debug(`No handlers for "${event}"`);
      return 0;
    }

    const results = await Promise.allSettled(
      handlers.map(async (handler) => handler(payload, event)),
    );

    results.forEach((result) => {
      if (result.status === 'rejected') {
        this.logger.error(`Handler for "${event}" failed: ${errorMessage(result.reason)}`);
      }
    });

    return handlers.length;
  }
}
