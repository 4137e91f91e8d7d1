import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ContentEventBus } from '../events/content-event-bus';
import {
  CONTENT_EVENTS,
  ContentEventName,
  ContentEventPayload,
  ContentId,
} from '../events/content-events';
import { CacheService, contentCacheKey } from './cache.service';

export interface InvalidationPlan {
  contentId: ContentId | null;
  contentKey: string | null;
}

/**
 * Any mutation can change any feed (listings, counts, aggregates), so every
 * event clears the whole cache plus the mutated item's own entry.
 */
export function resolveInvalidation(payload: ContentEventPayload): InvalidationPlan {
  const contentId = payload.contentId ?? null;
  const hasId = contentId !== null && contentId !== '';

  return {
    contentId: hasId ? contentId : null,
    contentKey: hasId ? contentCacheKey(contentId) : null,
  };
}

@Injectable()
export class InvalidationRouter implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(InvalidationRouter.name);
  private unsubscribers: Array<() => void> = [];

  constructor(
    private readonly eventBus: ContentEventBus,
    private readonly cacheService: CacheService,
  ) {}

  onModuleInit(): void {
    this.unsubscribers = CONTENT_EVENTS.map((event) =>
      this.eventBus.subscribe(event, async (payload) => {
        await this.handle(event, payload);
      }),
    );
    this.logger.log(`Listening to ${CONTENT_EVENTS.length} content events`);
  }

  onModuleDestroy(): void {
    this.unsubscribers.forEach((unsubscribe) => unsubscribe());
    this.unsubscribers = [];
  }

  async handle(event: ContentEventName, payload: ContentEventPayload): Promise<InvalidationPlan> {
    const plan = resolveInvalidation(payload);
    this.logger.debug(
      `Invalidating on "${event}"${plan.contentKey !== null ? `, including ${plan.contentKey}` : ''}`,
    );

    await this.cacheService.clearFeedCache(plan.contentId);
    return plan;
  }
}
