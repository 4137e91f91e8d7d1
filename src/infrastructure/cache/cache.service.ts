import { Injectable, Logger } from '@nestjs/common';
import { ContentId } from '../events/content-events';
import { CACHE_CONSTANTS } from './cache.constants';
import { CacheStatsService } from './cache-stats.service';
import { CacheWarmerService } from './cache-warmer.service';
import { CacheFetcher, CacheStats, SweepReport } from './cache.types';
import { ExpirySweeperService } from './expiry-sweeper.service';
import { TtlCacheService } from './ttl-cache.service';

export function contentCacheKey(contentId: ContentId): string {
  return `${CACHE_CONSTANTS.CONTENT_KEY_PREFIX}${contentId}`;
}

/**
 * Public entry point of the cache, injected wherever artifacts are cached
 *
 * @example
 * const xml = await cacheService.wrap('feed_cache', () => feedRenderer.render('rss2'));
 */
@Injectable()
export class CacheService {
  private readonly logger = new Logger(CacheService.name);

  constructor(
    private readonly ttlCache: TtlCacheService,
    private readonly sweeper: ExpirySweeperService,
    private readonly stats: CacheStatsService,
    private readonly warmer: CacheWarmerService,
  ) {}

  set<T>(key: string, value: T, ttlSeconds?: number): Promise<boolean> {
    return this.ttlCache.set(key, value, ttlSeconds);
  }

  get<T>(key: string): Promise<T | undefined> {
    return this.ttlCache.get<T>(key);
  }

  delete(key: string): Promise<boolean> {
    return this.ttlCache.delete(key);
  }

  setWithFallback<T>(key: string, value: T, ttlSeconds?: number): Promise<boolean> {
    return this.ttlCache.setWithFallback(key, value, ttlSeconds);
  }

  getWithFallback<T>(key: string): Promise<T | undefined> {
    return this.ttlCache.getWithFallback<T>(key);
  }

  wrap<T>(key: string, fetcher: CacheFetcher<T>, ttlSeconds?: number): Promise<T> {
    return this.ttlCache.wrap(key, fetcher, ttlSeconds);
  }

  async clearAll(): Promise<void> {
    await this.ttlCache.clearAll();
  }

  /**
   * Drops every feed artifact, and the entry of one content item when its id is given
   */
  async clearFeedCache(contentId: ContentId | null = null): Promise<void> {
    await this.ttlCache.clearAll();

    if (contentId !== null && contentId !== '') {
      const removed = await this.ttlCache.deleteWithFallback(contentCacheKey(contentId));
      this.logger.debug(`Content cache for ${contentId} ${removed ? 'removed' : 'was not cached'}`);
    }
  }

  /**
   * @returns the number of entries reclaimed
   */
  async cleanupExpired(): Promise<number> {
    const report = await this.sweeper.sweep();
    return report.reclaimed;
  }

  sweep(): Promise<SweepReport> {
    return this.sweeper.sweep();
  }

  getCacheStats(): Promise<CacheStats> {
    return this.stats.getCacheStats();
  }

  warmCache(): Promise<void> {
    return this.warmer.warmCache();
  }

  isCachingEnabled(): boolean {
    return this.ttlCache.isCachingEnabled();
  }

  getCacheDuration(): number {
    return this.ttlCache.getCacheDuration();
  }
}
