import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '../../common/utils/error';
import { CACHE_CONSTANTS, CACHE_TIERS } from './cache.constants';
import { CacheKeyService } from './cache-key.service';
import {
  CacheClearReport,
  CacheFetcher,
  StorageTier,
  TierRecord,
} from './cache.types';

/**
 * A record is stale once its expiry instant is reached. Records without
 * expiry metadata are left to their store's native TTL.
 */
export function isStale(record: TierRecord, now: number): boolean {
  return record.expiresAt !== undefined && record.expiresAt <= now;
}

/**
 * TTL cache engine over an ordered chain of storage tiers.
 *
 * The first tier is the primary: `get`, `set` and `delete` only touch it.
 * The `*WithFallback` variants walk the whole chain in order. Storage
 * failures never escape: reads degrade to a miss, writes to `false`.
 *
 * @example
 * const feed = await ttlCache.wrap(`feed:${slug}`, () => renderer.render(slug), 900);
 *
 * // after a mutation
 * await ttlCache.delete(`feed:${slug}`);
 */
@Injectable()
export class TtlCacheService {
  private readonly logger = new Logger(TtlCacheService.name);
  private readonly enabled: boolean;
  private readonly duration: number;

  constructor(
    @Inject(CACHE_TIERS) private readonly tiers: StorageTier[],
    private readonly keys: CacheKeyService,
    private readonly configService: ConfigService,
  ) {
    if (tiers.length === 0) {
      throw new Error('TtlCacheService needs at least one storage tier');
    }

    this.enabled = this.configService.get<boolean>('cache.enabled', true);
    this.duration = this.configService.get<number>('cache.duration', CACHE_CONSTANTS.DEFAULT_DURATION);

    if (!this.enabled) {
      this.logger.warn('Cache is disabled. Reads will miss and writes will be skipped.');
    }
  }

  private get primary(): StorageTier {
    return this.tiers[0];
  }

  isCachingEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Default entry lifetime in seconds
   */
  getCacheDuration(): number {
    return this.duration;
  }

  async set<T>(key: string, value: T, ttlSeconds: number = this.duration): Promise<boolean> {
    if (!this.canWrite(key, value, ttlSeconds)) {
      return false;
    }
    return this.writeTo(this.primary, key, value, ttlSeconds);
  }

  async get<T>(key: string): Promise<T | undefined> {
    if (!this.enabled) {
      return undefined;
    }
    const record = await this.readFrom<T>(this.primary, key);
    return record?.value;
  }

  async delete(key: string): Promise<boolean> {
    return this.removeFrom(this.primary, key);
  }

  /**
   * Writes to the first tier of the chain that accepts the entry
   */
  async setWithFallback<T>(key: string, value: T, ttlSeconds: number = this.duration): Promise<boolean> {
    if (!this.canWrite(key, value, ttlSeconds)) {
      return false;
    }

    for (const tier of this.tiers) {
      if (await this.writeTo(tier, key, value, ttlSeconds)) {
        return true;
      }
      this.logger.warn(`Write of "${key}" to tier "${tier.name}" failed, trying next tier`);
    }

    this.logger.error(`Write of "${key}" failed on every tier`);
    return false;
  }

  /**
   * Returns the first live hit along the chain
   */
  async getWithFallback<T>(key: string): Promise<T | undefined> {
    if (!this.enabled) {
      return undefined;
    }

    for (const tier of this.tiers) {
      const record = await this.readFrom<T>(tier, key);
      if (record) {
        return record.value;
      }
    }
    return undefined;
  }

  /**
   * Removes the key from every tier of the chain
   */
  async deleteWithFallback(key: string): Promise<boolean> {
    let removed = false;
    for (const tier of this.tiers) {
      if (await this.removeFrom(tier, key)) {
        removed = true;
      }
    }
    return removed;
  }

  /**
   * Cache-aside: returns the cached value, or computes, stores and returns it.
   * Fetcher errors propagate to the caller.
   */
  async wrap<T>(key: string, fetcher: CacheFetcher<T>, ttlSeconds: number = this.duration): Promise<T> {
    if (!this.enabled) {
      return fetcher();
    }

    const cached = await this.get<T>(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await fetcher();
    if (value !== undefined) {
      await this.set(key, value, ttlSeconds);
    }
    return value;
  }

  /**
   * Removes every entry namespace-wide passes can reach on each tier, then
   * flushes tiers dedicated to the cache.
   *
   * Keys outside the namespace registry survive on tiers that cannot
   * enumerate their keys.
   */
  async clearAll(): Promise<CacheClearReport> {
    const report: CacheClearReport = { removed: 0, failed: 0 };

    for (const tier of this.tiers) {
      const candidates = await this.keys.candidateKeys(tier);

      for (const storageKey of candidates) {
        try {
          if (await tier.remove(storageKey)) {
            report.removed++;
          }
        } catch (error) {
          report.failed++;
          this.logger.error(`Failed to clear "${storageKey}" on tier "${tier.name}": ${errorMessage(error)}`);
        }
      }

      if (tier.flushAll) {
        try {
          await tier.flushAll();
        } catch (error) {
          report.failed++;
          this.logger.error(`Failed to flush tier "${tier.name}": ${errorMessage(error)}`);
        }
      }
    }

    this.logger.log(`Cache cleared: ${report.removed} entries removed, ${report.failed} failures`);
    return report;
  }

  private canWrite(key: string, value: unknown, ttlSeconds: number): boolean {
    if (!this.enabled) {
      return false;
    }
    if (value === undefined) {
      this.logger.warn(`Refusing to cache undefined under "${key}"`);
      return false;
    }
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      this.logger.warn(`Refusing to cache "${key}" with non-positive TTL ${ttlSeconds}`);
      return false;
    }
    if (Date.now() + ttlSeconds * 1000 > Number.MAX_SAFE_INTEGER) {
      this.logger.warn(`Refusing to cache "${key}" with TTL ${ttlSeconds}: expiry is out of range`);
      return false;
    }
    return true;
  }

  private async writeTo<T>(tier: StorageTier, key: string, value: T, ttlSeconds: number): Promise<boolean> {
    const createdAt = Date.now();
    const expiresAt = createdAt + ttlSeconds * 1000;

    try {
      return await tier.write(this.keys.storageKey(tier.name, key), value, {
        createdAt,
        expiresAt,
        ttlSeconds,
      });
    } catch (error) {
      this.logger.error(`Error setting cache key "${key}" on tier "${tier.name}": ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Reads a live record; a stale one is deleted on the spot and reported as a miss
   */
  private async readFrom<T>(tier: StorageTier, key: string): Promise<TierRecord<T> | undefined> {
    const storageKey = this.keys.storageKey(tier.name, key);

    let record: TierRecord<T> | undefined;
    try {
      record = await tier.read<T>(storageKey);
    } catch (error) {
      this.logger.error(`Error getting cache key "${key}" from tier "${tier.name}": ${errorMessage(error)}`);
      return undefined;
    }

    if (record && isStale(record, Date.now())) {
      await this.removeFrom(tier, key);
      return undefined;
    }
    return record;
  }

  private async removeFrom(tier: StorageTier, key: string): Promise<boolean> {
    try {
      return await tier.remove(this.keys.storageKey(tier.name, key));
    } catch (error) {
      this.logger.error(`Error deleting cache key "${key}" from tier "${tier.name}": ${errorMessage(error)}`);
      return false;
    }
  }
}
