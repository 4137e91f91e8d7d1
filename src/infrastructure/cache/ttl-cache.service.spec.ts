import { ConfigService } from '@nestjs/config';
import { createTestCache, TestCache } from '../../../test/utils/cache-fixtures';
import { useManualClock, ManualClock } from '../../../test/utils/manual-clock';
import { CacheKeyService } from './cache-key.service';
import { StorageTier } from './cache.types';
import { MemoryTier } from './tiers/memory.tier';
import { TtlCacheService } from './ttl-cache.service';

describe('TtlCacheService', () => {
  let cache: TestCache;
  let clock: ManualClock;

  beforeEach(() => {
    clock = useManualClock();
    cache = createTestCache();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('set / get', () => {
    it('returns the stored value right after set', async () => {
      await expect(cache.ttlCache.set('feedA', '<xml/>', 60)).resolves.toBe(true);
      await expect(cache.ttlCache.get('feedA')).resolves.toBe('<xml/>');
    });

    it('round-trips structured values', async () => {
      const feed = { title: 'Latest', items: [{ id: 1 }, { id: 2 }] };
      await cache.ttlCache.set('feed:latest', feed, 60);

      await expect(cache.ttlCache.get('feed:latest')).resolves.toEqual(feed);
    });

    it('keeps falsy values distinguishable from a miss', async () => {
      await cache.ttlCache.set('zero', 0, 60);
      await cache.ttlCache.set('empty', '', 60);
      await cache.ttlCache.set('nothing', null, 60);

      await expect(cache.ttlCache.get('zero')).resolves.toBe(0);
      await expect(cache.ttlCache.get('empty')).resolves.toBe('');
      await expect(cache.ttlCache.get('nothing')).resolves.toBeNull();
      await expect(cache.ttlCache.get('missing')).resolves.toBeUndefined();
    });

    it('writes only to the primary tier', async () => {
      await cache.ttlCache.set('feedA', '<xml/>', 60);

      await expect(cache.persistent.read(cache.keys.storageKey('persistent', 'feedA'))).resolves.toEqual({
        value: '<xml/>',
        createdAt: clock.now(),
        expiresAt: clock.now() + 60_000,
      });
      await expect(cache.ephemeral.read(cache.keys.storageKey('ephemeral', 'feedA'))).resolves.toBeUndefined();
    });

    it('uses the configured duration when no TTL is given', async () => {
      await cache.ttlCache.set('feedA', '<xml/>');

      const record = await cache.persistent.read(cache.keys.storageKey('persistent', 'feedA'));
      expect(record?.expiresAt).toBe(clock.now() + 3600 * 1000);
    });

    it('overwrites value and expiry on a second set', async () => {
      await cache.ttlCache.set('feedA', 'v1', 60);
      clock.advanceSeconds(30);
      await cache.ttlCache.set('feedA', 'v2', 60);
      clock.advanceSeconds(45);

      await expect(cache.ttlCache.get('feedA')).resolves.toBe('v2');
    });

    it('refuses undefined values and non-positive TTLs', async () => {
      await expect(cache.ttlCache.set('feedA', undefined, 60)).resolves.toBe(false);
      await expect(cache.ttlCache.set('feedA', 'x', 0)).resolves.toBe(false);
      await expect(cache.ttlCache.set('feedA', 'x', -5)).resolves.toBe(false);
      await expect(cache.ttlCache.set('feedA', 'x', Number.NaN)).resolves.toBe(false);
      expect(cache.store.size()).toBe(0);
    });

    it('refuses TTLs whose expiry instant cannot be represented', async () => {
      await expect(cache.ttlCache.set('feedA', '<xml/>', Number.MAX_VALUE)).resolves.toBe(false);
      await expect(cache.ttlCache.setWithFallback('feedA', '<xml/>', Number.MAX_SAFE_INTEGER)).resolves.toBe(false);
      await expect(cache.ttlCache.get('feedA')).resolves.toBeUndefined();
      expect(cache.store.size()).toBe(0);
    });

    it('round-trips a long but representable TTL', async () => {
      const tenYears = 10 * 365 * 24 * 3600;

      await expect(cache.ttlCache.set('feedA', '<xml/>', tenYears)).resolves.toBe(true);
      await expect(cache.ttlCache.get('feedA')).resolves.toBe('<xml/>');
    });
  });

  describe('expiry', () => {
    it('misses once the expiry instant is reached, even before a sweep', async () => {
      await cache.ttlCache.set('feedA', '<xml/>', 60);

      clock.advanceSeconds(59);
      await expect(cache.ttlCache.get('feedA')).resolves.toBe('<xml/>');

      clock.advanceSeconds(1);
      await expect(cache.ttlCache.get('feedA')).resolves.toBeUndefined();
    });

    it('deletes an expired entry when it is read', async () => {
      await cache.ttlCache.set('feedA', '<xml/>', 60);
      clock.advanceSeconds(61);

      expect(cache.store.size()).toBe(1);
      await cache.ttlCache.get('feedA');
      expect(cache.store.size()).toBe(0);
    });

    it('stops counting an expired entry as active', async () => {
      await cache.ttlCache.set('feedA', '<xml/>', 60);
      await expect(cache.ttlCache.get('feedA')).resolves.toBe('<xml/>');

      clock.advanceSeconds(61);
      await expect(cache.ttlCache.get('feedA')).resolves.toBeUndefined();

      const stats = await cache.stats.getCacheStats();
      expect(stats.activeEntries).toBe(0);
      expect(stats.totalEntries).toBe(0);
    });
  });

  describe('delete', () => {
    it('reports whether an entry was removed', async () => {
      await cache.ttlCache.set('feedA', '<xml/>', 60);

      await expect(cache.ttlCache.delete('feedA')).resolves.toBe(true);
      await expect(cache.ttlCache.get('feedA')).resolves.toBeUndefined();
    });

    it('is a no-op on an absent key', async () => {
      await expect(cache.ttlCache.delete('never-set')).resolves.toBe(false);
      await expect(cache.ttlCache.delete('never-set')).resolves.toBe(false);
    });

    it('returns false instead of throwing when the store is down', async () => {
      await cache.ttlCache.set('feedA', '<xml/>', 60);
      cache.store.failOn('del');

      await expect(cache.ttlCache.delete('feedA')).resolves.toBe(false);
    });
  });

  describe('storage failures', () => {
    it('reports a failed primary write as false', async () => {
      cache.store.failOn('set');

      await expect(cache.ttlCache.set('feedA', '<xml/>', 60)).resolves.toBe(false);
    });

    it('reports a failed primary read as a miss', async () => {
      await cache.ttlCache.set('feedA', '<xml/>', 60);
      cache.store.failOn('get');

      await expect(cache.ttlCache.get('feedA')).resolves.toBeUndefined();
    });
  });

  describe('fallback chain', () => {
    it('writes to the next tier when the primary fails and reads it back', async () => {
      cache.store.failOn('set');

      await expect(cache.ttlCache.setWithFallback('feedA', '<xml/>', 60)).resolves.toBe(true);

      await expect(cache.ttlCache.get('feedA')).resolves.toBeUndefined();
      await expect(cache.ttlCache.getWithFallback('feedA')).resolves.toBe('<xml/>');
      await expect(cache.ephemeral.read(cache.keys.storageKey('ephemeral', 'feedA'))).resolves.toEqual({
        value: '<xml/>',
        createdAt: clock.now(),
        expiresAt: clock.now() + 60_000,
      });
    });

    it('stops at the first tier that accepts the write', async () => {
      await cache.ttlCache.setWithFallback('feedA', '<xml/>', 60);

      await expect(cache.ephemeral.read(cache.keys.storageKey('ephemeral', 'feedA'))).resolves.toBeUndefined();
      await expect(cache.memory.read(cache.keys.storageKey('memory', 'feedA'))).resolves.toBeUndefined();
    });

    it('returns false when every tier rejects the write', async () => {
      const broken: StorageTier = {
        name: 'memory',
        read: jest.fn().mockRejectedValue(new Error('down')),
        write: jest.fn().mockRejectedValue(new Error('down')),
        remove: jest.fn().mockRejectedValue(new Error('down')),
      };
      const ttlCache = new TtlCacheService([broken], new CacheKeyService(cache.config), cache.config);

      await expect(ttlCache.setWithFallback('feedA', '<xml/>', 60)).resolves.toBe(false);
      expect(broken.write).toHaveBeenCalledTimes(1);
    });

    it('prefers the primary hit over later tiers', async () => {
      await cache.memory.write(cache.keys.storageKey('memory', 'feedA'), 'stale copy', {
        createdAt: clock.now(),
        expiresAt: clock.now() + 60_000,
        ttlSeconds: 60,
      });
      await cache.ttlCache.set('feedA', 'fresh', 60);

      await expect(cache.ttlCache.getWithFallback('feedA')).resolves.toBe('fresh');
    });

    it('skips an expired primary entry and falls through', async () => {
      await cache.ttlCache.set('feedA', 'short-lived', 10);
      await cache.ephemeral.write(cache.keys.storageKey('ephemeral', 'feedA'), 'longer-lived', {
        createdAt: clock.now(),
        expiresAt: clock.now() + 120_000,
        ttlSeconds: 120,
      });
      clock.advanceSeconds(11);

      await expect(cache.ttlCache.getWithFallback('feedA')).resolves.toBe('longer-lived');
      expect(cache.store.size()).toBe(0);
    });

    it('removes a key from every tier', async () => {
      cache.store.failOn('set');
      await cache.ttlCache.setWithFallback('post_42', 'rendered', 60);
      cache.store.recover();
      await cache.ttlCache.set('post_42', 'rendered', 60);

      await expect(cache.ttlCache.deleteWithFallback('post_42')).resolves.toBe(true);
      await expect(cache.ttlCache.getWithFallback('post_42')).resolves.toBeUndefined();
      await expect(cache.ttlCache.deleteWithFallback('post_42')).resolves.toBe(false);
    });
  });

  describe('wrap', () => {
    it('computes on a miss and serves the cached value afterwards', async () => {
      const fetcher = jest.fn().mockResolvedValue('<rss/>');

      await expect(cache.ttlCache.wrap('feed:rss2', fetcher, 60)).resolves.toBe('<rss/>');
      await expect(cache.ttlCache.wrap('feed:rss2', fetcher, 60)).resolves.toBe('<rss/>');
      expect(fetcher).toHaveBeenCalledTimes(1);
    });

    it('recomputes after expiry', async () => {
      const fetcher = jest.fn().mockResolvedValueOnce('v1').mockResolvedValueOnce('v2');

      await cache.ttlCache.wrap('feed:rss2', fetcher, 60);
      clock.advanceSeconds(60);

      await expect(cache.ttlCache.wrap('feed:rss2', fetcher, 60)).resolves.toBe('v2');
    });

    it('lets fetcher errors propagate', async () => {
      await expect(
        cache.ttlCache.wrap('feed:rss2', () => Promise.reject(new Error('render failed'))),
      ).rejects.toThrow('render failed');
    });

    it('still serves computed values when the store is down', async () => {
      cache.store.failOn('get', 'set');
      const fetcher = jest.fn().mockResolvedValue('<rss/>');

      await expect(cache.ttlCache.wrap('feed:rss2', fetcher, 60)).resolves.toBe('<rss/>');
      expect(fetcher).toHaveBeenCalledTimes(1);
    });
  });

  describe('clearAll', () => {
    it('completes on an empty cache', async () => {
      await expect(cache.ttlCache.clearAll()).resolves.toEqual({ removed: 0, failed: 0 });

      const stats = await cache.stats.getCacheStats();
      expect(stats.totalEntries).toBe(0);
    });

    it('removes registry and enumerable entries across tiers', async () => {
      await cache.ttlCache.set('feed_cache', '<rss/>', 60);
      await cache.ttlCache.set('custom_feed', '<atom/>', 60);
      await cache.ephemeral.write(cache.keys.storageKey('ephemeral', 'analytics_summary_7'), { views: 3 }, {
        createdAt: clock.now(),
        expiresAt: clock.now() + 60_000,
        ttlSeconds: 60,
      });
      await cache.memory.write(cache.keys.storageKey('memory', 'anything'), 'x', {
        createdAt: clock.now(),
        expiresAt: clock.now() + 60_000,
        ttlSeconds: 60,
      });

      await expect(cache.ttlCache.clearAll()).resolves.toEqual({ removed: 3, failed: 0 });

      await expect(cache.ttlCache.get('feed_cache')).resolves.toBeUndefined();
      await expect(cache.ttlCache.get('custom_feed')).resolves.toBeUndefined();
      await expect(cache.ttlCache.getWithFallback('analytics_summary_7')).resolves.toBeUndefined();
      await expect(cache.memory.read(cache.keys.storageKey('memory', 'anything'))).resolves.toBeUndefined();
    });

    it('leaves unregistered keys behind when the primary cannot enumerate', async () => {
      const limited = createTestCache({ scan: false });
      await limited.ttlCache.set('feed_cache', '<rss/>', 60);
      await limited.ttlCache.set('custom_feed', '<atom/>', 60);

      await limited.ttlCache.clearAll();

      await expect(limited.ttlCache.get('feed_cache')).resolves.toBeUndefined();
      await expect(limited.ttlCache.get('custom_feed')).resolves.toBe('<atom/>');
    });

    it('counts failures and keeps going', async () => {
      await cache.ttlCache.set('feed_cache', '<rss/>', 60);
      cache.store.failOn('del');

      const report = await cache.ttlCache.clearAll();

      expect(report.failed).toBe(25);
      expect(report.removed).toBe(0);
    });
  });

  describe('configuration', () => {
    it('exposes the enabled flag and duration', () => {
      expect(cache.ttlCache.isCachingEnabled()).toBe(true);
      expect(cache.ttlCache.getCacheDuration()).toBe(3600);
    });

    it('defaults to enabled with one hour entries', () => {
      const config = new ConfigService({});
      const ttlCache = new TtlCacheService([new MemoryTier()], new CacheKeyService(config), config);

      expect(ttlCache.isCachingEnabled()).toBe(true);
      expect(ttlCache.getCacheDuration()).toBe(3600);
    });

    it('skips reads and writes when disabled', async () => {
      const disabled = createTestCache({ cache: { enabled: false } });

      await expect(disabled.ttlCache.set('feedA', '<xml/>', 60)).resolves.toBe(false);
      await expect(disabled.ttlCache.get('feedA')).resolves.toBeUndefined();
      expect(disabled.store.size()).toBe(0);

      const fetcher = jest.fn().mockResolvedValue('<rss/>');
      await disabled.ttlCache.wrap('feedA', fetcher);
      await disabled.ttlCache.wrap('feedA', fetcher);
      expect(fetcher).toHaveBeenCalledTimes(2);
    });

    it('rejects an empty tier chain', () => {
      expect(() => new TtlCacheService([], new CacheKeyService(cache.config), cache.config)).toThrow(
        'TtlCacheService needs at least one storage tier',
      );
    });
  });
});
