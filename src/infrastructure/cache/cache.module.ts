import { Module, Global, Logger } from '@nestjs/common';
import { CacheModule as NestCacheModule, CACHE_MANAGER } from '@nestjs/cache-manager';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Cache } from 'cache-manager';
import { Keyv } from 'keyv';
import KeyvRedis from '@keyv/redis';
import { errorMessage } from '../../common/utils/error';
import { RedisModule } from '../../database/redis/redis.module';
import { RedisService } from '../../database/redis/redis.service';
import { SchedulerModule } from '../scheduler/scheduler.module';
import { CACHE_TIERS } from './cache.constants';
import { CacheKeyService } from './cache-key.service';
import { CacheStatsService } from './cache-stats.service';
import { CacheWarmerService } from './cache-warmer.service';
import { CacheService } from './cache.service';
import { StorageTier } from './cache.types';
import { ExpirySweeperService } from './expiry-sweeper.service';
import { InvalidationRouter } from './invalidation.router';
import { TtlCacheService } from './ttl-cache.service';
import { EphemeralTier } from './tiers/ephemeral.tier';
import { MemoryTier } from './tiers/memory.tier';
import { PersistentTier } from './tiers/persistent.tier';

function redisUrl(configService: ConfigService): string {
  const host = configService.get<string>('database.redis.host', 'localhost');
  const port = configService.get<number>('database.redis.port', 6379);
  const password = configService.get<string>('database.redis.password');

  return password
    ? `redis://:${encodeURIComponent(password)}@${host}:${port}`
    : `redis://${host}:${port}`;
}

export interface EphemeralStoreOptions {
  stores: Keyv[];
  ttl: number;
}

/**
 * Keyv over Redis for the ephemeral tier, or a process-local Keyv while the
 * cache is disabled
 */
export function ephemeralStoreOptions(configService: ConfigService): EphemeralStoreOptions {
  const cacheEnabled = configService.get<boolean>('cache.enabled', true);
  const ttlMs = configService.get<number>('cache.duration', 3600) * 1000;

  if (!cacheEnabled) {
    return { stores: [new Keyv()], ttl: ttlMs };
  }

  const keyv = new Keyv({
    store: new KeyvRedis(redisUrl(configService)),
    namespace: configService.get<string>('cache.namespace', 'feed_cache'),
  });
  keyv.on('error', (error: unknown) => {
    new Logger('CacheModule').error(`Ephemeral store error: ${errorMessage(error)}`);
  });

  return { stores: [keyv], ttl: ttlMs };
}

/**
 * Global cache module.
 *
 * Tier chain, primary first: persistent (Redis, JSON entries carrying their
 * expiry), ephemeral (cache-manager over Keyv/Redis, native TTL), memory
 * (in-process Keyv).
 *
 * With CACHE_ENABLED=false the ephemeral store stays in memory and the
 * engine skips reads and writes.
 */
@Global()
@Module({
  imports: [
    RedisModule,
    SchedulerModule,
    NestCacheModule.registerAsync({
      imports: [ConfigModule],
      useFactory: ephemeralStoreOptions,
      inject: [ConfigService],
    }),
  ],
  providers: [
    {
      provide: CACHE_TIERS,
      useFactory: (redisService: RedisService, cacheManager: Cache): StorageTier[] => [
        new PersistentTier(redisService),
        new EphemeralTier(cacheManager),
        new MemoryTier(),
      ],
      inject: [RedisService, CACHE_MANAGER],
    },
    CacheKeyService,
    TtlCacheService,
    ExpirySweeperService,
    CacheStatsService,
    CacheWarmerService,
    CacheService,
    InvalidationRouter,
  ],
  exports: [CacheService, TtlCacheService],
})
export class CacheModule {}
