import { Injectable, Inject, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { KeyValueStore } from '../../infrastructure/cache/cache.types';
import { REDIS_CLIENT, SCAN_BATCH_SIZE } from './redis.constants';

/**
 * JSON key-value access to Redis, backing the persistent cache tier
 */
@Injectable()
export class RedisService implements KeyValueStore, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redisClient: Redis) {}

  async get<T>(key: string): Promise<T | null> {
    const value = await this.redisClient.get(key);
    return value ? (JSON.parse(value) as T) : null;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const stringValue = JSON.stringify(value);
    if (ttlSeconds) {
      await this.redisClient.setex(key, ttlSeconds, stringValue);
    } else {
      await this.redisClient.set(key, stringValue);
    }
  }

  async del(key: string): Promise<boolean> {
    const removed = await this.redisClient.del(key);
    return removed > 0;
  }

  /**
   * Lists keys matching a glob pattern, walking the keyspace with SCAN
   */
  async scanKeys(pattern: string): Promise<string[]> {
    const keys = new Set<string>();
    let cursor = '0';

    do {
      const [next, batch] = await this.redisClient.scan(
        cursor,
        'MATCH',
        pattern,
        'COUNT',
        SCAN_BATCH_SIZE,
      );
      cursor = next;
      batch.forEach((key) => keys.add(key));
    } while (cursor !== '0');

    return Array.from(keys);
  }

  getClient(): Redis {
    return this.redisClient;
  }

  async onModuleInit() {
    try {
      const result = await this.redisClient.ping();
      if (result === 'PONG') {
        this.logger.log('Redis connection verified successfully');
      } else {
        this.logger.warn(`Redis ping returned unexpected result: ${result}`);
      }
    } catch (error) {
      this.logger.warn(
        `Redis connection verification failed: ${error instanceof Error ? error.message : 'Unknown error'}. ` +
          'Cache reads will miss and writes will fall back until Redis is reachable.',
      );
    }
  }

  async onModuleDestroy() {
    await this.redisClient.quit();
  }
}
