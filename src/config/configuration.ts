export interface DatabaseConfig {
  redis: {
    host: string;
    port: number;
    password?: string;
  };
}

export interface CacheSweepConfig {
  enabled: boolean;
  cron: string;
}

export interface CacheConfig {
  enabled: boolean;
  namespace: string;
  /**
   * Default entry lifetime in seconds
   */
  duration: number;
  sweep: CacheSweepConfig;
}

export interface WarmingConfig {
  siteUrl?: string;
  contentTypes: string[];
  timeoutMs: number;
  userAgent: string;
  onBoot: boolean;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  database: DatabaseConfig;
  cache: CacheConfig;
  warming: WarmingConfig;
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return value === 'true' || value === '1';
}

function parseList(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export default (): AppConfig => ({
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),
  database: {
    redis: {
      host: process.env.REDIS_HOST || 'localhost',
      port: parseInt(process.env.REDIS_PORT || '6379', 10),
      password:
        process.env.REDIS_PASSWORD && process.env.REDIS_PASSWORD.trim() !== ''
          ? process.env.REDIS_PASSWORD
          : undefined,
    },
  },
  cache: {
    enabled: parseFlag(process.env.CACHE_ENABLED, true),
    namespace: process.env.CACHE_NAMESPACE || 'feed_cache',
    duration: parseInt(process.env.CACHE_DURATION || '3600', 10),
    sweep: {
      enabled: parseFlag(process.env.CACHE_SWEEP_ENABLED, true),
      cron: process.env.CACHE_SWEEP_CRON || '0 0 * * * *',
    },
  },
  warming: {
    siteUrl:
      process.env.CACHE_WARM_SITE_URL && process.env.CACHE_WARM_SITE_URL.trim() !== ''
        ? process.env.CACHE_WARM_SITE_URL.trim()
        : undefined,
    contentTypes: parseList(process.env.CACHE_WARM_CONTENT_TYPES),
    timeoutMs: parseInt(process.env.CACHE_WARM_TIMEOUT_MS || '10000', 10),
    userAgent: process.env.CACHE_WARM_USER_AGENT || 'Feed Cache Warmer',
    onBoot: parseFlag(process.env.CACHE_WARM_ON_BOOT, false),
  },
});
