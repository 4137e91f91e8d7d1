import { TierName } from './cache.types';

/**
 * Injection token for the ordered tier chain (primary first)
 */
export const CACHE_TIERS = 'CACHE_TIERS';

export const CACHE_CONSTANTS = {
  KEY_SEPARATOR: ':',

  DEFAULT_NAMESPACE: 'feed_cache',

  /**
   * Default entry lifetime in seconds
   */
  DEFAULT_DURATION: 3600,

  /**
   * Prefix of the per-content keys cleared by content events
   */
  CONTENT_KEY_PREFIX: 'post_',

  SWEEP_TASK_NAME: 'cleanup',

  DEFAULT_SWEEP_CRON: '0 0 * * * *',
} as const;

/**
 * Key segment each tier stores under, so a logical key maps to a distinct
 * storage key per tier
 */
export const TIER_KEY_SEGMENTS: Record<TierName, string> = {
  persistent: 'entry',
  ephemeral: 'transient',
  memory: 'object',
};

/**
 * Well-known base keys probed by clear, sweep and stats. The stores offer no
 * general enumeration, so these are the keys those passes can reach.
 */
export const CACHE_BASE_KEYS = [
  'feed_cache',
  'performance_stats',
  'analytics_summary',
  'geographic_stats',
  'footer_cache',
] as const;

/**
 * Windowed variants of each base key (whole period, 30, 7 and 1 days, legacy `_cache`)
 */
export const CACHE_KEY_VARIANTS = ['', '_30', '_7', '_1', '_cache'] as const;
