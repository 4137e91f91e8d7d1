/**
 * Names of the storage tiers, in their default fallback order
 */
export type TierName = 'persistent' | 'ephemeral' | 'memory';

/**
 * A cached artifact as written by the cache engine.
 * Timestamps are epoch milliseconds and `expiresAt >= createdAt`.
 */
export interface CacheEntry<T = unknown> {
  key: string;
  value: T;
  createdAt: number;
  expiresAt: number;
}

/**
 * What a tier hands back from a read. Tiers without expiry metadata
 * (their store expires entries natively) omit both timestamps.
 */
export interface TierRecord<T = unknown> {
  value: T;
  createdAt?: number;
  expiresAt?: number;
}

export interface TierWriteMetadata {
  createdAt: number;
  expiresAt: number;
  ttlSeconds: number;
}

/**
 * Uniform contract over a single storage backend.
 *
 * Implementations throw `StorageUnavailableError` when their backend fails;
 * a missing key is never an error.
 */
export interface StorageTier {
  readonly name: TierName;

  read<T>(storageKey: string): Promise<TierRecord<T> | undefined>;

  write<T>(storageKey: string, value: T, metadata: TierWriteMetadata): Promise<boolean>;

  /**
   * @returns whether an entry was removed
   */
  remove(storageKey: string): Promise<boolean>;

  /**
   * Drops every entry the tier holds. Only offered by tiers dedicated to the cache.
   */
  flushAll?(): Promise<void>;

  /**
   * Native prefix enumeration, when the backend supports it
   */
  listKeys?(prefix: string): Promise<string[]>;
}

/**
 * JSON key-value store behind the persistent tier
 */
export interface KeyValueStore {
  get<T>(key: string): Promise<T | null>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<boolean>;
  scanKeys?(pattern: string): Promise<string[]>;
}

/**
 * Recomputes the artifact from its source on a cache miss
 */
export type CacheFetcher<T> = () => Promise<T>;

export interface CacheClearReport {
  removed: number;
  failed: number;
}

export interface SweepReport {
  scanned: number;
  reclaimed: number;
  failed: number;
}

export interface CacheStats {
  totalEntries: number;
  expiredEntries: number;
  activeEntries: number;
  cacheSizeBytes: number;
  cacheSizeMb: number;
}

export interface CacheSettings {
  enabled: boolean;
  duration: number;
}
