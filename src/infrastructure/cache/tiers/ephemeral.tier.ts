import { Cache } from 'cache-manager';
import { StorageUnavailableError } from '../cache.errors';
import { StorageTier, TierRecord, TierWriteMetadata } from '../cache.types';

/**
 * Values are wrapped so a cached `null` stays distinguishable from a miss.
 * Entries written by other clients of the store may lack the timestamps.
 */
interface Envelope<T> {
  value: T;
  createdAt?: number;
  expiresAt?: number;
}

/**
 * Expiring tier over cache-manager. The store drops entries on its own TTL;
 * the envelope also records the expiry so sweeps and stats see it.
 */
export class EphemeralTier implements StorageTier {
  readonly name = 'ephemeral' as const;

  constructor(private readonly cacheManager: Cache) {}

  async read<T>(storageKey: string): Promise<TierRecord<T> | undefined> {
    let envelope: Envelope<T> | null | undefined;
    try {
      envelope = await this.cacheManager.get<Envelope<T>>(storageKey);
    } catch (error) {
      throw new StorageUnavailableError(this.name, 'read', error);
    }

    if (envelope === null || envelope === undefined) {
      return undefined;
    }
    const record: TierRecord<T> = { value: envelope.value };
    if (typeof envelope.createdAt === 'number') {
      record.createdAt = envelope.createdAt;
    }
    if (typeof envelope.expiresAt === 'number') {
      record.expiresAt = envelope.expiresAt;
    }
    return record;
  }

  async write<T>(storageKey: string, value: T, metadata: TierWriteMetadata): Promise<boolean> {
    const envelope: Envelope<T> = {
      value,
      createdAt: metadata.createdAt,
      expiresAt: metadata.expiresAt,
    };
    try {
      // cache-manager takes the TTL in milliseconds
      await this.cacheManager.set(storageKey, envelope, metadata.ttlSeconds * 1000);
      return true;
    } catch (error) {
      throw new StorageUnavailableError(this.name, 'write', error);
    }
  }

  async remove(storageKey: string): Promise<boolean> {
    try {
      const existing = await this.cacheManager.get<Envelope<unknown>>(storageKey);
      if (existing === null || existing === undefined) {
        return false;
      }
      await this.cacheManager.del(storageKey);
      return true;
    } catch (error) {
      throw new StorageUnavailableError(this.name, 'remove', error);
    }
  }
}
