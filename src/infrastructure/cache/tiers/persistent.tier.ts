import { StorageUnavailableError } from '../cache.errors';
import { CacheEntry, KeyValueStore, StorageTier, TierRecord, TierWriteMetadata } from '../cache.types';

type StoredEntry<T> = Omit<CacheEntry<T>, 'key'>;

/**
 * Durable tier. Entries are stored without a backend TTL and carry their own
 * expiry metadata, so expired entries stay until read or swept.
 */
export class PersistentTier implements StorageTier {
  readonly name = 'persistent' as const;

  constructor(private readonly store: KeyValueStore) {}

  async read<T>(storageKey: string): Promise<TierRecord<T> | undefined> {
    let stored: StoredEntry<T> | null;
    try {
      stored = await this.store.get<StoredEntry<T>>(storageKey);
    } catch (error) {
      throw new StorageUnavailableError(this.name, 'read', error);
    }

    if (stored === null) {
      return undefined;
    }
    return { value: stored.value, createdAt: stored.createdAt, expiresAt: stored.expiresAt };
  }

  async write<T>(storageKey: string, value: T, metadata: TierWriteMetadata): Promise<boolean> {
    const entry: StoredEntry<T> = {
      value,
      createdAt: metadata.createdAt,
      expiresAt: metadata.expiresAt,
    };

    try {
      await this.store.set(storageKey, entry);
      return true;
    } catch (error) {
      throw new StorageUnavailableError(this.name, 'write', error);
    }
  }

  async remove(storageKey: string): Promise<boolean> {
    try {
      return await this.store.del(storageKey);
    } catch (error) {
      throw new StorageUnavailableError(this.name, 'remove', error);
    }
  }

  async listKeys(prefix: string): Promise<string[]> {
    if (!this.store.scanKeys) {
      return [];
    }
    try {
      return await this.store.scanKeys(`${prefix}*`);
    } catch (error) {
      throw new StorageUnavailableError(this.name, 'list', error);
    }
  }
}
