import { Keyv } from 'keyv';
import { StorageUnavailableError } from '../cache.errors';
import { StorageTier, TierRecord, TierWriteMetadata } from '../cache.types';

interface MemoryEntry<T = unknown> {
  value: T;
  createdAt: number;
  expiresAt: number;
}

/**
 * In-process object cache. Private to this process and dedicated to the cache,
 * which makes a wholesale flush safe.
 */
export class MemoryTier implements StorageTier {
  readonly name = 'memory' as const;

  constructor(private readonly keyv: Keyv<MemoryEntry> = new Keyv<MemoryEntry>()) {}

  async read<T>(storageKey: string): Promise<TierRecord<T> | undefined> {
    let entry: MemoryEntry<T> | undefined;
    try {
      entry = await this.keyv.get<MemoryEntry<T>>(storageKey);
    } catch (error) {
      throw new StorageUnavailableError(this.name, 'read', error);
    }

    if (entry === undefined) {
      return undefined;
    }
    return { value: entry.value, createdAt: entry.createdAt, expiresAt: entry.expiresAt };
  }

  async write<T>(storageKey: string, value: T, metadata: TierWriteMetadata): Promise<boolean> {
    try {
      return await this.keyv.set(
        storageKey,
        { value, createdAt: metadata.createdAt, expiresAt: metadata.expiresAt },
        metadata.ttlSeconds * 1000,
      );
    } catch (error) {
      throw new StorageUnavailableError(this.name, 'write', error);
    }
  }

  async remove(storageKey: string): Promise<boolean> {
    try {
      return await this.keyv.delete(storageKey);
    } catch (error) {
      throw new StorageUnavailableError(this.name, 'remove', error);
    }
  }

  async flushAll(): Promise<void> {
    try {
      await this.keyv.clear();
    } catch (error) {
      throw new StorageUnavailableError(this.name, 'flush', error);
    }
  }
}
