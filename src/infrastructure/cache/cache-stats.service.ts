import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../../common/utils/error';
import { CACHE_TIERS } from './cache.constants';
import { CacheKeyService } from './cache-key.service';
import { CacheStats, StorageTier } from './cache.types';
import { isStale } from './ttl-cache.service';

const BYTES_PER_MB = 1024 * 1024;

/**
 * Serialized size of a stored record, in UTF-8 bytes
 */
export function estimateSize(record: unknown): number {
  return Buffer.byteLength(JSON.stringify(record), 'utf8');
}

@Injectable()
export class CacheStatsService {
  private readonly logger = new Logger(CacheStatsService.name);

  constructor(
    @Inject(CACHE_TIERS) private readonly tiers: StorageTier[],
    private readonly keys: CacheKeyService,
  ) {}

  async getCacheStats(): Promise<CacheStats> {
    const now = Date.now();
    let totalEntries = 0;
    let expiredEntries = 0;
    let cacheSizeBytes = 0;

    for (const tier of this.tiers) {
      for (const storageKey of await this.keys.candidateKeys(tier)) {
        try {
          const record = await tier.read(storageKey);
          if (!record) {
            continue;
          }
          totalEntries++;
          cacheSizeBytes += estimateSize(record);
          if (isStale(record, now)) {
            expiredEntries++;
          }
        } catch (error) {
          this.logger.warn(`Could not probe "${storageKey}" on tier "${tier.name}": ${errorMessage(error)}`);
        }
      }
    }

    return {
      totalEntries,
      expiredEntries,
      activeEntries: Math.max(0, totalEntries - expiredEntries),
      cacheSizeBytes,
      cacheSizeMb: Math.round((cacheSizeBytes / BYTES_PER_MB) * 100) / 100,
    };
  }
}
