import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import { errorMessage } from '../../common/utils/error';
import {
  CACHE_BASE_KEYS,
  CACHE_CONSTANTS,
  CACHE_KEY_VARIANTS,
  TIER_KEY_SEGMENTS,
} from './cache.constants';
import { StorageTier, TierName } from './cache.types';

export function hashKey(key: string): string {
  return createHash('md5').update(key).digest('hex');
}

/**
 * Every logical key of the namespace registry: each base key with each variant suffix
 */
export function registryKeys(): string[] {
  return CACHE_BASE_KEYS.flatMap((base) => CACHE_KEY_VARIANTS.map((variant) => `${base}${variant}`));
}

/**
 * Derives storage keys.
 * Format: {namespace}:{env}:{tierSegment}:{md5(logicalKey)}
 */
@Injectable()
export class CacheKeyService {
  private readonly logger = new Logger(CacheKeyService.name);
  private readonly namespace: string;
  private readonly nodeEnv: string;

  constructor(private readonly configService: ConfigService) {
    this.namespace = this.configService.get<string>('cache.namespace', CACHE_CONSTANTS.DEFAULT_NAMESPACE);
    this.nodeEnv = this.configService.get<string>('nodeEnv', 'development');
  }

  tierPrefix(tier: TierName): string {
    return [this.namespace, this.nodeEnv, TIER_KEY_SEGMENTS[tier], ''].join(CACHE_CONSTANTS.KEY_SEPARATOR);
  }

  storageKey(tier: TierName, key: string): string {
    return `${this.tierPrefix(tier)}${hashKey(key)}`;
  }

  /**
   * Storage keys a namespace-wide pass should visit on a tier: the registry
   * keys, plus whatever the tier can enumerate under its own prefix.
   */
  async candidateKeys(tier: StorageTier): Promise<string[]> {
    const keys = new Set(registryKeys().map((key) => this.storageKey(tier.name, key)));

    if (tier.listKeys) {
      try {
        const listed = await tier.listKeys(this.tierPrefix(tier.name));
        listed.forEach((key) => keys.add(key));
      } catch (error) {
        this.logger.warn(
          `Key enumeration failed on tier "${tier.name}", using registry keys only: ${errorMessage(error)}`,
        );
      }
    }

    return Array.from(keys);
  }
}
