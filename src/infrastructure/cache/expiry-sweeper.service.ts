import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '../../common/utils/error';
import { SchedulerService } from '../scheduler/scheduler.service';
import { CACHE_CONSTANTS, CACHE_TIERS } from './cache.constants';
import { CacheKeyService } from './cache-key.service';
import { StorageTier, SweepReport, TierRecord } from './cache.types';

/**
 * Records without expiry metadata were left in a shared store by another
 * client; a sweep reclaims them whenever it finds them.
 */
function isReclaimable(record: TierRecord, now: number): boolean {
  return record.expiresAt === undefined || record.expiresAt <= now;
}

/**
 * Hourly pass reclaiming expired entries across every tier
 */
@Injectable()
export class ExpirySweeperService implements OnModuleInit {
  private readonly logger = new Logger(ExpirySweeperService.name);

  constructor(
    @Inject(CACHE_TIERS) private readonly tiers: StorageTier[],
    private readonly keys: CacheKeyService,
    private readonly scheduler: SchedulerService,
    private readonly configService: ConfigService,
  ) {}

  onModuleInit(): void {
    if (!this.configService.get<boolean>('cache.sweep.enabled', true)) {
      this.logger.warn('Scheduled cache sweep is disabled');
      return;
    }

    const cronExpression = this.configService.get<string>(
      'cache.sweep.cron',
      CACHE_CONSTANTS.DEFAULT_SWEEP_CRON,
    );
    this.scheduler.registerTask(CACHE_CONSTANTS.SWEEP_TASK_NAME, cronExpression, () => this.sweep());
  }

  async sweep(): Promise<SweepReport> {
    const now = Date.now();
    const report: SweepReport = { scanned: 0, reclaimed: 0, failed: 0 };

    for (const tier of this.tiers) {
      const candidates = await this.keys.candidateKeys(tier);

      for (const storageKey of candidates) {
        report.scanned++;
        try {
          const record = await tier.read(storageKey);
          if (!record || !isReclaimable(record, now)) {
            continue;
          }
          if (await tier.remove(storageKey)) {
            report.reclaimed++;
          }
        } catch (error) {
          report.failed++;
          this.logger.warn(`Sweep could not reclaim "${storageKey}" on tier "${tier.name}": ${errorMessage(error)}`);
        }
      }
    }

    this.logger.log(
      `Sweep finished: ${report.reclaimed} reclaimed, ${report.failed} failed, ${report.scanned} keys scanned`,
    );
    return report;
  }
}
