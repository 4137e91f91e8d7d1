import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  HealthCheckResult,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { RedisService } from '../../database/redis/redis.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly redisService: RedisService,
  ) {}

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([() => this.checkRedis()]);
  }

  async checkRedis(): Promise<HealthIndicatorResult> {
    try {
      const result = await this.redisService.getClient().ping();
      return {
        redis: {
          status: result === 'PONG' ? 'up' : 'down',
          message: result === 'PONG' ? 'Redis is healthy' : 'Redis ping failed',
        },
      };
    } catch (error) {
      return {
        redis: {
          status: 'down',
          message: error instanceof Error ? error.message : 'Redis connection failed',
        },
      };
    }
  }
}
