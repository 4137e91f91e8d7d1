import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Logger, Post } from '@nestjs/common';
import { CacheService } from '../../infrastructure/cache/cache.service';
import { CacheSettings, CacheStats } from '../../infrastructure/cache/cache.types';
import { ContentEventBus } from '../../infrastructure/events/content-event-bus';
import { handleError } from '../../common/utils/error';
import { PublishContentEventDto } from './dto/publish-content-event.dto';

@Controller('cache')
export class CacheAdminController {
  private readonly logger = new Logger(CacheAdminController.name);

  constructor(
    private readonly cacheService: CacheService,
    private readonly eventBus: ContentEventBus,
  ) {}

  @Get('stats')
  async getStats(): Promise<CacheStats> {
    try {
      return await this.cacheService.getCacheStats();
    } catch (error) {
      handleError(error);
    }
  }

  @Get('settings')
  getSettings(): CacheSettings {
    return {
      enabled: this.cacheService.isCachingEnabled(),
      duration: this.cacheService.getCacheDuration(),
    };
  }

  @Delete()
  async clear() {
    try {
      await this.cacheService.clearFeedCache();
      return { success: true, message: 'Cache cleared' };
    } catch (error) {
      handleError(error);
    }
  }

  @Post('cleanup')
  @HttpCode(HttpStatus.OK)
  async cleanup() {
    try {
      const report = await this.cacheService.sweep();
      return { success: true, data: report };
    } catch (error) {
      handleError(error);
    }
  }

  @Post('warm')
  @HttpCode(HttpStatus.ACCEPTED)
  async warm() {
    try {
      await this.cacheService.warmCache();
      return { success: true, message: 'Cache warming requested' };
    } catch (error) {
      handleError(error);
    }
  }

  /**
   * Webhook for the content host: relays a mutation onto the event bus
   */
  @Post('events')
  @HttpCode(HttpStatus.ACCEPTED)
  async publishEvent(@Body() body: PublishContentEventDto) {
    try {
      const handlers = await this.eventBus.publish(body.event, { contentId: body.contentId });
      this.logger.log(`Relayed "${body.event}" to ${handlers} handler(s)`);
      return { success: true, handlers };
    } catch (error) {
      handleError(error);
    }
  }
}
