import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errorMessage } from '../../common/utils/error';

/**
 * Syndication formats served at the site root
 */
export const FEED_FORMATS = ['rss2', 'atom', 'rdf', 'rss'] as const;

export type FeedFormat = (typeof FEED_FORMATS)[number];

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_USER_AGENT = 'Feed Cache Warmer';

function feedPath(feed: string): string {
  // rss2 is the default feed
  return feed === 'rss2' ? '/feed/' : `/feed/${encodeURIComponent(feed)}/`;
}

/**
 * Primes feed caches by requesting each known feed through the normal
 * request path. Fire-and-forget: responses and failures are ignored.
 */
@Injectable()
export class CacheWarmerService implements OnApplicationBootstrap {
  private readonly logger = new Logger(CacheWarmerService.name);

  constructor(private readonly configService: ConfigService) {}

  onApplicationBootstrap(): void {
    if (!this.configService.get<boolean>('warming.onBoot', false)) {
      return;
    }
    this.warmCache().catch((error: unknown) => {
      this.logger.error(`Boot-time cache warming failed: ${errorMessage(error)}`);
    });
  }

  getFeedUrls(): string[] {
    const siteUrl = this.configService.get<string>('warming.siteUrl');
    if (!siteUrl) {
      return [];
    }

    const base = siteUrl.replace(/\/+$/, '');
    const contentTypes = this.configService.get<string[]>('warming.contentTypes', []);
    const feeds = [...FEED_FORMATS, ...contentTypes];

    return Array.from(new Set(feeds.map((feed) => `${base}${feedPath(feed)}`)));
  }

  async warmCache(): Promise<void> {
    const urls = this.getFeedUrls();
    if (urls.length === 0) {
      this.logger.debug('No site URL configured, skipping cache warming');
      return;
    }

    const timeoutMs = this.configService.get<number>('warming.timeoutMs', DEFAULT_TIMEOUT_MS);
    const userAgent = this.configService.get<string>('warming.userAgent', DEFAULT_USER_AGENT);

    const results = await Promise.allSettled(
      urls.map(async (url) => {
        const response = await fetch(url, {
          method: 'GET',
          headers: { 'User-Agent': userAgent },
          signal: AbortSignal.timeout(timeoutMs),
        });
        // only the server-side render matters, not the body
        await response.body?.cancel();
        return response.status;
      }),
    );

    let warmed = 0;
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        warmed++;
      } else {
        this.logger.debug(`Warming ${urls[index]} failed: ${errorMessage(result.reason)}`);
      }
    });

    this.logger.log(`Cache warming requested ${urls.length} feeds, ${warmed} responded`);
  }
}
