import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import NodeCache from 'node-cache';

import { formatPairLabel } from '../../common';
import { AppConfigService } from '../../config';
import { MetricsService } from '../../metrics/metrics.service';
import { Pair } from '../../sources/source-adapter.interface';
import { RateQuote } from '../rate-quote';
import { RateCacheEntry, RateCacheStats } from './rate-cache.interface';

/**
 * TTL store of the latest quote per ordered currency pair.
 *
 * A quote is served while `now <= expiresAt`. Expiry is checked on read;
 * the periodic sweep (`cache.checkPeriodSeconds`) only frees memory earlier.
 * Entries are replaced on write, never mutated.
 */
@Injectable()
export class RateCacheService implements OnModuleDestroy {
  private readonly logger = new Logger(RateCacheService.name);
  private readonly cache: NodeCache;
  private readonly enabled: boolean;
  private readonly ttlSeconds: number;
  private hits = 0;
  private misses = 0;

  constructor(
    configService: AppConfigService,
    private readonly metricsService: MetricsService,
  ) {
    const { enabled, ttlSeconds, checkPeriodSeconds } =
      configService.get('cache');
    this.enabled = enabled;
    this.ttlSeconds = ttlSeconds;

    this.cache = new NodeCache({
      stdTTL: 0,
      checkperiod: checkPeriodSeconds,
      useClones: false,
      deleteOnExpire: true,
    });

    this.cache.on('expired', (key: unknown) => {
      this.logger.debug(`Cache key expired: ${String(key)}`);
    });
    this.cache.on('del', () => {
      this.updateCacheSizeMetrics();
    });
  }

  onModuleDestroy(): void {
    this.cache.close();
  }

  get(pair: Readonly<Pair>): RateQuote | undefined {
    const key = this.generateCacheKey(pair);
    const quote = this.cache.get<RateQuote>(key);

    if (quote) {
      this.hits += 1;
      this.metricsService.cacheHits.inc();
      this.logger.debug(`Cache hit for ${key}`);
      return quote;
    }

    this.misses += 1;
    this.metricsService.cacheMisses.inc();
    this.logger.debug(`Cache miss for ${key}`);
    return undefined;
  }

  /**
   * Stores `quote` under its pair for `ttlSeconds`. Nothing is stored while
   * caching is disabled or the ttl is not positive.
   */
  put(quote: RateQuote, ttlSeconds: number = this.ttlSeconds): void {
    if (!this.enabled || ttlSeconds <= 0) {
      return;
    }

    const key = this.generateCacheKey(quote.pair);
    this.cache.set(key, quote, ttlSeconds);
    this.updateCacheSizeMetrics();
    this.logger.verbose(`Cached ${key} from ${quote.source} for ${ttlSeconds}s`);
  }

  putMany(quotes: readonly RateQuote[], ttlSeconds: number = this.ttlSeconds): void {
    if (!this.enabled || ttlSeconds <= 0 || quotes.length === 0) {
      return;
    }

    this.cache.mset(
      quotes.map((quote) => ({
        key: this.generateCacheKey(quote.pair),
        val: quote,
        ttl: ttlSeconds,
      })),
    );
    this.updateCacheSizeMetrics();
    this.logger.verbose(
      `Batch cached ${quotes.length} quotes from ${quotes[0].source} for ${ttlSeconds}s`,
    );
  }

  invalidate(pair: Readonly<Pair>): boolean {
    const key = this.generateCacheKey(pair);
    const deleted = this.cache.del(key) > 0;
    if (deleted) {
      this.logger.verbose(`Invalidated ${key}`);
    }
    return deleted;
  }

  clear(): void {
    this.cache.flushAll();
    this.updateCacheSizeMetrics();
    this.logger.debug('Cache cleared');
  }

  getEntry(pair: Readonly<Pair>): RateCacheEntry | undefined {
    return this.readEntry(this.generateCacheKey(pair));
  }

  /** Live (unexpired) entries; expired ones found on the way are dropped */
  entries(): RateCacheEntry[] {
    return this.cache
      .keys()
      .flatMap((key) => this.readEntry(key) ?? []);
  }

  getStats(): RateCacheStats {
    return {
      enabled: this.enabled,
      ttlSeconds: this.ttlSeconds,
      size: this.entries().length,
      hits: this.hits,
      misses: this.misses,
    };
  }

  private readEntry(key: string): RateCacheEntry | undefined {
    const quote = this.cache.get<RateQuote>(key);
    const expiresAt = this.cache.getTtl(key);

    if (!quote || !expiresAt) {
      return undefined;
    }

    return { key, quote, expiresAt: new Date(expiresAt) };
  }

  private generateCacheKey(pair: Readonly<Pair>): string {
    return `rate:${formatPairLabel(pair)}`;
  }

  private updateCacheSizeMetrics(): void {
    this.metricsService.cacheSize.set(this.cache.keys().length);
  }
}
