import { Injectable, Logger } from '@nestjs/common';

import { SingleFlight, formatPairLabel, withTimeout } from '../common';
import { CurrenciesService } from '../currencies/currencies.service';
import { MetricsService } from '../metrics/metrics.service';
import {
  MalformedResponseException,
  RateNotFoundException,
  SourceTimeoutException,
  getFailureReason,
} from '../sources/exceptions';
import {
  Pair,
  RateTable,
  SourceDescriptor,
} from '../sources/source-adapter.interface';
import { SourcesManagerService } from '../sources/sources-manager.service';
import { RateCacheService } from './cache/rate-cache.service';
import {
  AllProvidersExhaustedException,
  NoProvidersConfiguredException,
  RateResolutionException,
  SourceAttempt,
} from './exceptions';
import { RateQuote, createRateQuote, isPositiveRate } from './rate-quote';

export interface ResolveFailure {
  destination: string;
  message: string;
  error: unknown;
}

export interface ResolveManyResult {
  origin: string;
  quotes: RateQuote[];
  failures: ResolveFailure[];
}

const normalizePairKey = (pair: Pair): string =>
  pair.map((code) => code.trim().toUpperCase()).join('/');

/**
 * Resolves a currency pair to a quote: cache first, then every enabled
 * source in ascending priority until one of them prices the pair.
 */
@Injectable()
export class RateResolverService {
  private readonly logger = new Logger(RateResolverService.name);

  constructor(
    private readonly cache: RateCacheService,
    private readonly sourcesManager: SourcesManagerService,
    private readonly currencies: CurrenciesService,
    private readonly metricsService: MetricsService,
  ) {}

  @SingleFlight(normalizePairKey)
  async resolve(pair: Pair): Promise<RateQuote> {
    try {
      return await this.resolvePair(this.currencies.assertPair(pair));
    } catch (error) {
      if (error instanceof RateResolutionException) {
        this.metricsService.resolutionFailures.inc({ type: error.name });
      }
      throw error;
    }
  }

  /**
   * Resolves `origin` against several destinations at once. Destinations are
   * normalized and deduplicated; each one succeeds or fails on its own.
   */
  async resolveMany(
    origin: string,
    destinations: readonly string[],
  ): Promise<ResolveManyResult> {
    const base = this.currencies.normalize(origin);
    const targets = [
      ...new Set(destinations.map((code) => this.currencies.normalize(code))),
    ];

    const settled = await Promise.allSettled(
      targets.map((destination) => this.resolve([base, destination])),
    );

    const quotes: RateQuote[] = [];
    const failures: ResolveFailure[] = [];
    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        quotes.push(result.value);
        return;
      }
      const error: unknown = result.reason;
      failures.push({
        destination: targets[index],
        message: error instanceof Error ? error.message : String(error),
        error,
      });
    });

    return { origin: base, quotes, failures };
  }

  invalidate(pair: Pair): boolean {
    return this.cache.invalidate(this.currencies.assertPair(pair));
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async resolvePair(pair: Pair): Promise<RateQuote> {
    const cached = this.cache.get(pair);
    if (cached) {
      this.metricsService.resolutions.inc({ outcome: 'cache' });
      return cached;
    }

    const descriptors = this.sourcesManager.getActiveDescriptors();
    if (descriptors.length === 0) {
      this.logger.error(`No rate source enabled for ${formatPairLabel(pair)}`);
      throw new NoProvidersConfiguredException(pair);
    }

    const attempts: SourceAttempt[] = [];
    for (const descriptor of descriptors) {
      try {
        const table = await this.fetchTable(descriptor, pair[0]);
        const quote = this.storeTable(pair, table, descriptor);

        this.metricsService.resolutions.inc({
          outcome: attempts.length === 0 ? 'source' : 'fallback',
        });
        this.logger.debug(
          `Resolved ${formatPairLabel(pair)} = ${quote.rate} from ${descriptor.name}`,
        );
        return quote;
      } catch (error) {
        const reason = getFailureReason(error);
        const message = error instanceof Error ? error.message : String(error);
        attempts.push({ source: descriptor.name, reason, message, error });

        this.metricsService.sourceFailures.inc({
          source: descriptor.name,
          reason,
        });
        this.logger.warn(
          `Source ${descriptor.name} failed for ${formatPairLabel(pair)} (${reason}): ${message}`,
        );
      }
    }

    const exhausted = new AllProvidersExhaustedException(pair, attempts);
    this.logger.error(exhausted.message);
    throw exhausted;
  }

  private fetchTable(
    descriptor: SourceDescriptor,
    base: string,
  ): Promise<RateTable> {
    return withTimeout(
      this.sourcesManager.fetchRates(descriptor.name, base),
      descriptor.timeoutMs,
      () => new SourceTimeoutException(descriptor.name, descriptor.timeoutMs),
    );
  }

  /**
   * Builds the requested quote from a bulk table and caches it together with
   * every other catalogue currency the table prices against the same base.
   */
  private storeTable(
    pair: Pair,
    table: RateTable,
    descriptor: SourceDescriptor,
  ): RateQuote {
    const [origin, destination] = pair;
    const rate = table[destination];

    if (rate === undefined) {
      throw new RateNotFoundException(pair, descriptor.name);
    }
    if (!isPositiveRate(rate)) {
      throw new MalformedResponseException(
        descriptor.name,
        `rate for ${formatPairLabel(pair)} is not a positive number`,
      );
    }

    const fetchedAt = new Date();
    const quote = createRateQuote(pair, rate, descriptor.name, fetchedAt);
    const siblings = Object.entries(table).flatMap(([code, value]) =>
      code !== destination &&
      code !== origin &&
      this.currencies.isKnown(code) &&
      isPositiveRate(value)
        ? [createRateQuote([origin, code], value, descriptor.name, fetchedAt)]
        : [],
    );

    this.cache.putMany([quote, ...siblings]);
    return quote;
  }
}
