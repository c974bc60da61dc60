import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { Decimal } from 'decimal.js';

import {
  Conversion,
  ConversionBatch,
  ConvertOptions,
} from './conversion.interface';
import { InvalidAmountException } from './exceptions';
import {
  CONVERSION_HISTORY_REPOSITORY,
  ConversionHistoryRepository,
  HistoryFilter,
  HistoryPage,
} from './history';
import { CurrenciesService } from '../currencies/currencies.service';
import { MetricsService } from '../metrics/metrics.service';
import { RateQuote } from '../rates/rate-quote';
import { RateResolverService } from '../rates/rate-resolver.service';

const RESULT_DECIMALS = 2;
const INVERSE_RATE_DECIMALS = 8;

@Injectable()
export class ConversionsService {
  private readonly logger = new Logger(ConversionsService.name);

  constructor(
    private readonly resolver: RateResolverService,
    private readonly currencies: CurrenciesService,
    private readonly metricsService: MetricsService,
    @Inject(CONVERSION_HISTORY_REPOSITORY)
    private readonly history: ConversionHistoryRepository,
  ) {}

  async convert(
    amount: Decimal.Value,
    from: string,
    to: string,
    { save = true }: ConvertOptions = {},
  ): Promise<Conversion> {
    const value = this.parseAmount(amount);

    let quote: RateQuote;
    try {
      quote = await this.resolver.resolve([from, to]);
    } catch (error) {
      this.metricsService.conversions.inc({ status: 'failure' });
      throw error;
    }

    const conversion = this.buildConversion(value, quote);
    this.metricsService.conversions.inc({ status: 'success' });
    this.logger.debug(
      `Converted ${conversion.amount} ${conversion.origin} to ${conversion.result} ${conversion.destination}`,
    );

    if (!save) {
      return conversion;
    }

    const [stored] = await this.history.save([conversion]);
    return stored;
  }

  /**
   * Converts one amount into several currencies. Duplicate destinations and
   * the origin itself are skipped; a destination that cannot be priced is
   * reported in `failures` without failing the batch.
   */
  async convertMany(
    amount: Decimal.Value,
    from: string,
    destinations: readonly string[],
  ): Promise<ConversionBatch> {
    const value = this.parseAmount(amount);
    const origin = this.currencies.normalize(from);
    const targets = destinations.filter(
      (code) => this.currencies.normalize(code) !== origin,
    );

    const { quotes, failures } = await this.resolver.resolveMany(
      origin,
      targets,
    );
    const conversions = quotes.map((quote) =>
      this.buildConversion(value, quote),
    );

    this.metricsService.conversions.inc(
      { status: 'success' },
      conversions.length,
    );
    this.metricsService.conversions.inc({ status: 'failure' }, failures.length);
    for (const { destination, message } of failures) {
      this.logger.warn(`Could not convert ${origin} to ${destination}: ${message}`);
    }

    const id = randomUUID();
    const stored = await this.history.save(conversions, id);

    return {
      id,
      amount: value.toString(),
      origin,
      conversions: stored,
      failures: failures.map(({ destination, message }) => ({
        destination,
        message,
      })),
      createdAt: new Date(),
    };
  }

  getHistory(filter: HistoryFilter = {}): Promise<HistoryPage> {
    return this.history.list(filter);
  }

  async clearHistory(): Promise<number> {
    const removed = await this.history.clear();
    this.logger.log(`Cleared ${removed} history entries`);
    return removed;
  }

  private buildConversion(amount: Decimal, quote: RateQuote): Conversion {
    const rate = new Decimal(quote.rate);
    const [origin, destination] = quote.pair;

    return {
      amount: amount.toString(),
      origin,
      destination,
      result: amount
        .times(rate)
        .toDecimalPlaces(RESULT_DECIMALS, Decimal.ROUND_HALF_UP)
        .toFixed(RESULT_DECIMALS),
      rate: quote.rate,
      inverseRate: new Decimal(1)
        .dividedBy(rate)
        .toDecimalPlaces(INVERSE_RATE_DECIMALS, Decimal.ROUND_HALF_UP)
        .toString(),
      source: quote.source,
      rateFetchedAt: quote.fetchedAt,
      createdAt: new Date(),
    };
  }

  private parseAmount(amount: Decimal.Value): Decimal {
    let value: Decimal;
    try {
      value = new Decimal(amount);
    } catch {
      throw new InvalidAmountException(String(amount));
    }

    if (!value.isFinite() || value.lte(0)) {
      throw new InvalidAmountException(String(amount));
    }
    return value;
  }
}
