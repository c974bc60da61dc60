import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';

import { AppConfigService } from '../../config';
import { Conversion } from '../conversion.interface';
import {
  ConversionHistoryRepository,
  HistoryFilter,
  HistoryPage,
  StoredConversion,
} from './conversion-history.repository';

export const DEFAULT_HISTORY_LIMIT = 50;

@Injectable()
export class InMemoryConversionHistoryRepository
  implements ConversionHistoryRepository
{
  private readonly logger = new Logger(InMemoryConversionHistoryRepository.name);
  private readonly maxEntries: number;
  // oldest first
  private entries: StoredConversion[] = [];

  constructor(configService: AppConfigService) {
    this.maxEntries = configService.get('history.maxEntries');
  }

  async save(
    conversions: readonly Conversion[],
    batchId?: string,
  ): Promise<StoredConversion[]> {
    const stored = conversions.map(
      (conversion): StoredConversion => ({
        ...conversion,
        id: randomUUID(),
        ...(batchId ? { batchId } : {}),
      }),
    );

    this.entries.push(...stored);
    const overflow = this.entries.length - this.maxEntries;
    if (overflow > 0) {
      this.entries = this.entries.slice(overflow);
      this.logger.debug(`Dropped ${overflow} oldest history entries`);
    }

    return stored;
  }

  async list(filter: HistoryFilter = {}): Promise<HistoryPage> {
    const {
      origin,
      destination,
      limit = DEFAULT_HISTORY_LIMIT,
      offset = 0,
    } = filter;

    const matching = this.entries
      .filter(
        (entry) =>
          (!origin || entry.origin === origin.toUpperCase()) &&
          (!destination || entry.destination === destination.toUpperCase()),
      )
      .reverse();

    return {
      items: matching.slice(offset, offset + limit),
      total: matching.length,
    };
  }

  async clear(): Promise<number> {
    const removed = this.entries.length;
    this.entries = [];
    return removed;
  }
}
