import { ApiProperty } from '@nestjs/swagger';

import { RateCacheEntry, RateCacheStats } from '../cache';
import { RateQuoteDto } from './rate-quote.dto';

export class CacheEntryDto extends RateQuoteDto {
  @ApiProperty({ example: 'rate:USD/BRL' })
  key!: string;

  @ApiProperty({ example: '2026-03-02T11:00:00.000Z' })
  expiresAt!: string;
}

export class CacheStatusDto {
  @ApiProperty({ example: true })
  enabled!: boolean;

  @ApiProperty({ example: 3600 })
  ttlSeconds!: number;

  @ApiProperty({ example: 31 })
  size!: number;

  @ApiProperty({ example: 12 })
  hits!: number;

  @ApiProperty({ example: 3 })
  misses!: number;

  @ApiProperty({ type: [CacheEntryDto] })
  entries!: CacheEntryDto[];

  static from(stats: RateCacheStats, entries: RateCacheEntry[]): CacheStatusDto {
    return {
      ...stats,
      entries: entries.map(({ key, quote, expiresAt }) => ({
        ...RateQuoteDto.fromQuote(quote),
        key,
        expiresAt: expiresAt.toISOString(),
      })),
    };
  }
}
