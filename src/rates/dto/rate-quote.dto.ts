import { ApiProperty } from '@nestjs/swagger';

import { SourceName } from '../../sources/source-name.enum';
import { RateQuote } from '../rate-quote';

export class RateQuoteDto {
  @ApiProperty({ example: 'USD' })
  origin!: string;

  @ApiProperty({ example: 'BRL' })
  destination!: string;

  @ApiProperty({
    description: 'Units of destination per one unit of origin',
    example: '5.07',
  })
  rate!: string;

  @ApiProperty({ enum: SourceName, example: SourceName.FRANKFURTER })
  source!: SourceName;

  @ApiProperty({ example: '2026-03-02T10:00:00.000Z' })
  fetchedAt!: string;

  static fromQuote(quote: RateQuote): RateQuoteDto {
    const [origin, destination] = quote.pair;
    return {
      origin,
      destination,
      rate: quote.rate,
      source: quote.source,
      fetchedAt: quote.fetchedAt.toISOString(),
    };
  }
}
