import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

import { RateCacheService } from './cache';
import {
  CacheStatusDto,
  RateQuoteDto,
  ResolveManyQueryDto,
  ResolveManyResponseDto,
} from './dto';
import { RateResolverService } from './rate-resolver.service';

@ApiTags('Rates')
@Controller('rates')
export class RatesController {
  constructor(
    private readonly resolver: RateResolverService,
    private readonly cache: RateCacheService,
  ) {}

  @Get('cache')
  @ApiOperation({ summary: 'Cache statistics and live entries' })
  @ApiResponse({ status: 200, type: CacheStatusDto })
  getCache(): CacheStatusDto {
    return CacheStatusDto.from(this.cache.getStats(), this.cache.entries());
  }

  @Delete('cache')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Drop every cached rate' })
  @ApiResponse({ status: 204 })
  clearCache(): void {
    this.resolver.clearCache();
  }

  @Delete('cache/:origin/:destination')
  @ApiOperation({
    summary: 'Drop the cached rate of one pair',
    description: 'The next request for the pair goes to the sources',
  })
  @ApiParam({ name: 'origin', example: 'USD' })
  @ApiParam({ name: 'destination', example: 'BRL' })
  @ApiResponse({ status: 200, schema: { example: { invalidated: true } } })
  @ApiResponse({ status: 400, description: 'Invalid currency pair' })
  invalidate(
    @Param('origin') origin: string,
    @Param('destination') destination: string,
  ): { invalidated: boolean } {
    return { invalidated: this.resolver.invalidate([origin, destination]) };
  }

  @Get(':origin/:destination')
  @ApiOperation({
    summary: 'Exchange rate of a pair',
    description:
      'Served from cache while fresh, otherwise from the first enabled source that prices the pair',
  })
  @ApiParam({ name: 'origin', example: 'USD' })
  @ApiParam({ name: 'destination', example: 'BRL' })
  @ApiResponse({ status: 200, type: RateQuoteDto })
  @ApiResponse({ status: 400, description: 'Invalid currency pair' })
  @ApiResponse({ status: 503, description: 'No source could price the pair' })
  async getRate(
    @Param('origin') origin: string,
    @Param('destination') destination: string,
  ): Promise<RateQuoteDto> {
    const quote = await this.resolver.resolve([origin, destination]);
    return RateQuoteDto.fromQuote(quote);
  }

  @Get(':origin')
  @ApiOperation({ summary: 'Exchange rates of one origin against several destinations' })
  @ApiParam({ name: 'origin', example: 'USD' })
  @ApiResponse({ status: 200, type: ResolveManyResponseDto })
  async getRates(
    @Param('origin') origin: string,
    @Query() query: ResolveManyQueryDto,
  ): Promise<ResolveManyResponseDto> {
    const { quotes, failures, ...rest } = await this.resolver.resolveMany(
      origin,
      query.to,
    );
    return {
      ...rest,
      quotes: quotes.map((quote) => RateQuoteDto.fromQuote(quote)),
      failures: failures.map(({ destination, message }) => ({
        destination,
        message,
      })),
    };
  }
}
