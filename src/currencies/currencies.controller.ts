import { Controller, Get, NotFoundException, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

import { CurrenciesService } from './currencies.service';
import { CurrencyDto, ListCurrenciesQueryDto } from './dto';

@ApiTags('Currencies')
@Controller('currencies')
export class CurrenciesController {
  constructor(private readonly currenciesService: CurrenciesService) {}

  @Get()
  @ApiOperation({ summary: 'List or search supported currencies' })
  @ApiResponse({ status: 200, type: [CurrencyDto] })
  list(@Query() query: ListCurrenciesQueryDto): CurrencyDto[] {
    return this.currenciesService.list(query);
  }

  @Get(':code')
  @ApiOperation({ summary: 'Get a single currency' })
  @ApiParam({ name: 'code', example: 'EUR' })
  @ApiResponse({ status: 200, type: CurrencyDto })
  @ApiResponse({ status: 404, description: 'Unknown currency code' })
  get(@Param('code') code: string): CurrencyDto {
    const currency = this.currenciesService.get(code);
    if (!currency) {
      throw new NotFoundException(`Unknown currency code ${code}`);
    }
    return currency;
  }
}
