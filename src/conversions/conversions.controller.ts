import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { ConversionsService } from './conversions.service';
import {
  ConversionBatchDto,
  ConversionDto,
  ConvertBatchDto,
  ConvertQueryDto,
  HistoryPageDto,
  HistoryQueryDto,
} from './dto';

@ApiTags('Conversions')
@Controller()
export class ConversionsController {
  constructor(private readonly conversionsService: ConversionsService) {}

  @Get('convert')
  @ApiOperation({ summary: 'Convert an amount between two currencies' })
  @ApiResponse({ status: 200, type: ConversionDto })
  @ApiResponse({ status: 400, description: 'Invalid amount or currency pair' })
  @ApiResponse({ status: 503, description: 'No source could price the pair' })
  async convert(@Query() query: ConvertQueryDto): Promise<ConversionDto> {
    const conversion = await this.conversionsService.convert(
      query.amount,
      query.from,
      query.to,
      { save: query.save },
    );
    return ConversionDto.from(conversion);
  }

  @Post('convert/batch')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Convert an amount into several currencies',
    description:
      'Destinations that cannot be priced are listed under failures instead of failing the request',
  })
  @ApiResponse({ status: 200, type: ConversionBatchDto })
  async convertBatch(@Body() body: ConvertBatchDto): Promise<ConversionBatchDto> {
    const batch = await this.conversionsService.convertMany(
      body.amount,
      body.from,
      body.to,
    );
    return ConversionBatchDto.from(batch);
  }

  @Get('conversions/history')
  @ApiOperation({ summary: 'Performed conversions, newest first' })
  @ApiResponse({ status: 200, type: HistoryPageDto })
  async getHistory(@Query() query: HistoryQueryDto): Promise<HistoryPageDto> {
    const { items, total } = await this.conversionsService.getHistory(query);
    return {
      items: items.map((item) => ({
        ...ConversionDto.from(item),
        batchId: item.batchId,
      })),
      total,
    };
  }

  @Delete('conversions/history')
  @ApiOperation({ summary: 'Remove every history entry' })
  @ApiResponse({ status: 200, schema: { example: { removed: 12 } } })
  async clearHistory(): Promise<{ removed: number }> {
    return { removed: await this.conversionsService.clearHistory() };
  }
}
