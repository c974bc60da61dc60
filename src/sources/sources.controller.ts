import { Body, Controller, Get, Param, Patch } from '@nestjs/common';
import {
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';

import {
  SourceDescriptorDto,
  SourceStatusDto,
  UpdateSourceDto,
} from './dto';
import { CurrencyListing } from './source-adapter.interface';
import { SourceName } from './source-name.enum';
import { SourcesManagerService } from './sources-manager.service';

@ApiTags('Sources')
@Controller('sources')
export class SourcesController {
  constructor(private readonly sourcesManager: SourcesManagerService) {}

  @Get()
  @ApiOperation({
    summary: 'List rate sources',
    description: 'All configured sources in fallback order',
  })
  @ApiResponse({ status: 200, type: [SourceDescriptorDto] })
  getSources(): SourceDescriptorDto[] {
    return this.sourcesManager.getDescriptors();
  }

  @Get('status')
  @ApiOperation({
    summary: 'Probe rate sources',
    description:
      'Checks every enabled source by requesting its currency list',
  })
  @ApiResponse({ status: 200, type: [SourceStatusDto] })
  getStatus(): Promise<SourceStatusDto[]> {
    return this.sourcesManager.getStatus();
  }

  @Get(':source/currencies')
  @ApiOperation({ summary: 'Currencies advertised by a source' })
  @ApiParam({ name: 'source', enum: SourceName })
  @ApiResponse({
    status: 200,
    schema: {
      type: 'object',
      additionalProperties: { type: 'string' },
      example: { EUR: 'Euro', USD: 'United States Dollar' },
    },
  })
  @ApiResponse({ status: 404, description: 'Unknown source' })
  getCurrencies(@Param('source') source: string): Promise<CurrencyListing> {
    const { name } = this.sourcesManager.getDescriptor(source);
    return this.sourcesManager.listCurrencies(name);
  }

  @Patch(':source')
  @ApiOperation({
    summary: 'Enable or disable a source',
    description:
      'Takes effect for resolutions started after the change. Not persisted across restarts',
  })
  @ApiParam({ name: 'source', enum: SourceName })
  @ApiResponse({ status: 200, type: SourceDescriptorDto })
  @ApiResponse({ status: 400, description: 'Source lacks a required api key' })
  @ApiResponse({ status: 404, description: 'Unknown source' })
  updateSource(
    @Param('source') source: string,
    @Body() body: UpdateSourceDto,
  ): SourceDescriptorDto {
    return this.sourcesManager.setEnabled(source, body.enabled);
  }
}
