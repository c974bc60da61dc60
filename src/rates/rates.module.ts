import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';

import { RateCacheService } from './cache';
import { RatesExceptionFilter } from './filters';
import { RateResolverService } from './rate-resolver.service';
import { RatesController } from './rates.controller';
import { CurrenciesModule } from '../currencies/currencies.module';
import { MetricsModule } from '../metrics/metrics.module';
import { SourcesModule } from '../sources/sources.module';

@Module({
  imports: [SourcesModule, CurrenciesModule, MetricsModule],
  controllers: [RatesController],
  providers: [
    RateCacheService,
    RateResolverService,
    {
      provide: APP_FILTER,
      useClass: RatesExceptionFilter,
    },
  ],
  exports: [RateResolverService, RateCacheService],
})
export class RatesModule {}
