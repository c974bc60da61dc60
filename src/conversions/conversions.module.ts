import { Module } from '@nestjs/common';

import { ConversionsController } from './conversions.controller';
import { ConversionsService } from './conversions.service';
import {
  CONVERSION_HISTORY_REPOSITORY,
  InMemoryConversionHistoryRepository,
} from './history';
import { CurrenciesModule } from '../currencies/currencies.module';
import { MetricsModule } from '../metrics/metrics.module';
import { RatesModule } from '../rates/rates.module';

@Module({
  imports: [RatesModule, CurrenciesModule, MetricsModule],
  controllers: [ConversionsController],
  providers: [
    ConversionsService,
    {
      provide: CONVERSION_HISTORY_REPOSITORY,
      useClass: InMemoryConversionHistoryRepository,
    },
  ],
  exports: [ConversionsService],
})
export class ConversionsModule {}
