import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import { LoggerModule } from 'nestjs-pino';

import { AppController } from './app.controller';
import { AppService } from './app.service';
import { MetricsInterceptor } from './common/interceptors';
import { createLoggerOptions } from './common/logger';
import { AppConfigModule, AppConfigService } from './config';
import { ConversionsModule } from './conversions';
import { CurrenciesModule } from './currencies';
import { MetricsModule } from './metrics/metrics.module';
import { RatesModule } from './rates';
import { SourcesModule } from './sources';

@Module({
  imports: [
    AppConfigModule,
    LoggerModule.forRootAsync({
      inject: [AppConfigService],
      useFactory: createLoggerOptions,
    }),
    SourcesModule,
    CurrenciesModule,
    RatesModule,
    ConversionsModule,
    MetricsModule,
  ],
  controllers: [AppController],
  providers: [
    AppService,
    {
      provide: APP_INTERCEPTOR,
      useClass: MetricsInterceptor,
    },
  ],
})
export class AppModule {}
