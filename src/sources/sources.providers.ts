import { Provider, Type } from '@nestjs/common';

import { ExchangeRateApiAdapter } from './adapters/exchangerate-api';
import { ExchangeRateHostAdapter } from './adapters/exchangerate-host';
import { FrankfurterAdapter } from './adapters/frankfurter';
import { SourceAdapter } from './source-adapter.interface';
import { SourceName } from './source-name.enum';

export const SOURCE_ADAPTERS = Symbol('SOURCE_ADAPTERS');

export const SOURCES_MAP: Record<SourceName, Type<SourceAdapter>> = {
  [SourceName.FRANKFURTER]: FrankfurterAdapter,
  [SourceName.EXCHANGERATE_API]: ExchangeRateApiAdapter,
  [SourceName.EXCHANGERATE_HOST]: ExchangeRateHostAdapter,
};

export const SOURCES_PROVIDERS: Provider[] = [
  ...Object.values(SOURCES_MAP),
  {
    provide: SOURCE_ADAPTERS,
    useFactory: (...adapters: SourceAdapter[]): SourceAdapter[] => adapters,
    inject: Object.values(SOURCES_MAP),
  },
];
