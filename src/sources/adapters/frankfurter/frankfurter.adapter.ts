import { Injectable } from '@nestjs/common';

import { HttpClient, HttpClientBuilder } from '../../../common';
import { AppConfigService } from '../../../config';
import { HandleSourceError } from '../../decorators';
import { MalformedResponseException } from '../../exceptions';
import {
  CurrencyListing,
  RateTable,
  SourceAdapter,
  SourceAdapterConfig,
} from '../../source-adapter.interface';
import { SourceName } from '../../source-name.enum';
import { toRateTable } from '../rate-table.util';

const LATEST_PATH = '/latest';
const CURRENCIES_PATH = '/currencies';

interface FrankfurterResponse {
  amount: number;
  base: string;
  date: string;
  rates: Record<string, number>;
}

@Injectable()
export class FrankfurterAdapter implements SourceAdapter {
  readonly name = SourceName.FRANKFURTER;
  private readonly sourceConfig: SourceAdapterConfig;
  private readonly httpClient: HttpClient;

  constructor(
    httpClientBuilder: HttpClientBuilder,
    configService: AppConfigService,
  ) {
    this.sourceConfig = configService.get('sources.frankfurter');

    this.httpClient = httpClientBuilder.build({
      sourceName: this.name,
      ...this.sourceConfig,
    });
  }

  getConfig(): SourceAdapterConfig {
    return this.sourceConfig;
  }

  isConfigured(): boolean {
    return true;
  }

  @HandleSourceError()
  async fetchRates(base: string): Promise<RateTable> {
    const { data } = await this.httpClient.get<FrankfurterResponse>(
      LATEST_PATH,
      { params: { from: base } },
    );

    return toRateTable(this.name, data?.rates);
  }

  @HandleSourceError()
  async listCurrencies(): Promise<CurrencyListing> {
    const { data } = await this.httpClient.get<Record<string, string>>(
      CURRENCIES_PATH,
    );

    if (!data || typeof data !== 'object') {
      throw new MalformedResponseException(this.name, 'currency list missing');
    }

    return data;
  }
}
