import { Injectable } from '@nestjs/common';

import { HttpClient, HttpClientBuilder } from '../../../common';
import { AppConfigService } from '../../../config';
import { HandleSourceError } from '../../decorators';
import {
  MalformedResponseException,
  SourceApiException,
  SourceException,
  SourceUnauthorizedException,
  UnsupportedCurrencyException,
} from '../../exceptions';
import {
  CurrencyListing,
  RateTable,
  SourceAdapter,
  SourceAdapterConfig,
} from '../../source-adapter.interface';
import { SourceName } from '../../source-name.enum';
import { toRateTable } from '../rate-table.util';

const LIVE_PATH = '/live';
const LIST_PATH = '/list';

interface ExchangeRateHostLiveResponse {
  success: true;
  timestamp: number;
  source: string;
  quotes: Record<string, number>;
}

interface ExchangeRateHostListResponse {
  success: true;
  currencies: Record<string, string>;
}

interface ExchangeRateHostErrorResponse {
  success: false;
  error: {
    code: number;
    type: string;
    info: string;
  };
}

@Injectable()
export class ExchangeRateHostAdapter implements SourceAdapter {
  readonly name = SourceName.EXCHANGERATE_HOST;
  private readonly sourceConfig: SourceAdapterConfig;
  private readonly httpClient: HttpClient;

  constructor(
    httpClientBuilder: HttpClientBuilder,
    configService: AppConfigService,
  ) {
    this.sourceConfig = configService.get('sources.exchangeratehost');
    const { apiKey } = this.sourceConfig;

    this.httpClient = httpClientBuilder.build({
      sourceName: this.name,
      ...this.sourceConfig,
      defaultParams: apiKey ? { access_key: apiKey } : {},
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
    const { data } = await this.httpClient.get<
      ExchangeRateHostLiveResponse | ExchangeRateHostErrorResponse
    >(LIVE_PATH, { params: { source: base } });

    if (data?.success === false) {
      throw this.mapError(data.error, base);
    }

    return toRateTable(this.name, this.stripBasePrefix(base, data?.quotes));
  }

  @HandleSourceError()
  async listCurrencies(): Promise<CurrencyListing> {
    const { data } = await this.httpClient.get<
      ExchangeRateHostListResponse | ExchangeRateHostErrorResponse
    >(LIST_PATH);

    if (data?.success === false) {
      throw this.mapError(data.error);
    }
    if (!data?.currencies || typeof data.currencies !== 'object') {
      throw new MalformedResponseException(this.name, 'currencies missing');
    }

    return data.currencies;
  }

  /** Quotes are keyed `USDEUR`; the rate table is keyed by destination only */
  private stripBasePrefix(
    base: string,
    quotes: Record<string, number> | undefined,
  ): Record<string, number> | undefined {
    if (!quotes || typeof quotes !== 'object') {
      return undefined;
    }

    const rates: Record<string, number> = {};
    for (const [key, value] of Object.entries(quotes)) {
      if (key.startsWith(base)) {
        rates[key.slice(base.length)] = value;
      }
    }
    return rates;
  }

  private mapError(
    error: ExchangeRateHostErrorResponse['error'],
    base?: string,
  ): SourceException {
    const status = this.mapErrorCodeToHttpStatus(error.code);
    if (status === 401 || status === 403) {
      return new SourceUnauthorizedException(this.name);
    }
    if (status === 404) {
      return new UnsupportedCurrencyException(this.name, base);
    }
    return new SourceApiException(this.name, new Error(error.info), status);
  }

  private mapErrorCodeToHttpStatus(errorCode: number): number {
    switch (errorCode) {
      case 101:
      case 102:
        return 401;
      case 103:
      case 106:
      case 201:
      case 202:
      case 404:
        return 404;
      case 104:
        return 429;
      case 105:
        return 403;
      case 301:
      case 302:
      case 401:
      case 402:
      case 403:
      case 501:
      case 502:
      case 503:
      case 504:
      case 505:
        return 400;
      default:
        return 500;
    }
  }
}
