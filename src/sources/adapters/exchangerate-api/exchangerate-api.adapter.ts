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

interface ExchangeRateApiLatestResponse {
  result: 'success';
  base_code: string;
  time_last_update_unix: number;
  conversion_rates: Record<string, number>;
}

interface ExchangeRateApiCodesResponse {
  result: 'success';
  supported_codes: [string, string][];
}

interface ExchangeRateApiErrorResponse {
  result: 'error';
  'error-type': string;
}

@Injectable()
export class ExchangeRateApiAdapter implements SourceAdapter {
  readonly name = SourceName.EXCHANGERATE_API;
  private readonly sourceConfig: SourceAdapterConfig;
  private readonly httpClient: HttpClient;
  private readonly keyPath: string;

  constructor(
    httpClientBuilder: HttpClientBuilder,
    configService: AppConfigService,
  ) {
    this.sourceConfig = configService.get('sources.exchangerateapi');
    const apiKey = this.sourceConfig.apiKey ?? '';
    this.keyPath = `/v6/${encodeURIComponent(apiKey)}`;

    this.httpClient = httpClientBuilder.build({
      sourceName: this.name,
      ...this.sourceConfig,
      secrets: apiKey ? [apiKey] : [],
    });
  }

  getConfig(): SourceAdapterConfig {
    return this.sourceConfig;
  }

  /** The key is part of every request path */
  isConfigured(): boolean {
    return Boolean(this.sourceConfig.apiKey);
  }

  @HandleSourceError()
  async fetchRates(base: string): Promise<RateTable> {
    const { data } = await this.httpClient.get<
      ExchangeRateApiLatestResponse | ExchangeRateApiErrorResponse
    >(`${this.keyPath}/latest/${encodeURIComponent(base)}`);

    if (data?.result === 'error') {
      throw this.mapErrorType(data['error-type'], base);
    }

    return toRateTable(this.name, data?.conversion_rates);
  }

  @HandleSourceError()
  async listCurrencies(): Promise<CurrencyListing> {
    const { data } = await this.httpClient.get<
      ExchangeRateApiCodesResponse | ExchangeRateApiErrorResponse
    >(`${this.keyPath}/codes`);

    if (data?.result === 'error') {
      throw this.mapErrorType(data['error-type']);
    }
    if (!Array.isArray(data?.supported_codes)) {
      throw new MalformedResponseException(this.name, 'supported_codes missing');
    }

    return Object.fromEntries(data.supported_codes);
  }

  private mapErrorType(errorType: string, base?: string): SourceException {
    switch (errorType) {
      case 'invalid-key':
      case 'inactive-account':
        return new SourceUnauthorizedException(this.name);
      case 'unsupported-code':
        return new UnsupportedCurrencyException(this.name, base);
      case 'quota-reached':
        return new SourceApiException(
          this.name,
          new Error('request quota reached'),
          429,
        );
      default:
        return new SourceApiException(this.name, new Error(errorType), 400);
    }
  }
}
