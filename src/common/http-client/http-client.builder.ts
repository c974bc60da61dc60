import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';

import { ProxyConfigService } from '../proxy';
import { ConfiguredHttpClient } from './configured-http-client';
import { RpsLimiterService } from './rps-limiter.service';
import { ClientParams, HttpClient } from './types';

/** Builds the per-source clients adapters talk to their APIs through. */
@Injectable()
export class HttpClientBuilder {
  private readonly logger = new Logger(HttpClientBuilder.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly rpsLimiter: RpsLimiterService,
    private readonly proxyConfigService: ProxyConfigService,
  ) {}

  build({ useProxy, ...options }: ClientParams): HttpClient {
    const proxyUrl = this.proxyConfigService.resolveProxyUrl(
      options.sourceName,
      useProxy,
    );
    if (proxyUrl) {
      this.logger.log(`Source ${options.sourceName} connects through a proxy`);
    }

    return new ConfiguredHttpClient(
      { ...options, proxyUrl },
      this.httpService,
      this.rpsLimiter,
    );
  }
}
