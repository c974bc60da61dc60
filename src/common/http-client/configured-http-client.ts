import { HttpService } from '@nestjs/axios';
import { Logger } from '@nestjs/common';
import { AxiosRequestConfig, AxiosResponse } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

import { HttpClient } from './interfaces/http-client.interface';
import { RpsLimiterService } from './rps-limiter.service';
import { ClientOptions } from './types/client-params';
import { sanitizeUrlForLogging } from './url-sanitizer';

/**
 * HTTP client bound to one rate source: its base url, default query
 * parameters, timeout, proxy and request limits.
 */
export class ConfiguredHttpClient implements HttpClient {
  private readonly logger: Logger;
  private readonly httpsAgent?: HttpsProxyAgent<string>;

  constructor(
    private readonly options: ClientOptions,
    private readonly httpService: HttpService,
    private readonly rpsLimiter: RpsLimiterService,
  ) {
    this.logger = new Logger(`HttpClient:${options.sourceName}`);
    if (options.proxyUrl) {
      this.httpsAgent = new HttpsProxyAgent(options.proxyUrl);
    }
  }

  get<T>(path: string, config: AxiosRequestConfig = {}): Promise<AxiosResponse<T>> {
    const request: AxiosRequestConfig = {
      ...config,
      method: 'GET',
      url: this.options.baseUrl
        ? new URL(path, this.options.baseUrl).toString()
        : path,
      params: { ...this.options.defaultParams, ...config.params },
      headers: { Accept: 'application/json' },
      timeout: this.options.timeoutMs,
      ...(this.httpsAgent ? { httpsAgent: this.httpsAgent } : {}),
    };

    return this.rpsLimiter.schedule(
      this.options.sourceName,
      { rps: this.options.rps, maxConcurrent: this.options.maxConcurrent },
      async () => {
        const logUrl = sanitizeUrlForLogging(
          this.httpService.axiosRef.getUri(request),
          this.options.secrets,
        );
        const startedAt = Date.now();
        const response = await this.httpService.axiosRef.request<T>(request);
        this.logger.debug(
          `GET ${logUrl} -> ${response.status} in ${Date.now() - startedAt}ms`,
        );
        return response;
      },
    );
  }
}
