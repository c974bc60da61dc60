import { Injectable } from '@nestjs/common';

import { UseProxyConfig } from './proxy.types';
import { AppConfigService } from '../../config';

@Injectable()
export class ProxyConfigService {
  constructor(private readonly configService: AppConfigService) {}

  /**
   * Proxy url for a source's outbound requests, or `undefined` to connect
   * directly. Throws when the source asks for the global proxy and none is set.
   */
  resolveProxyUrl(
    sourceName: string,
    useProxy: UseProxyConfig,
  ): string | undefined {
    if (typeof useProxy === 'string') {
      return useProxy;
    }
    if (!useProxy) {
      return undefined;
    }

    const globalProxy = this.configService.get('proxy');
    if (!globalProxy) {
      throw new Error(
        `Source ${sourceName} has useProxy enabled but no global proxy url is configured`,
      );
    }
    return globalProxy;
  }
}
