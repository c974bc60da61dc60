export { ProxyModule } from './proxy.module';
export { ProxyConfigService } from './proxy-config.service';
export type { UseProxyConfig } from './proxy.types';
