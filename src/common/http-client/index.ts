export { HttpClientModule } from './http-client.module';
export { HttpClientBuilder } from './http-client.builder';
export { RpsLimiterService } from './rps-limiter.service';
export { sanitizeUrlForLogging } from './url-sanitizer';
export type { HttpClient, ClientParams, ClientOptions } from './types';
