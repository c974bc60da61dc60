export { MetricsInterceptor } from './metrics.interceptor';
