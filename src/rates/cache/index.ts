export { RateCacheService } from './rate-cache.service';
export type { RateCacheEntry, RateCacheStats } from './rate-cache.interface';
