export { RatesModule } from './rates.module';
export { RateResolverService } from './rate-resolver.service';
export type { ResolveFailure, ResolveManyResult } from './rate-resolver.service';
export { RateCacheService } from './cache';
export type { RateCacheEntry, RateCacheStats } from './cache';
export { createRateQuote, isPositiveRate } from './rate-quote';
export type { RateQuote } from './rate-quote';
export * from './exceptions';
