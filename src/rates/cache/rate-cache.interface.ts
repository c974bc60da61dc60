import { RateQuote } from '../rate-quote';

export interface RateCacheEntry {
  key: string;
  quote: RateQuote;
  expiresAt: Date;
}

export interface RateCacheStats {
  enabled: boolean;
  ttlSeconds: number;
  size: number;
  hits: number;
  misses: number;
}
