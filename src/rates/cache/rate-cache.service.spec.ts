import { RateCacheService } from './rate-cache.service';
import { createTestConfig } from '../../../test/helpers/config';
import { MetricsService } from '../../metrics/metrics.service';
import { SourceName } from '../../sources/source-name.enum';
import { RateQuote, createRateQuote } from '../rate-quote';

const NOW = new Date('2026-03-02T10:00:00.000Z');

function createCache(cache: Record<string, unknown> = {}): RateCacheService {
  const config = createTestConfig({ cache });
  return new RateCacheService(config, new MetricsService(config));
}

function quote(
  origin: string,
  destination: string,
  rate: string,
  source = SourceName.FRANKFURTER,
): RateQuote {
  return createRateQuote([origin, destination], rate, source, new Date());
}

describe('RateCacheService', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(NOW);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('returns undefined for an absent pair', () => {
    const cache = createCache();

    expect(cache.get(['USD', 'EUR'])).toBeUndefined();
  });

  it('serves a stored quote until the ttl has elapsed', () => {
    const cache = createCache({ ttlSeconds: 60 });
    const stored = quote('USD', 'EUR', '0.92');

    cache.put(stored);

    jest.setSystemTime(NOW.getTime() + 60_000);
    expect(cache.get(['USD', 'EUR'])).toBe(stored);

    jest.setSystemTime(NOW.getTime() + 60_001);
    expect(cache.get(['USD', 'EUR'])).toBeUndefined();
  });

  it('honours an explicit ttl over the configured one', () => {
    const cache = createCache({ ttlSeconds: 3600 });

    cache.put(quote('USD', 'EUR', '0.92'), 5);
    jest.setSystemTime(NOW.getTime() + 5_001);

    expect(cache.get(['USD', 'EUR'])).toBeUndefined();
  });

  it('keys by ordered pair', () => {
    const cache = createCache();

    cache.put(quote('USD', 'EUR', '0.92'));

    expect(cache.get(['EUR', 'USD'])).toBeUndefined();
    expect(cache.get(['USD', 'EUR'])?.rate).toBe('0.92');
  });

  it('overwrites the entry for a pair on every write', () => {
    const cache = createCache();

    cache.put(quote('USD', 'EUR', '0.92'));
    cache.put(quote('USD', 'EUR', '0.93', SourceName.EXCHANGERATE_API));

    expect(cache.get(['USD', 'EUR'])).toMatchObject({
      rate: '0.93',
      source: SourceName.EXCHANGERATE_API,
    });
  });

  it('stores nothing when caching is disabled', () => {
    const cache = createCache({ enabled: false });

    cache.put(quote('USD', 'EUR', '0.92'));
    cache.putMany([quote('USD', 'BRL', '5.07')]);

    expect(cache.get(['USD', 'EUR'])).toBeUndefined();
    expect(cache.get(['USD', 'BRL'])).toBeUndefined();
  });

  it('stores nothing for a zero ttl', () => {
    const cache = createCache({ ttlSeconds: 0 });

    cache.put(quote('USD', 'EUR', '0.92'));

    expect(cache.get(['USD', 'EUR'])).toBeUndefined();
    expect(cache.getStats().size).toBe(0);
  });

  it('stores several quotes at once', () => {
    const cache = createCache();

    cache.putMany([quote('USD', 'BRL', '5.07'), quote('USD', 'EUR', '0.92')]);

    expect(cache.get(['USD', 'BRL'])?.rate).toBe('5.07');
    expect(cache.get(['USD', 'EUR'])?.rate).toBe('0.92');
  });

  it('invalidates a single pair', () => {
    const cache = createCache();
    cache.putMany([quote('USD', 'BRL', '5.07'), quote('USD', 'EUR', '0.92')]);

    expect(cache.invalidate(['USD', 'BRL'])).toBe(true);
    expect(cache.invalidate(['USD', 'BRL'])).toBe(false);

    expect(cache.get(['USD', 'BRL'])).toBeUndefined();
    expect(cache.get(['USD', 'EUR'])).toBeDefined();
  });

  it('exposes the expiry of a single entry', () => {
    const cache = createCache({ ttlSeconds: 30 });
    const stored = quote('USD', 'EUR', '0.92');
    cache.put(stored);

    expect(cache.getEntry(['USD', 'EUR'])).toEqual({
      key: 'rate:USD/EUR',
      quote: stored,
      expiresAt: new Date(NOW.getTime() + 30_000),
    });
    expect(cache.getEntry(['USD', 'BRL'])).toBeUndefined();
  });

  it('clears every entry', () => {
    const cache = createCache();
    cache.putMany([quote('USD', 'BRL', '5.07'), quote('USD', 'EUR', '0.92')]);

    cache.clear();

    expect(cache.entries()).toEqual([]);
  });

  it('reports live entries with their expiry and hit counters', () => {
    const cache = createCache({ ttlSeconds: 120 });
    const stored = quote('USD', 'EUR', '0.92');
    cache.put(stored);
    cache.put(quote('USD', 'BRL', '5.07'), 10);

    jest.setSystemTime(NOW.getTime() + 11_000);
    cache.get(['USD', 'EUR']);
    cache.get(['USD', 'JPY']);

    expect(cache.entries()).toEqual([
      {
        key: 'rate:USD/EUR',
        quote: stored,
        expiresAt: new Date(NOW.getTime() + 120_000),
      },
    ]);
    expect(cache.getStats()).toEqual({
      enabled: true,
      ttlSeconds: 120,
      size: 1,
      hits: 1,
      misses: 1,
    });
  });
});
