import { ExchangeRateApiAdapter } from './exchangerate-api.adapter';
import { createTestConfig } from '../../../../test/helpers/config';
import {
  FakeHttpBackend,
  createHttpClientBuilder,
} from '../../../../test/helpers/http';
import {
  SourceApiException,
  SourceUnauthorizedException,
  UnsupportedCurrencyException,
  getFailureReason,
} from '../../exceptions';

describe('ExchangeRateApiAdapter', () => {
  let backend: FakeHttpBackend;
  let adapter: ExchangeRateApiAdapter;

  beforeEach(() => {
    const config = createTestConfig({
      sources: {
        exchangerateapi: {
          enabled: true,
          apiKey: 'test-secret',
          baseUrl: 'https://erapi.test',
          rps: null,
        },
      },
    });
    backend = new FakeHttpBackend();
    adapter = new ExchangeRateApiAdapter(
      createHttpClientBuilder(config, backend),
      config,
    );
  });

  it('requests the latest rates with the key in the path', async () => {
    backend.reply(() => ({
      data: {
        result: 'success',
        base_code: 'USD',
        time_last_update_unix: 1772445600,
        conversion_rates: { USD: 1, BRL: 5.07, EUR: 0.92 },
      },
    }));

    await expect(adapter.fetchRates('USD')).resolves.toEqual({
      USD: '1',
      BRL: '5.07',
      EUR: '0.92',
    });
    expect(backend.requests.map(String)).toEqual([
      'https://erapi.test/v6/test-secret/latest/USD',
    ]);
  });

  it.each([
    ['invalid-key', SourceUnauthorizedException],
    ['inactive-account', SourceUnauthorizedException],
    ['unsupported-code', UnsupportedCurrencyException],
    ['malformed-request', SourceApiException],
  ])('maps error type %s', async (errorType, expected) => {
    backend.reply(() => ({
      data: { result: 'error', 'error-type': errorType },
    }));

    await expect(adapter.fetchRates('USD')).rejects.toBeInstanceOf(expected);
  });

  it('is configured only when an api key is set', () => {
    const keyless = createTestConfig();
    const keylessAdapter = new ExchangeRateApiAdapter(
      createHttpClientBuilder(keyless, backend),
      keyless,
    );

    expect(adapter.isConfigured()).toBe(true);
    expect(keylessAdapter.isConfigured()).toBe(false);
  });

  it('reports an exhausted quota as rate limiting', async () => {
    backend.reply(() => ({
      data: { result: 'error', 'error-type': 'quota-reached' },
    }));

    const error: unknown = await adapter
      .fetchRates('USD')
      .catch((reason: unknown) => reason);

    expect(getFailureReason(error)).toBe('rate_limited');
  });

  it('builds the currency listing from supported code pairs', async () => {
    backend.reply(() => ({
      data: {
        result: 'success',
        supported_codes: [
          ['BRL', 'Brazilian Real'],
          ['EUR', 'Euro'],
        ],
      },
    }));

    await expect(adapter.listCurrencies()).resolves.toEqual({
      BRL: 'Brazilian Real',
      EUR: 'Euro',
    });
    expect(backend.requests.map(({ pathname }) => pathname)).toEqual([
      '/v6/test-secret/codes',
    ]);
  });
});
