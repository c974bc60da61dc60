import { FrankfurterAdapter } from './frankfurter.adapter';
import { createTestConfig } from '../../../../test/helpers/config';
import {
  FakeHttpBackend,
  createHttpClientBuilder,
} from '../../../../test/helpers/http';
import {
  MalformedResponseException,
  SourceApiException,
  SourceTimeoutException,
  UnsupportedCurrencyException,
} from '../../exceptions';

describe('FrankfurterAdapter', () => {
  let backend: FakeHttpBackend;
  let adapter: FrankfurterAdapter;

  beforeEach(() => {
    const config = createTestConfig({
      sources: {
        frankfurter: {
          baseUrl: 'https://frankfurter.test',
          rps: null,
          timeoutMs: 2500,
        },
      },
    });
    backend = new FakeHttpBackend();
    adapter = new FrankfurterAdapter(
      createHttpClientBuilder(config, backend),
      config,
    );
  });

  it('requests the latest rates for a base and returns them as decimal strings', async () => {
    backend.reply(() => ({
      data: {
        amount: 1,
        base: 'USD',
        date: '2026-03-02',
        rates: { BRL: 5.07, EUR: 0.92 },
      },
    }));

    await expect(adapter.fetchRates('USD')).resolves.toEqual({
      BRL: '5.07',
      EUR: '0.92',
    });
    expect(backend.requests.map(String)).toEqual([
      'https://frankfurter.test/latest?from=USD',
    ]);
  });

  it('rejects a payload without rates as malformed', async () => {
    backend.reply(() => ({ data: { amount: 1, base: 'USD' } }));

    await expect(adapter.fetchRates('USD')).rejects.toBeInstanceOf(
      MalformedResponseException,
    );
  });

  it('maps a 404 to an unsupported currency', async () => {
    backend.reply(() => ({ status: 404, data: { message: 'not found' } }));

    await expect(adapter.fetchRates('ABC')).rejects.toThrow(
      new UnsupportedCurrencyException('frankfurter', 'ABC'),
    );
  });

  it('maps a server error to an api error carrying the status', async () => {
    backend.reply(() => ({ status: 502 }));

    const error: unknown = await adapter
      .fetchRates('USD')
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(SourceApiException);
    expect(error).toMatchObject({ statusCode: 502 });
  });

  it('maps an aborted request to a timeout with the configured limit', async () => {
    backend.reply(() => ({ errorCode: 'ECONNABORTED' }));

    await expect(adapter.fetchRates('USD')).rejects.toThrow(
      new SourceTimeoutException('frankfurter', 2500),
    );
  });

  it('lists currencies', async () => {
    backend.reply((url) =>
      url.pathname === '/currencies'
        ? { data: { EUR: 'Euro', USD: 'United States Dollar' } }
        : { status: 404 },
    );

    await expect(adapter.listCurrencies()).resolves.toEqual({
      EUR: 'Euro',
      USD: 'United States Dollar',
    });
  });

  it('exposes its configuration', () => {
    expect(adapter.getConfig()).toMatchObject({
      enabled: true,
      priority: 1,
      timeoutMs: 2500,
    });
  });
});
