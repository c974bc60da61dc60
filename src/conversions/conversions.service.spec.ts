import { ConversionsService } from './conversions.service';
import { InvalidAmountException } from './exceptions';
import { InMemoryConversionHistoryRepository } from './history';
import { createRatesHarness } from '../../test/helpers/rates';
import { FakeSourceAdapter } from '../../test/helpers/sources';
import { InvalidPairException } from '../rates/exceptions';
import { RateResolverService } from '../rates/rate-resolver.service';
import { RateTable } from '../sources/source-adapter.interface';
import { SourceName } from '../sources/source-name.enum';

function createService(table: RateTable): {
  service: ConversionsService;
  history: InMemoryConversionHistoryRepository;
  source: FakeSourceAdapter;
  resolver: RateResolverService;
} {
  const source = FakeSourceAdapter.returning(SourceName.FRANKFURTER, table);
  const { config, currencies, metrics, resolver } = createRatesHarness([source]);
  const history = new InMemoryConversionHistoryRepository(config);
  const service = new ConversionsService(resolver, currencies, metrics, history);
  return { service, history, source, resolver };
}

describe('ConversionsService', () => {
  describe('convert', () => {
    it('multiplies the amount by the rate and rounds to cents', async () => {
      const { service } = createService({ BRL: '5.07' });

      const conversion = await service.convert(100, 'usd', 'brl');

      expect(conversion).toMatchObject({
        amount: '100',
        origin: 'USD',
        destination: 'BRL',
        result: '507.00',
        rate: '5.07',
        inverseRate: '0.19723866',
        source: SourceName.FRANKFURTER,
      });
    });

    it('does not let the conversion change the fetch time of the cached quote', async () => {
      const { service, resolver } = createService({ EUR: '0.92' });

      const conversion = await service.convert(10, 'USD', 'EUR');
      const fetchedAt = conversion.rateFetchedAt.toISOString();
      conversion.rateFetchedAt.setFullYear(2001);

      const cached = await resolver.resolve(['USD', 'EUR']);
      expect(cached.fetchedAt.toISOString()).toBe(fetchedAt);
    });

    it('rounds half up', async () => {
      const { service } = createService({ EUR: '1.005' });

      const conversion = await service.convert('1', 'USD', 'EUR');

      expect(conversion.result).toBe('1.01');
    });

    it('keeps decimal precision for fractional amounts', async () => {
      const { service } = createService({ EUR: '0.1' });

      const conversion = await service.convert('0.3', 'USD', 'EUR');

      expect(conversion.result).toBe('0.03');
      expect(conversion.inverseRate).toBe('10');
    });

    it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY, 'ten'])(
      'rejects the amount %p',
      async (amount) => {
        const { service, source } = createService({ EUR: '0.92' });

        await expect(service.convert(amount, 'USD', 'EUR')).rejects.toBeInstanceOf(
          InvalidAmountException,
        );
        expect(source.fetchCalls).toEqual([]);
      },
    );

    it('propagates an invalid pair', async () => {
      const { service } = createService({ EUR: '0.92' });

      await expect(service.convert(10, 'USD', 'XXX')).rejects.toBeInstanceOf(
        InvalidPairException,
      );
    });

    it('stores the conversion in history unless asked not to', async () => {
      const { service, history } = createService({ EUR: '0.92' });

      const saved = await service.convert(10, 'USD', 'EUR');
      const unsaved = await service.convert(20, 'USD', 'EUR', { save: false });

      expect(saved.id).toEqual(expect.any(String));
      expect(unsaved.id).toBeUndefined();
      const { items, total } = await history.list();
      expect(total).toBe(1);
      expect(items[0]).toMatchObject({ id: saved.id, amount: '10', result: '9.20' });
    });
  });

  describe('convertMany', () => {
    it('converts into every distinct destination except the origin', async () => {
      const { service, source } = createService({
        BRL: '5.07',
        EUR: '0.92',
        JPY: '149.5',
      });

      const batch = await service.convertMany(10, 'USD', [
        'EUR',
        'usd',
        'BRL',
        'eur',
        'XXX',
      ]);

      expect(batch.origin).toBe('USD');
      expect(
        batch.conversions.map(({ destination, result }) => [destination, result]),
      ).toEqual([
        ['EUR', '9.20'],
        ['BRL', '50.70'],
      ]);
      expect(batch.failures).toEqual([
        {
          destination: 'XXX',
          message: 'Invalid currency pair USD/XXX: unknown currency code XXX',
        },
      ]);
      expect(source.fetchCalls).toEqual(['USD']);
    });

    it('records the successful conversions under the batch id', async () => {
      const { service } = createService({ BRL: '5.07', EUR: '0.92' });

      const batch = await service.convertMany(1, 'USD', ['EUR', 'BRL']);
      const { items } = await service.getHistory();

      expect(items.map(({ batchId }) => batchId)).toEqual([batch.id, batch.id]);
      expect(items.map(({ destination }) => destination)).toEqual(['BRL', 'EUR']);
    });

    it('rejects an invalid amount before resolving anything', async () => {
      const { service, source } = createService({ EUR: '0.92' });

      await expect(service.convertMany(-1, 'USD', ['EUR'])).rejects.toBeInstanceOf(
        InvalidAmountException,
      );
      expect(source.fetchCalls).toEqual([]);
    });
  });

  it('clears the history', async () => {
    const { service } = createService({ EUR: '0.92' });
    await service.convert(1, 'USD', 'EUR');
    await service.convert(2, 'USD', 'EUR');

    await expect(service.clearHistory()).resolves.toBe(2);
    await expect(service.getHistory()).resolves.toEqual({ items: [], total: 0 });
  });
});
