import { CurrenciesService } from './currencies.service';
import { InvalidPairException } from '../rates/exceptions';

describe('CurrenciesService', () => {
  const service = new CurrenciesService();

  describe('assertPair', () => {
    it('normalizes case and whitespace', () => {
      expect(service.assertPair([' usd', 'brl '])).toEqual(['USD', 'BRL']);
    });

    it('rejects unknown codes', () => {
      expect(() => service.assertPair(['XXX', 'BRL'])).toThrow(
        new InvalidPairException('XXX', 'BRL', 'unknown currency code XXX'),
      );
    });

    it('rejects malformed codes', () => {
      expect(() => service.assertPair(['US', 'BRL'])).toThrow(
        'Invalid currency pair US/BRL: US is not a three letter currency code',
      );
      expect(() => service.assertPair(['USD', ''])).toThrow(
        'Invalid currency pair USD/: (empty) is not a three letter currency code',
      );
    });

    it('rejects a pair with the same currency on both sides', () => {
      expect(() => service.assertPair(['eur', 'EUR'])).toThrow(
        InvalidPairException,
      );
    });
  });

  it('knows catalogue codes regardless of case', () => {
    expect(service.isKnown('jpy')).toBe(true);
    expect(service.isKnown('XXX')).toBe(false);
    expect(service.get('gbp')).toEqual({
      code: 'GBP',
      name: 'British Pound',
      symbol: '£',
      popular: true,
    });
  });

  it('lists popular currencies in their configured order', () => {
    expect(service.list({ popular: true }).map(({ code }) => code)).toEqual([
      'USD',
      'EUR',
      'BRL',
      'GBP',
      'JPY',
      'CHF',
      'CAD',
      'AUD',
      'CNY',
      'ARS',
    ]);
  });

  it('searches by code or name', () => {
    expect(service.list({ search: 'real' }).map(({ code }) => code)).toEqual([
      'BRL',
    ]);
    expect(service.list({ search: 'chf' }).map(({ code }) => code)).toEqual([
      'CHF',
    ]);
    expect(
      service
        .list({ popular: true, search: 'dollar' })
        .map(({ code }) => code),
    ).toEqual(['USD', 'CAD', 'AUD']);
  });
});
