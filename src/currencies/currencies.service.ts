import { Injectable } from '@nestjs/common';

import { Currency, ListCurrenciesOptions } from './currency.interface';
import catalogue from './data/currencies.json';
import { InvalidPairException } from '../rates/exceptions';
import { Pair } from '../sources/source-adapter.interface';

const CURRENCY_CODE = /^[A-Z]{3}$/;

@Injectable()
export class CurrenciesService {
  private readonly currencies: ReadonlyMap<string, Currency>;
  private readonly popularCodes: readonly string[];

  constructor() {
    const popular = new Set(catalogue.popular);
    this.popularCodes = catalogue.popular;
    this.currencies = new Map(
      catalogue.currencies.map((entry): [string, Currency] => [
        entry.code,
        Object.freeze({ ...entry, popular: popular.has(entry.code) }),
      ]),
    );
  }

  normalize(code: string): string {
    return code.trim().toUpperCase();
  }

  isKnown(code: string): boolean {
    return this.currencies.has(this.normalize(code));
  }

  get(code: string): Currency | undefined {
    return this.currencies.get(this.normalize(code));
  }

  /**
   * Normalizes both codes and checks them against the catalogue.
   * Throws InvalidPairException for malformed or unknown codes and for
   * a pair whose origin equals its destination.
   */
  assertPair(pair: Pair): Pair {
    const [origin, destination] = pair.map((code) => this.normalize(code));

    for (const code of [origin, destination]) {
      if (!CURRENCY_CODE.test(code)) {
        throw new InvalidPairException(
          origin,
          destination,
          `${code || '(empty)'} is not a three letter currency code`,
        );
      }
      if (!this.currencies.has(code)) {
        throw new InvalidPairException(
          origin,
          destination,
          `unknown currency code ${code}`,
        );
      }
    }

    if (origin === destination) {
      throw new InvalidPairException(
        origin,
        destination,
        'origin and destination must differ',
      );
    }

    return [origin, destination];
  }

  list(options: ListCurrenciesOptions = {}): Currency[] {
    const term = options.search?.trim().toLowerCase();
    const candidates = options.popular
      ? this.popularCodes.flatMap((code) => this.currencies.get(code) ?? [])
      : [...this.currencies.values()];

    return candidates.filter((currency) => {
      if (!term) {
        return true;
      }
      return (
        currency.code.toLowerCase().includes(term) ||
        currency.name.toLowerCase().includes(term)
      );
    });
  }
}
