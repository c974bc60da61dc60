import { Pair } from '../sources/source-adapter.interface';
import { SourceName } from '../sources/source-name.enum';

export interface RateQuote {
  readonly pair: Readonly<Pair>;
  /** Decimal string as priced by the source, always greater than zero */
  readonly rate: string;
  readonly fetchedAt: Date;
  readonly source: SourceName;
}

export function isPositiveRate(rate: string | undefined): rate is string {
  if (rate === undefined || rate.trim() === '') {
    return false;
  }
  const value = Number(rate);
  return Number.isFinite(value) && value > 0;
}

export function createRateQuote(
  pair: Readonly<Pair>,
  rate: string,
  source: SourceName,
  fetchedAt: Date,
): RateQuote {
  const pairCopy: Pair = [pair[0], pair[1]];
  const fetchedAtMs = fetchedAt.getTime();

  return Object.freeze({
    pair: Object.freeze(pairCopy),
    rate,
    source,
    // Date is mutable; every read gets its own copy
    get fetchedAt(): Date {
      return new Date(fetchedAtMs);
    },
  });
}
