import { Decimal } from 'decimal.js';

import { MalformedResponseException } from '../exceptions';
import { RateTable } from '../source-adapter.interface';

const CURRENCY_CODE = /^[A-Z]{3}$/;
const PLAIN_DECIMAL = /^\d+(\.\d+)?$/;

/**
 * Keeps the entries of a raw `{ code: rate }` payload that are a three letter
 * code and a positive rate. A payload with no usable entry is malformed.
 */
export function toRateTable(sourceName: string, rawRates: unknown): RateTable {
  if (!rawRates || typeof rawRates !== 'object' || Array.isArray(rawRates)) {
    throw new MalformedResponseException(sourceName, 'rates object missing');
  }

  const table: RateTable = {};
  for (const [code, value] of Object.entries(rawRates)) {
    const normalizedCode = code.toUpperCase();
    const rate = toRateString(value);

    if (CURRENCY_CODE.test(normalizedCode) && rate !== undefined) {
      table[normalizedCode] = rate;
    }
  }

  if (Object.keys(table).length === 0) {
    throw new MalformedResponseException(sourceName, 'no usable rates');
  }

  return table;
}

/** Decimal strings pass through untouched; JSON numbers are written without exponent */
function toRateString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return PLAIN_DECIMAL.test(trimmed) && new Decimal(trimmed).gt(0)
      ? trimmed
      : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    return new Decimal(value).toFixed();
  }
  return undefined;
}
