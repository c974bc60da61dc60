import { Conversion } from '../conversion.interface';

export const CONVERSION_HISTORY_REPOSITORY = Symbol(
  'CONVERSION_HISTORY_REPOSITORY',
);

export interface StoredConversion extends Conversion {
  id: string;
  batchId?: string;
}

export interface HistoryFilter {
  origin?: string;
  destination?: string;
  limit?: number;
  offset?: number;
}

export interface HistoryPage {
  items: StoredConversion[];
  total: number;
}

/** Storage port for performed conversions, listed newest first */
export interface ConversionHistoryRepository {
  save(
    conversions: readonly Conversion[],
    batchId?: string,
  ): Promise<StoredConversion[]>;
  list(filter?: HistoryFilter): Promise<HistoryPage>;
  /** Resolves to the number of removed entries */
  clear(): Promise<number>;
}
