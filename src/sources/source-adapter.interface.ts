import { SourceConfig as SourceAdapterConfig } from '../config/schema/sources.schema';
import { SourceName } from './source-name.enum';

export type { SourceAdapterConfig };

/** Ordered `[origin, destination]`; `[USD, EUR]` and `[EUR, USD]` are different pairs */
export type Pair = [string, string];

/** Destination currency code to a positive decimal rate relative to one base */
export type RateTable = Record<string, string>;

/** Currency code to display name, as advertised by a source */
export type CurrencyListing = Record<string, string>;

export interface SourceDescriptor {
  readonly name: SourceName;
  readonly priority: number;
  readonly enabled: boolean;
  readonly timeoutMs: number;
}

export interface SourceAdapter {
  readonly name: SourceName;
  getConfig(): SourceAdapterConfig;
  /** False while a credential the source cannot work without is missing */
  isConfigured(): boolean;
  /** Bulk fetch of every rate the source prices against `base` */
  fetchRates(base: string): Promise<RateTable>;
  listCurrencies(): Promise<CurrencyListing>;
}
