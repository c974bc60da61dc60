export { CurrenciesModule } from './currencies.module';
export { CurrenciesService } from './currencies.service';
export type { Currency, ListCurrenciesOptions } from './currency.interface';
