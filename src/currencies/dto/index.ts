export { CurrencyDto, ListCurrenciesQueryDto } from './currency.dto';
