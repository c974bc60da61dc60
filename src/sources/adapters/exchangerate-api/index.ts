export { ExchangeRateApiAdapter } from './exchangerate-api.adapter';
