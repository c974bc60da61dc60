export { ExchangeRateHostAdapter } from './exchangerate-host.adapter';
