export { RatesExceptionFilter } from './rates-exception.filter';
