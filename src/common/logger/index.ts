export { createLoggerOptions } from './logger-options.factory';
