export { SourceException } from './source.exception';
export { SourceApiException } from './source-api.exception';
export { SourceTimeoutException } from './source-timeout.exception';
export { SourceUnauthorizedException } from './source-unauthorized.exception';
export { RateNotFoundException } from './rate-not-found.exception';
export { MalformedResponseException } from './malformed-response.exception';
export { UnsupportedCurrencyException } from './unsupported-currency.exception';
export { SourceNotFoundException } from './source-not-found.exception';
export { SourceNotConfiguredException } from './source-not-configured.exception';
export { getFailureReason } from './failure-reason';
export type { SourceFailureReason } from './failure-reason';
