import { MalformedResponseException } from './malformed-response.exception';
import { RateNotFoundException } from './rate-not-found.exception';
import { SourceApiException } from './source-api.exception';
import { SourceNotConfiguredException } from './source-not-configured.exception';
import { SourceTimeoutException } from './source-timeout.exception';
import { SourceUnauthorizedException } from './source-unauthorized.exception';
import { UnsupportedCurrencyException } from './unsupported-currency.exception';

export type SourceFailureReason =
  | 'timeout'
  | 'unauthorized'
  | 'not_configured'
  | 'rate_not_found'
  | 'unsupported_currency'
  | 'malformed_response'
  | 'rate_limited'
  | 'network_error'
  | 'api_error'
  | 'unknown';

export function getFailureReason(error: unknown): SourceFailureReason {
  if (error instanceof SourceTimeoutException) return 'timeout';
  if (error instanceof SourceUnauthorizedException) return 'unauthorized';
  if (error instanceof SourceNotConfiguredException) return 'not_configured';
  if (error instanceof RateNotFoundException) return 'rate_not_found';
  if (error instanceof UnsupportedCurrencyException) {
    return 'unsupported_currency';
  }
  if (error instanceof MalformedResponseException) return 'malformed_response';
  if (error instanceof SourceApiException) {
    if (error.statusCode === undefined) return 'network_error';
    return error.statusCode === 429 ? 'rate_limited' : 'api_error';
  }
  return 'unknown';
}
