import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';

import { RatesExceptionFilter } from './rates-exception.filter';
import { SourceApiException, SourceTimeoutException } from '../../sources/exceptions';
import { SourceName } from '../../sources/source-name.enum';
import {
  AllProvidersExhaustedException,
  InvalidPairException,
} from '../exceptions';

function createHost(): {
  host: ExecutionContextHost;
  status: jest.Mock;
  json: jest.Mock;
} {
  const json = jest.fn();
  const status = jest.fn().mockReturnValue({ json });
  return { host: new ExecutionContextHost([{}, { status }]), status, json };
}

describe('RatesExceptionFilter', () => {
  const filter = new RatesExceptionFilter();

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-03-02T10:00:00.000Z'));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('answers an invalid pair with 400', () => {
    const { host, status, json } = createHost();

    filter.catch(new InvalidPairException('USD', 'XXX', 'unknown currency code XXX'), host);

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({
      statusCode: 400,
      timestamp: '2026-03-02T10:00:00.000Z',
      message: 'Invalid currency pair USD/XXX: unknown currency code XXX',
    });
  });

  it('answers exhausted sources with 503 and the attempts made', () => {
    const { host, status, json } = createHost();
    const timeout = new SourceTimeoutException(SourceName.FRANKFURTER, 100);
    const apiError = new SourceApiException(
      SourceName.EXCHANGERATE_API,
      new Error('bad gateway'),
      502,
    );

    filter.catch(
      new AllProvidersExhaustedException(
        ['USD', 'EUR'],
        [
          {
            source: SourceName.FRANKFURTER,
            reason: 'timeout',
            message: timeout.message,
            error: timeout,
          },
          {
            source: SourceName.EXCHANGERATE_API,
            reason: 'api_error',
            message: apiError.message,
            error: apiError,
          },
        ],
      ),
      host,
    );

    expect(status).toHaveBeenCalledWith(503);
    expect(json).toHaveBeenCalledWith({
      statusCode: 503,
      timestamp: '2026-03-02T10:00:00.000Z',
      message:
        'All rate sources failed for USD/EUR: frankfurter (timeout), exchangerate-api (api_error)',
      attempts: [
        {
          source: 'frankfurter',
          reason: 'timeout',
          message: 'Source frankfurter did not respond within 100ms',
        },
        {
          source: 'exchangerate-api',
          reason: 'api_error',
          message: 'API error from exchangerate-api: bad gateway',
        },
      ],
    });
  });
});
