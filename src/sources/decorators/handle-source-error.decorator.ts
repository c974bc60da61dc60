import { isAxiosError } from 'axios';

import {
  SourceApiException,
  SourceException,
  SourceTimeoutException,
  SourceUnauthorizedException,
  UnsupportedCurrencyException,
} from '../exceptions';
import { SourceAdapter } from '../source-adapter.interface';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Translates transport errors thrown by an adapter method into the
 * SourceException family. Errors that already are SourceExceptions pass through.
 */
export function HandleSourceError() {
  return function <Args extends unknown[], Result>(
    _target: object,
    _propertyKey: string | symbol,
    descriptor: TypedPropertyDescriptor<(...args: Args) => Promise<Result>>,
  ): void {
    const originalMethod = descriptor.value;
    if (!originalMethod) {
      return;
    }

    descriptor.value = async function (
      this: SourceAdapter,
      ...args: Args
    ): Promise<Result> {
      try {
        return await originalMethod.apply(this, args);
      } catch (error) {
        throw toSourceException(this, error, args[0]);
      }
    };
  };
}

function toSourceException(
  adapter: SourceAdapter,
  error: unknown,
  firstArg: unknown,
): SourceException {
  if (error instanceof SourceException) {
    return error;
  }

  const sourceName = adapter.name;

  if (isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new SourceTimeoutException(
        sourceName,
        adapter.getConfig().timeoutMs,
      );
    }

    const status = error.response?.status;
    if (status === 401 || status === 403) {
      return new SourceUnauthorizedException(sourceName);
    }
    if (status === 400 || status === 404 || status === 422) {
      return new UnsupportedCurrencyException(
        sourceName,
        typeof firstArg === 'string' ? firstArg : undefined,
      );
    }

    return new SourceApiException(sourceName, error, status);
  }

  return new SourceApiException(
    sourceName,
    error instanceof Error ? error : new Error(String(error)),
  );
}
