import { HttpStatus } from '@nestjs/common';

import { SourceException } from './source.exception';

export class SourceTimeoutException extends SourceException {
  readonly httpStatus = HttpStatus.GATEWAY_TIMEOUT;

  constructor(
    public readonly sourceName: string,
    public readonly timeoutMs: number,
  ) {
    super(
      `Source ${sourceName} did not respond within ${timeoutMs}ms`,
      'SourceTimeoutException',
    );
  }
}
