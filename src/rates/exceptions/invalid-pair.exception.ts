import { HttpStatus } from '@nestjs/common';

import { RateResolutionException } from './rate-resolution.exception';

export class InvalidPairException extends RateResolutionException {
  readonly httpStatus = HttpStatus.BAD_REQUEST;

  constructor(
    public readonly origin: string,
    public readonly destination: string,
    public readonly reason: string,
  ) {
    super(
      `Invalid currency pair ${origin}/${destination}: ${reason}`,
      'InvalidPairException',
    );
  }
}
