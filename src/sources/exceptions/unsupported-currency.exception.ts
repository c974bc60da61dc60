import { HttpStatus } from '@nestjs/common';

import { SourceException } from './source.exception';

export class UnsupportedCurrencyException extends SourceException {
  readonly httpStatus = HttpStatus.NOT_FOUND;

  constructor(sourceName: string, currency?: string) {
    super(
      currency
        ? `Source ${sourceName} does not support currency ${currency}`
        : `Source ${sourceName} rejected the requested currency`,
      'UnsupportedCurrencyException',
    );
  }
}
