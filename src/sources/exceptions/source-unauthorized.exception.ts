import { HttpStatus } from '@nestjs/common';

import { SourceException } from './source.exception';

export class SourceUnauthorizedException extends SourceException {
  readonly httpStatus = HttpStatus.UNAUTHORIZED;

  constructor(public readonly sourceName: string) {
    super(
      `Source ${sourceName} rejected the request. API key may be invalid, inactive or missing.`,
      SourceUnauthorizedException.name,
    );
  }
}
