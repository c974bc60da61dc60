import { HttpStatus } from '@nestjs/common';

import { SourceException } from './source.exception';

export class SourceNotConfiguredException extends SourceException {
  readonly httpStatus = HttpStatus.BAD_REQUEST;

  constructor(
    public readonly sourceName: string,
    detail: string,
  ) {
    super(
      `Source ${sourceName} cannot be enabled: ${detail}`,
      SourceNotConfiguredException.name,
    );
  }
}
