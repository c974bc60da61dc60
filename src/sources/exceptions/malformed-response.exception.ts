import { HttpStatus } from '@nestjs/common';

import { SourceException } from './source.exception';

export class MalformedResponseException extends SourceException {
  readonly httpStatus = HttpStatus.BAD_GATEWAY;

  constructor(sourceName: string, detail: string) {
    super(
      `Malformed response from ${sourceName}: ${detail}`,
      'MalformedResponseException',
    );
  }
}
