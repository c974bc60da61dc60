import { HttpStatus } from '@nestjs/common';

import { SourceException } from './source.exception';

export class SourceNotFoundException extends SourceException {
  readonly httpStatus = HttpStatus.NOT_FOUND;

  constructor(sourceName: string, supportedSources: string[]) {
    super(
      `Unknown source: ${sourceName}. Supported sources: ${supportedSources.join(', ')}`,
      'SourceNotFoundException',
    );
  }
}
