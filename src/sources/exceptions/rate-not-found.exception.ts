import { HttpStatus } from '@nestjs/common';

import { formatPairLabel } from '../../common/utils/pair-formatter.util';
import { Pair } from '../source-adapter.interface';
import { SourceException } from './source.exception';

export class RateNotFoundException extends SourceException {
  readonly httpStatus = HttpStatus.NOT_FOUND;

  constructor(pair: Pair, sourceName?: string) {
    const sourceStr = sourceName ? ` from ${sourceName}` : '';
    super(
      `No rate found for ${formatPairLabel(pair)}${sourceStr}`,
      'RateNotFoundException',
    );
  }
}
