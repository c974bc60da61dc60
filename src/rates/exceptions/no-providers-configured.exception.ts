import { HttpStatus } from '@nestjs/common';

import { formatPairLabel } from '../../common/utils/pair-formatter.util';
import { Pair } from '../../sources/source-adapter.interface';
import { RateResolutionException } from './rate-resolution.exception';

export class NoProvidersConfiguredException extends RateResolutionException {
  readonly httpStatus = HttpStatus.SERVICE_UNAVAILABLE;

  constructor(public readonly pair: Pair) {
    super(
      `No rate source is enabled to resolve ${formatPairLabel(pair)}`,
      'NoProvidersConfiguredException',
    );
  }
}
