import { HttpStatus } from '@nestjs/common';

import { formatPairLabel } from '../../common/utils/pair-formatter.util';
import { SourceFailureReason } from '../../sources/exceptions/failure-reason';
import { SourceName } from '../../sources/source-name.enum';
import { Pair } from '../../sources/source-adapter.interface';
import { RateResolutionException } from './rate-resolution.exception';

export interface SourceAttempt {
  source: SourceName;
  reason: SourceFailureReason;
  message: string;
  error: unknown;
}

export class AllProvidersExhaustedException extends RateResolutionException {
  readonly httpStatus = HttpStatus.SERVICE_UNAVAILABLE;

  constructor(
    public readonly pair: Pair,
    public readonly attempts: readonly SourceAttempt[],
  ) {
    const summary = attempts
      .map(({ source, reason }) => `${source} (${reason})`)
      .join(', ');
    super(
      `All rate sources failed for ${formatPairLabel(pair)}: ${summary}`,
      'AllProvidersExhaustedException',
    );
  }

  get attemptedSources(): SourceName[] {
    return this.attempts.map(({ source }) => source);
  }
}
