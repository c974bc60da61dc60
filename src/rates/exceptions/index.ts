export { RateResolutionException } from './rate-resolution.exception';
export { InvalidPairException } from './invalid-pair.exception';
export { NoProvidersConfiguredException } from './no-providers-configured.exception';
export { AllProvidersExhaustedException } from './all-providers-exhausted.exception';
export type { SourceAttempt } from './all-providers-exhausted.exception';
