export { formatPairLabel } from './pair-formatter.util';
export { withTimeout } from './with-timeout.util';
