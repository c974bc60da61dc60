import type { Pair } from '../../sources/source-adapter.interface';

export function formatPairLabel(pair: Readonly<Pair>): string {
  return pair.join('/');
}
