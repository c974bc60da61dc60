import { Static, Type } from '@sinclair/typebox';

export const cacheSchema = Type.Object(
  {
    enabled: Type.Boolean({
      default: true,
      description:
        'Enable the rate cache. When disabled every resolution goes through the source chain',
    }),
    ttlSeconds: Type.Integer({
      minimum: 0,
      default: 3600,
      description:
        'Time to live for cached rates in seconds. 0 stores nothing, so every read misses',
    }),
    checkPeriodSeconds: Type.Integer({
      minimum: 0,
      default: 0,
      description:
        'Interval of the background sweep that deletes expired entries. 0 disables the sweep; expiry is still checked on every read',
    }),
  },
  {
    description: 'Rate cache configuration',
    default: {},
  },
);

export type CacheConfig = Static<typeof cacheSchema>;
