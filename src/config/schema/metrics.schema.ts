import { Static, Type } from '@sinclair/typebox';

export const metricsSchema = Type.Object(
  {
    collectDefaultMetrics: Type.Boolean({
      default: true,
      description:
        'Collect default Node.js process metrics (heap, event loop lag, GC)',
    }),
  },
  {
    description: 'Prometheus metrics configuration',
    default: {},
  },
);

export type MetricsConfig = Static<typeof metricsSchema>;
