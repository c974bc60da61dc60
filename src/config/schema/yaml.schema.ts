import { Type } from '@sinclair/typebox';

import { NODE_ENVIRONMENTS } from '../constants';
import { cacheSchema } from './cache.schema';
import { historySchema } from './history.schema';
import { loggerSchema } from './logger.schema';
import { metricsSchema } from './metrics.schema';
import { proxySchema } from './proxy.schema';
import { sourcesSchema } from './sources.schema';
import { variantsSchema } from '../utils/schema.util';

export const yamlValidationSchema = Type.Object(
  {
    port: Type.Integer({
      minimum: 1,
      maximum: 65535,
      default: 3000,
      description: 'Port for the HTTP server',
    }),
    environment: variantsSchema(NODE_ENVIRONMENTS, {
      default: 'development',
      description: 'Application environment mode',
    }),
    logger: loggerSchema,
    proxy: proxySchema,
    cache: cacheSchema,
    metrics: metricsSchema,
    history: historySchema,
    sources: sourcesSchema,
  },
  {
    default: {},
  },
);
