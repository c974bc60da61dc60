export { yamlValidationSchema } from './yaml.schema';
export { cacheSchema } from './cache.schema';
export { historySchema } from './history.schema';
export { loggerSchema } from './logger.schema';
export { metricsSchema } from './metrics.schema';
export { proxySchema } from './proxy.schema';
export { sourcesSchema } from './sources.schema';
