export { AppConfigModule } from './config.module';
export { AppConfigService } from './config.service';
export { yamlLoader } from './loaders/yaml.loader';
export { yamlValidationSchema } from './schema';
export type { Config } from './types';
export type { SourceConfig, SourcesConfig } from './schema/sources.schema';
export type { CacheConfig } from './schema/cache.schema';
export type { HistoryConfig } from './schema/history.schema';
