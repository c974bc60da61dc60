export { SourcesModule } from './sources.module';
export { SourcesController } from './sources.controller';
export { SourcesManagerService } from './sources-manager.service';
export { SourceName, isSourceName } from './source-name.enum';
export { SOURCES_MAP, SOURCES_PROVIDERS, SOURCE_ADAPTERS } from './sources.providers';
export * from './exceptions';

export type {
  SourceStatus,
  SourceHealth,
} from './sources-manager.service';
export type {
  SourceAdapter,
  SourceAdapterConfig,
  SourceDescriptor,
  RateTable,
  CurrencyListing,
  Pair,
} from './source-adapter.interface';
