export {
  CONVERSION_HISTORY_REPOSITORY,
} from './conversion-history.repository';
export type {
  ConversionHistoryRepository,
  HistoryFilter,
  HistoryPage,
  StoredConversion,
} from './conversion-history.repository';
export {
  DEFAULT_HISTORY_LIMIT,
  InMemoryConversionHistoryRepository,
} from './in-memory-conversion-history.repository';
