export { ConversionsModule } from './conversions.module';
export { ConversionsService } from './conversions.service';
export type {
  Conversion,
  ConversionBatch,
  ConversionFailure,
  ConvertOptions,
} from './conversion.interface';
export { InvalidAmountException } from './exceptions';
export * from './history';
