export { ConvertBatchDto, ConvertQueryDto } from './convert.dto';
export {
  ConversionBatchDto,
  ConversionDto,
  ConversionFailureDto,
} from './conversion.dto';
export { HistoryEntryDto, HistoryPageDto, HistoryQueryDto } from './history.dto';
