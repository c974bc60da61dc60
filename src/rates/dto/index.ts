export { RateQuoteDto } from './rate-quote.dto';
export {
  ResolveFailureDto,
  ResolveManyQueryDto,
  ResolveManyResponseDto,
} from './resolve-many.dto';
export { CacheEntryDto, CacheStatusDto } from './cache.dto';
