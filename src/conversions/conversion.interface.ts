import { SourceName } from '../sources/source-name.enum';

export interface Conversion {
  /** Present once the conversion is stored in history */
  id?: string;
  amount: string;
  origin: string;
  destination: string;
  /** `amount × rate`, rounded half-up to 2 decimal places */
  result: string;
  rate: string;
  inverseRate: string;
  source: SourceName;
  rateFetchedAt: Date;
  createdAt: Date;
}

export interface ConversionFailure {
  destination: string;
  message: string;
}

export interface ConversionBatch {
  id: string;
  amount: string;
  origin: string;
  conversions: Conversion[];
  failures: ConversionFailure[];
  createdAt: Date;
}

export interface ConvertOptions {
  /** Store the conversion in history, true unless set */
  save?: boolean;
}
