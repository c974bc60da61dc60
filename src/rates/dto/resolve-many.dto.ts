import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsString,
  Length,
} from 'class-validator';

import { RateQuoteDto } from './rate-quote.dto';

export class ResolveManyQueryDto {
  @ApiProperty({
    description: 'Comma separated destination codes',
    type: String,
    example: 'EUR,BRL,JPY',
  })
  @Transform(({ value }) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((code) => code.trim())
          .filter(Boolean)
      : value,
  )
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(50)
  @IsString({ each: true })
  @Length(1, 10, { each: true })
  to!: string[];
}

export class ResolveFailureDto {
  @ApiProperty({ example: 'XXX' })
  destination!: string;

  @ApiProperty({
    example: 'Invalid currency pair USD/XXX: unknown currency code XXX',
  })
  message!: string;
}

export class ResolveManyResponseDto {
  @ApiProperty({ example: 'USD' })
  origin!: string;

  @ApiProperty({ type: [RateQuoteDto] })
  quotes!: RateQuoteDto[];

  @ApiProperty({ type: [ResolveFailureDto] })
  failures!: ResolveFailureDto[];
}
