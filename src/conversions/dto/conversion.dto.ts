import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

import { SourceName } from '../../sources/source-name.enum';
import { Conversion, ConversionBatch } from '../conversion.interface';

export class ConversionDto {
  @ApiPropertyOptional({ example: '0b7f6c52-3c1e-4f43-a5d6-1f2d0e9a8b11' })
  id?: string;

  @ApiProperty({ example: '100' })
  amount!: string;

  @ApiProperty({ example: 'USD' })
  origin!: string;

  @ApiProperty({ example: 'BRL' })
  destination!: string;

  @ApiProperty({ example: '507.00' })
  result!: string;

  @ApiProperty({ example: '5.07' })
  rate!: string;

  @ApiProperty({ example: '0.19723866' })
  inverseRate!: string;

  @ApiProperty({ enum: SourceName, example: SourceName.FRANKFURTER })
  source!: SourceName;

  @ApiProperty({ example: '2026-03-02T10:00:00.000Z' })
  rateFetchedAt!: string;

  @ApiProperty({ example: '2026-03-02T10:05:00.000Z' })
  createdAt!: string;

  static from(conversion: Conversion): ConversionDto {
    return {
      ...conversion,
      rateFetchedAt: conversion.rateFetchedAt.toISOString(),
      createdAt: conversion.createdAt.toISOString(),
    };
  }
}

export class ConversionFailureDto {
  @ApiProperty({ example: 'XXX' })
  destination!: string;

  @ApiProperty({
    example: 'Invalid currency pair USD/XXX: unknown currency code XXX',
  })
  message!: string;
}

export class ConversionBatchDto {
  @ApiProperty({ example: '4e0a3c7d-95f1-4b44-8a0e-7d1c2b3a4f56' })
  id!: string;

  @ApiProperty({ example: '250.5' })
  amount!: string;

  @ApiProperty({ example: 'USD' })
  origin!: string;

  @ApiProperty({ type: [ConversionDto] })
  conversions!: ConversionDto[];

  @ApiProperty({ type: [ConversionFailureDto] })
  failures!: ConversionFailureDto[];

  @ApiProperty({ example: '2026-03-02T10:05:00.000Z' })
  createdAt!: string;

  static from(batch: ConversionBatch): ConversionBatchDto {
    return {
      ...batch,
      conversions: batch.conversions.map((conversion) =>
        ConversionDto.from(conversion),
      ),
      createdAt: batch.createdAt.toISOString(),
    };
  }
}
