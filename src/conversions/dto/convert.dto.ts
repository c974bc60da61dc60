import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Length,
} from 'class-validator';

export class ConvertQueryDto {
  @ApiProperty({ example: 100 })
  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  amount!: number;

  @ApiProperty({ example: 'USD' })
  @IsString()
  @Length(3, 3)
  from!: string;

  @ApiProperty({ example: 'BRL' })
  @IsString()
  @Length(3, 3)
  to!: string;

  @ApiPropertyOptional({
    description: 'Store the conversion in history',
    default: true,
  })
  @IsOptional()
  @Transform(({ value }) => !(value === false || value === 'false' || value === '0'))
  @IsBoolean()
  save?: boolean;
}

export class ConvertBatchDto {
  @ApiProperty({ example: 250.5 })
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  amount!: number;

  @ApiProperty({ example: 'USD' })
  @IsString()
  @Length(3, 3)
  from!: string;

  @ApiProperty({ type: [String], example: ['EUR', 'BRL', 'JPY'] })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(50)
  @IsString({ each: true })
  @Length(3, 3, { each: true })
  to!: string[];
}
