import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional, IsString, MaxLength } from 'class-validator';

export class CurrencyDto {
  @ApiProperty({ example: 'BRL' })
  code!: string;

  @ApiProperty({ example: 'Brazilian Real' })
  name!: string;

  @ApiPropertyOptional({ example: 'R$' })
  symbol?: string;

  @ApiProperty({ example: true })
  popular!: boolean;
}

export class ListCurrenciesQueryDto {
  @ApiPropertyOptional({
    description: 'Only the most used currencies',
    example: true,
  })
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true' || value === '1')
  @IsBoolean()
  popular?: boolean;

  @ApiPropertyOptional({
    description: 'Case-insensitive match on code or name',
    example: 'dollar',
  })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  search?: string;
}
