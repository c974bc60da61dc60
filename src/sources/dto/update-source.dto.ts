import { ApiProperty } from '@nestjs/swagger';
import { IsBoolean } from 'class-validator';

export class UpdateSourceDto {
  @ApiProperty({
    description: 'Include or skip the source in the fallback chain',
    example: false,
  })
  @IsBoolean()
  enabled!: boolean;
}
