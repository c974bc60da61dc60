import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

import { SourceName } from '../source-name.enum';

export class SourceDescriptorDto {
  @ApiProperty({ enum: SourceName, example: SourceName.FRANKFURTER })
  name!: SourceName;

  @ApiProperty({
    description: 'Position in the fallback chain, lower is tried first',
    example: 1,
  })
  priority!: number;

  @ApiProperty({ example: true })
  enabled!: boolean;

  @ApiProperty({
    description: 'Upper bound for a single fetch in milliseconds',
    example: 10000,
  })
  timeoutMs!: number;
}

export class SourceStatusDto extends SourceDescriptorDto {
  @ApiProperty({ enum: ['online', 'offline', 'disabled'], example: 'online' })
  status!: 'online' | 'offline' | 'disabled';

  @ApiPropertyOptional({
    description: 'Number of currencies the source advertises',
    example: 31,
  })
  currencies?: number;

  @ApiPropertyOptional({ example: 'Source frankfurter did not respond within 10000ms' })
  error?: string;
}
