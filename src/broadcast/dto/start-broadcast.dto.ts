import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class StartBroadcastDto {
  @ApiProperty({
    description: 'Channel or group username, link or numeric id',
    example: '@example_channel',
  })
  @IsString()
  @IsNotEmpty()
  target!: string;

  @ApiProperty({ enum: ['join', 'view', 'react', 'vote', 'joinLive'] })
  @IsString()
  @IsIn(['join', 'view', 'react', 'vote', 'joinLive'])
  operation!: string;

  @ApiPropertyOptional({
    description: 'Number of accounts to use; all eligible when omitted',
    minimum: 1,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  breadth?: number;

  @ApiPropertyOptional({
    description: 'Operation parameters, e.g. { "messageIds": [101] } for view',
    type: 'object',
    additionalProperties: true,
  })
  @IsOptional()
  @IsObject()
  payload?: Record<string, unknown>;

  @ApiPropertyOptional({ minimum: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxConcurrency?: number;

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  retryThrottled?: boolean;
}
