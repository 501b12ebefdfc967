import { IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class MonitorTargetDto {
  @ApiProperty({ example: '@example_channel' })
  @IsString()
  @IsNotEmpty()
  target!: string;
}

export class AddMonitorDto extends MonitorTargetDto {
  @ApiPropertyOptional({
    description:
      'Accounts to join a detected event with; the configured default when omitted',
    minimum: 1,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  breadth?: number;
}
