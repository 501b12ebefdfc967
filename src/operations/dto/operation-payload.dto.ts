import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class ViewPayloadDto {
  @ApiProperty({ type: [Number], example: [101, 102] })
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  @Min(1, { each: true })
  messageIds!: number[];

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  markAsRead?: boolean;
}

export class ReactPayloadDto {
  @ApiProperty({ type: [Number], example: [101] })
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  @Min(1, { each: true })
  messageIds!: number[];

  @ApiPropertyOptional({
    type: [String],
    description: 'Reactions to pick from; a default palette when omitted',
  })
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  emojis?: string[];
}

export class VotePayloadDto {
  @ApiProperty({ example: 101 })
  @IsInt()
  @Min(1)
  messageId!: number;

  @ApiProperty({ type: [Number], example: [0] })
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  @Min(0, { each: true })
  optionIndexes!: number[];
}

export class JoinLivePayloadDto {
  @ApiProperty({ description: 'Group call id as reported by the watcher' })
  @IsString()
  @IsNotEmpty()
  eventId!: string;
}
