import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';

const STYLES = ['practice', 'explanatory', 'corrective', 'conversational'];
const STATUSES = ['active', 'archived', 'deleted'];
const ROLES = ['system', 'user', 'assistant'];

export class TutorProfileRequestDto {
  @ApiPropertyOptional({
    description: 'How freely the tutor answers, from 0 (strict) to 1 (expressive)',
    example: 0.5,
    minimum: 0,
    maximum: 1,
  })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  creativity?: number;

  @ApiPropertyOptional({ enum: STYLES, example: 'conversational' })
  @IsOptional()
  @IsIn(STYLES)
  style?: string;
}

export class StartConversationRequestDto {
  @ApiProperty({ description: 'Learner who owns the conversation', example: 'usr_4b1c0e9a-...' })
  @IsString()
  @IsNotEmpty()
  userId!: string;

  @ApiPropertyOptional({ example: 'Ordering at a restaurant', maxLength: 100 })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  title?: string;

  @ApiPropertyOptional({ type: TutorProfileRequestDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => TutorProfileRequestDto)
  tutorProfile?: TutorProfileRequestDto;
}

/**
 * Request DTO for appending a message to a conversation.
 *
 * Learner messages (role=user) get a tutor reply in the same request.
 */
export class SendMessageRequestDto {
  @ApiProperty({
    description: 'The message text',
    example: '¿Dónde está la biblioteca?',
    minLength: 1,
    maxLength: 4000,
  })
  @IsString({ message: 'Content must be a string' })
  @IsNotEmpty({ message: 'Content cannot be empty' })
  @MaxLength(4000, { message: 'Content cannot exceed 4000 characters' })
  content!: string;

  @ApiPropertyOptional({ enum: ROLES, default: 'user' })
  @IsOptional()
  @IsIn(ROLES)
  role?: string;
}

export class RenameConversationRequestDto {
  @ApiProperty({ example: 'Travel vocabulary', maxLength: 100 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  title!: string;
}

export class ListConversationsQueryDto {
  @ApiProperty({ description: 'Owner of the conversations' })
  @IsString()
  @IsNotEmpty()
  userId!: string;

  @ApiPropertyOptional({
    enum: STATUSES,
    description: 'Only conversations in this state. Without it, deleted ones are left out.',
  })
  @IsOptional()
  @IsIn(STATUSES)
  status?: string;
}

export class GetConversationQueryDto {
  @ApiPropertyOptional({ description: 'Return only the last N messages', minimum: 0 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  limit?: number;
}
