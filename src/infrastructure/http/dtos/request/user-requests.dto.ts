import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsOptional, IsString, Length } from 'class-validator';

const CEFR_LEVELS = ['A1', 'A2', 'B1', 'B2', 'C1', 'C2'];

/**
 * Request DTO for registering a learner.
 * Language codes are ISO 639-1; the domain checks they exist.
 */
export class RegisterUserRequestDto {
  @ApiProperty({ description: 'ISO 639-1 code of the native language', example: 'en' })
  @IsString()
  @Length(2, 2, { message: 'nativeLanguage must be a two-letter ISO 639-1 code' })
  nativeLanguage!: string;

  @ApiProperty({ description: 'ISO 639-1 code of the language being learned', example: 'es' })
  @IsString()
  @Length(2, 2, { message: 'targetLanguage must be a two-letter ISO 639-1 code' })
  targetLanguage!: string;

  @ApiPropertyOptional({ description: 'Starting CEFR level', enum: CEFR_LEVELS, default: 'A1' })
  @IsOptional()
  @IsIn(CEFR_LEVELS)
  level?: string;
}

export class ReassessProficiencyRequestDto {
  @ApiProperty({ description: 'Assessed CEFR level', enum: CEFR_LEVELS, example: 'A2' })
  @IsIn(CEFR_LEVELS)
  level!: string;
}

export class UpdateLanguagesRequestDto {
  @ApiPropertyOptional({ example: 'en' })
  @IsOptional()
  @IsString()
  @Length(2, 2)
  nativeLanguage?: string;

  @ApiPropertyOptional({ example: 'fr' })
  @IsOptional()
  @IsString()
  @Length(2, 2)
  targetLanguage?: string;

  @ApiPropertyOptional({
    description: 'Level to start at when the target language is new to the learner',
    enum: CEFR_LEVELS,
  })
  @IsOptional()
  @IsIn(CEFR_LEVELS)
  level?: string;
}
