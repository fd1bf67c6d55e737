import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsDate,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  ValidateNested,
} from 'class-validator';

export class MorphologyRequestDto {
  @ApiPropertyOptional({ example: 'feminine' })
  @IsOptional()
  @IsString()
  gender?: string;

  @ApiPropertyOptional({ example: 'plural' })
  @IsOptional()
  @IsString()
  number?: string;

  @ApiPropertyOptional({ example: 'present' })
  @IsOptional()
  @IsString()
  tense?: string;

  @ApiPropertyOptional({ example: 3 })
  @IsOptional()
  @IsInt()
  person?: number;
}

export class LexemeRequestDto {
  @ApiProperty({ description: 'The word as written', example: 'casas' })
  @IsString()
  @IsNotEmpty()
  surfaceForm!: string;

  @ApiProperty({ description: 'Dictionary form', example: 'casa' })
  @IsString()
  @IsNotEmpty()
  lemma!: string;

  @ApiProperty({ example: 'noun' })
  @IsString()
  partOfSpeech!: string;

  @ApiProperty({ description: 'ISO 639-1 code', example: 'es' })
  @IsString()
  @Length(2, 2)
  language!: string;

  @ApiPropertyOptional({ type: MorphologyRequestDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => MorphologyRequestDto)
  morphology?: MorphologyRequestDto;
}

export class RecordReviewRequestDto {
  @ApiProperty({ type: LexemeRequestDto })
  @ValidateNested()
  @Type(() => LexemeRequestDto)
  lexeme!: LexemeRequestDto;

  @ApiProperty({ enum: ['correct', 'incorrect', 'skipped'] })
  @IsIn(['correct', 'incorrect', 'skipped'])
  outcome!: string;
}

export class DueVocabularyQueryDto {
  @ApiPropertyOptional({
    description: 'Point in time to evaluate; defaults to now',
    example: '2025-01-15T09:00:00.000Z',
  })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  asOf?: Date;
}
