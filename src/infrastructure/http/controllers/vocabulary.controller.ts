import { Body, Controller, Get, HttpCode, HttpStatus, Inject, Param, Post, Query } from '@nestjs/common';
import {
  ApiOperation,
  ApiTags,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { VocabularyReadModel } from '@application/dtos';
import {
  GetDueVocabularyUseCase,
  ListVocabularyUseCase,
  RecordVocabularyReviewUseCase,
} from '@application/use-cases';
import { DueVocabularyQueryDto, RecordReviewRequestDto } from '../dtos/request';
import { unwrapOrThrow } from '../errors';

/**
 * Controller for a learner's vocabulary and its review schedule.
 */
@ApiTags('Vocabulary')
@Controller('api/v1/users/:id/vocabulary')
export class VocabularyController {
  constructor(
    @Inject('ListVocabularyUseCase')
    private readonly listVocabulary: ListVocabularyUseCase,
    @Inject('GetDueVocabularyUseCase')
    private readonly getDueVocabulary: GetDueVocabularyUseCase,
    @Inject('RecordVocabularyReviewUseCase')
    private readonly recordReview: RecordVocabularyReviewUseCase,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List every vocabulary item of a learner' })
  async list(@Param('id') id: string): Promise<VocabularyReadModel[]> {
    return unwrapOrThrow(await this.listVocabulary.execute({ userId: id }));
  }

  @Get('due')
  @ApiOperation({ summary: 'Items due for review, soonest first' })
  async due(
    @Param('id') id: string,
    @Query() query: DueVocabularyQueryDto,
  ): Promise<VocabularyReadModel[]> {
    return unwrapOrThrow(await this.getDueVocabulary.execute({ userId: id, asOf: query.asOf }));
  }

  @Post('reviews')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Record the outcome of a review' })
  @ApiUnprocessableEntityResponse({ description: 'The learner never met this lexeme' })
  async review(@Param('id') id: string, @Body() dto: RecordReviewRequestDto): Promise<void> {
    unwrapOrThrow(
      await this.recordReview.execute({ userId: id, lexeme: dto.lexeme, outcome: dto.outcome }),
    );
  }
}
