import { Inject, Injectable } from '@nestjs/common';
import { Either, retryOnConflict, tryCatchAsync } from '@application/common';
import { RecordVocabularyReviewInputDto } from '@application/dtos';
import { TutoringError, toTutoringError } from '@application/errors';
import { LexemeMapper } from '@application/mappers';
import { ICommandPort, IClockPort, IVocabularyRepositoryPort } from '@application/ports';
import { InvalidReviewOutcomeException } from '@domain/exceptions';
import { UserId, parseReviewOutcome } from '@domain/value-objects';

/**
 * Appends a review to the learner's item for a lexeme. The next due date is
 * not stored; it follows from the new history.
 */
@Injectable()
export class RecordVocabularyReviewUseCase implements ICommandPort<RecordVocabularyReviewInputDto> {
  constructor(
    @Inject('IVocabularyRepository')
    private readonly vocabularyRepository: IVocabularyRepositoryPort,
    @Inject('IClock')
    private readonly clock: IClockPort,
  ) {}

  async execute(input: RecordVocabularyReviewInputDto): Promise<Either<TutoringError, void>> {
    return tryCatchAsync(async () => {
      const userId = UserId.fromString(input.userId);
      const lexeme = LexemeMapper.toDomain(input.lexeme);
      const outcome = parseReviewOutcome(input.outcome);

      await retryOnConflict(async () => {
        const item = await this.vocabularyRepository.findByLexeme(userId, lexeme);
        if (!item) {
          throw new InvalidReviewOutcomeException(
            `"${lexeme.surfaceForm}" has never been encountered`,
          );
        }
        item.recordReview(outcome, this.clock.now());
        await this.vocabularyRepository.save(item);
      });
    }, toTutoringError);
  }
}
