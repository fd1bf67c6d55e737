import { Inject, Injectable } from '@nestjs/common';
import { Either, TutoringOptions, tryCatchAsync } from '@application/common';
import { GetDueVocabularyInputDto, VocabularyReadModel } from '@application/dtos';
import { TutoringError, toTutoringError } from '@application/errors';
import { ReadModelMapper } from '@application/mappers';
import { IClockPort, IQueryPort, IVocabularyReaderPort } from '@application/ports';
import { ReviewScheduler } from '@domain/services';
import { UserId } from '@domain/value-objects';

/**
 * Vocabulary the learner should review at `asOf`, soonest due first.
 * Ties on the due date are broken by item id so repeated calls agree.
 */
@Injectable()
export class GetDueVocabularyUseCase
  implements IQueryPort<GetDueVocabularyInputDto, VocabularyReadModel[]>
{
  private readonly scheduler: ReviewScheduler;

  constructor(
    @Inject('IVocabularyRepository')
    private readonly vocabularyReader: IVocabularyReaderPort,
    @Inject('IClock')
    private readonly clock: IClockPort,
    @Inject('TutoringOptions')
    options: TutoringOptions,
  ) {
    this.scheduler = new ReviewScheduler(options.reviewPolicy);
  }

  async execute(
    input: GetDueVocabularyInputDto,
  ): Promise<Either<TutoringError, VocabularyReadModel[]>> {
    return tryCatchAsync(async () => {
      const userId = UserId.fromString(input.userId);
      const asOf = input.asOf ?? this.clock.now();

      const items = await this.vocabularyReader.listDue(userId, asOf);

      return items
        .map((item) => ReadModelMapper.toVocabulary(item, this.scheduler))
        .sort(
          (a, b) =>
            a.nextDueAt.getTime() - b.nextDueAt.getTime() ||
            a.vocabularyItemId.localeCompare(b.vocabularyItemId),
        );
    }, toTutoringError);
  }
}
