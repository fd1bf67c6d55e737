import { Inject, Injectable } from '@nestjs/common';
import { Either, TutoringOptions, tryCatchAsync } from '@application/common';
import { ListVocabularyInputDto, VocabularyReadModel } from '@application/dtos';
import { TutoringError, toTutoringError } from '@application/errors';
import { ReadModelMapper } from '@application/mappers';
import { IQueryPort, IVocabularyReaderPort } from '@application/ports';
import { ReviewScheduler } from '@domain/services';
import { UserId } from '@domain/value-objects';

// Every item of a learner, in the order they were first met
@Injectable()
export class ListVocabularyUseCase
  implements IQueryPort<ListVocabularyInputDto, VocabularyReadModel[]>
{
  private readonly scheduler: ReviewScheduler;

  constructor(
    @Inject('IVocabularyRepository')
    private readonly vocabularyReader: IVocabularyReaderPort,
    @Inject('TutoringOptions')
    options: TutoringOptions,
  ) {
    this.scheduler = new ReviewScheduler(options.reviewPolicy);
  }

  async execute(
    input: ListVocabularyInputDto,
  ): Promise<Either<TutoringError, VocabularyReadModel[]>> {
    return tryCatchAsync(async () => {
      const items = await this.vocabularyReader.listByUser(UserId.fromString(input.userId));

      return items
        .map((item) => ReadModelMapper.toVocabulary(item, this.scheduler))
        .sort(
          (a, b) =>
            a.firstEncounteredAt.getTime() - b.firstEncounteredAt.getTime() ||
            a.vocabularyItemId.localeCompare(b.vocabularyItemId),
        );
    }, toTutoringError);
  }
}
