import { Inject, Injectable } from '@nestjs/common';
import { Either, tryCatchAsync } from '@application/common';
import { GetLearnerProfileInputDto, LearnerProfileReadModel } from '@application/dtos';
import { TutoringError, UserNotFoundError, toTutoringError } from '@application/errors';
import { ReadModelMapper } from '@application/mappers';
import { IQueryPort, IUserReaderPort } from '@application/ports';
import { UserId } from '@domain/value-objects';

@Injectable()
export class GetLearnerProfileUseCase
  implements IQueryPort<GetLearnerProfileInputDto, LearnerProfileReadModel>
{
  constructor(
    @Inject('IUserRepository')
    private readonly userReader: IUserReaderPort,
  ) {}

  async execute(
    input: GetLearnerProfileInputDto,
  ): Promise<Either<TutoringError, LearnerProfileReadModel>> {
    return tryCatchAsync(async () => {
      const user = await this.userReader.findById(UserId.fromString(input.userId));
      if (!user) {
        throw new UserNotFoundError(input.userId);
      }
      return ReadModelMapper.toLearnerProfile(user);
    }, toTutoringError);
  }
}
