import { Inject, Injectable } from '@nestjs/common';
import { Either, retryOnConflict, tryCatchAsync } from '@application/common';
import { ReassessProficiencyInputDto } from '@application/dtos';
import { TutoringError, UserNotFoundError, toTutoringError } from '@application/errors';
import { ICommandPort, IClockPort, IUserRepositoryPort } from '@application/ports';
import { CEFRLevel, UserId } from '@domain/value-objects';

/**
 * Records a new proficiency assessment for the learner's target language.
 * The only way a learner's CEFR level changes.
 */
@Injectable()
export class ReassessProficiencyUseCase implements ICommandPort<ReassessProficiencyInputDto> {
  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    @Inject('IClock')
    private readonly clock: IClockPort,
  ) {}

  async execute(input: ReassessProficiencyInputDto): Promise<Either<TutoringError, void>> {
    return tryCatchAsync(async () => {
      const level = CEFRLevel.fromString(input.level);

      await retryOnConflict(async () => {
        const user = await this.userRepository.findById(UserId.fromString(input.userId));
        if (!user) {
          throw new UserNotFoundError(input.userId);
        }
        user.reassessProficiency(level, this.clock.now());
        await this.userRepository.save(user);
      });
    }, toTutoringError);
  }
}
