import { Inject, Injectable } from '@nestjs/common';
import { Either, retryOnConflict, tryCatchAsync } from '@application/common';
import { UpdateLearnerLanguagesInputDto } from '@application/dtos';
import { TutoringError, UserNotFoundError, toTutoringError } from '@application/errors';
import { ICommandPort, IClockPort, IUserRepositoryPort } from '@application/ports';
import { CEFRLevel, Language, UserId } from '@domain/value-objects';

/**
 * Switches the learner's target language and/or corrects their native language.
 * Both may change in the same call, e.g. to swap them.
 * Conversations already started keep the language pair they began with.
 */
@Injectable()
export class UpdateLearnerLanguagesUseCase
  implements ICommandPort<UpdateLearnerLanguagesInputDto>
{
  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    @Inject('IClock')
    private readonly clock: IClockPort,
  ) {}

  async execute(input: UpdateLearnerLanguagesInputDto): Promise<Either<TutoringError, void>> {
    return tryCatchAsync(async () => {
      const nativeLanguage =
        input.nativeLanguage === undefined ? null : Language.fromCode(input.nativeLanguage);
      const targetLanguage =
        input.targetLanguage === undefined ? null : Language.fromCode(input.targetLanguage);
      const initialLevel = input.level === undefined ? undefined : CEFRLevel.fromString(input.level);

      await retryOnConflict(async () => {
        const user = await this.userRepository.findById(UserId.fromString(input.userId));
        if (!user) {
          throw new UserNotFoundError(input.userId);
        }
        user.changeLanguages(
          {
            ...(nativeLanguage && { native: nativeLanguage }),
            ...(targetLanguage && { target: targetLanguage }),
          },
          this.clock.now(),
          initialLevel,
        );

        await this.userRepository.save(user);
      });
    }, toTutoringError);
  }
}
