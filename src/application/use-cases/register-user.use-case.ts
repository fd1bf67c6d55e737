import { Inject, Injectable } from '@nestjs/common';
import { Either, tryCatchAsync } from '@application/common';
import { RegisterUserInputDto, RegisterUserOutputDto } from '@application/dtos';
import { TutoringError, toTutoringError } from '@application/errors';
import { ICommandPort, IClockPort, IUserRepositoryPort } from '@application/ports';
import { User } from '@domain/entities';
import { CEFRLevel, Language } from '@domain/value-objects';

/**
 * Registers a new learner with their native and target language.
 */
@Injectable()
export class RegisterUserUseCase
  implements ICommandPort<RegisterUserInputDto, RegisterUserOutputDto>
{
  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    @Inject('IClock')
    private readonly clock: IClockPort,
  ) {}

  async execute(
    input: RegisterUserInputDto,
  ): Promise<Either<TutoringError, RegisterUserOutputDto>> {
    return tryCatchAsync(async () => {
      const user = User.register({
        nativeLanguage: Language.fromCode(input.nativeLanguage),
        targetLanguage: Language.fromCode(input.targetLanguage),
        level: input.level === undefined ? undefined : CEFRLevel.fromString(input.level),
        now: this.clock.now(),
      });

      await this.userRepository.save(user);

      return { userId: user.id.toString() };
    }, toTutoringError);
  }
}
