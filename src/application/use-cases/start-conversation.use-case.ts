import { Inject, Injectable } from '@nestjs/common';
import { Either, tryCatchAsync } from '@application/common';
import { StartConversationInputDto, StartConversationOutputDto } from '@application/dtos';
import { TutoringError, UserNotFoundError, toTutoringError } from '@application/errors';
import {
  ICommandPort,
  IClockPort,
  IConversationRepositoryPort,
  IUserReaderPort,
} from '@application/ports';
import { Conversation } from '@domain/entities';
import { TutorProfile, UserId } from '@domain/value-objects';

/**
 * Opens a new conversation between a learner and the tutor.
 *
 * The conversation starts ACTIVE and takes the learner's current language pair;
 * later changes to the learner's languages do not affect it.
 */
@Injectable()
export class StartConversationUseCase
  implements ICommandPort<StartConversationInputDto, StartConversationOutputDto>
{
  constructor(
    @Inject('IUserRepository')
    private readonly userReader: IUserReaderPort,
    @Inject('IConversationRepository')
    private readonly conversationRepository: IConversationRepositoryPort,
    @Inject('IClock')
    private readonly clock: IClockPort,
  ) {}

  /**
   * @example
   * ```typescript
   * const result = await startConversation.execute({
   *   userId: 'usr_123',
   *   tutorProfile: { creativity: 0.2, style: 'corrective' },
   * });
   * if (result.isRight()) {
   *   console.log(result.value.conversationId); // conv_...
   * }
   * ```
   */
  async execute(
    input: StartConversationInputDto,
  ): Promise<Either<TutoringError, StartConversationOutputDto>> {
    return tryCatchAsync(async () => {
      const tutorProfile = TutorProfile.create(input.tutorProfile);

      const user = await this.userReader.findById(UserId.fromString(input.userId));
      if (!user) {
        throw new UserNotFoundError(input.userId);
      }

      const conversation = Conversation.start({
        userId: user.id,
        languages: user.languages,
        tutorProfile,
        title: input.title,
        now: this.clock.now(),
      });

      await this.conversationRepository.save(conversation);

      return { conversationId: conversation.id.toString() };
    }, toTutoringError);
  }
}
