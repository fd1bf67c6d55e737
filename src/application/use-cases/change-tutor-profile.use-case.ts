import { Inject, Injectable } from '@nestjs/common';
import { Either, retryOnConflict, tryCatchAsync } from '@application/common';
import { ChangeTutorProfileInputDto } from '@application/dtos';
import { ConversationNotFoundError, TutoringError, toTutoringError } from '@application/errors';
import { ICommandPort, IClockPort, IConversationRepositoryPort } from '@application/ports';
import { ConversationId, TutorProfile } from '@domain/value-objects';

/**
 * Replaces a conversation's tutor profile. Fields left out keep their current value;
 * the result is a new TutorProfile, never an in-place edit.
 */
@Injectable()
export class ChangeTutorProfileUseCase implements ICommandPort<ChangeTutorProfileInputDto> {
  constructor(
    @Inject('IConversationRepository')
    private readonly conversationRepository: IConversationRepositoryPort,
    @Inject('IClock')
    private readonly clock: IClockPort,
  ) {}

  async execute(input: ChangeTutorProfileInputDto): Promise<Either<TutoringError, void>> {
    return tryCatchAsync(async () => {
      const id = ConversationId.fromString(input.conversationId);

      await retryOnConflict(async () => {
        const conversation = await this.conversationRepository.findById(id);
        if (!conversation) {
          throw new ConversationNotFoundError(input.conversationId);
        }
        const current = conversation.tutorProfile;
        const profile = TutorProfile.create({
          creativity: input.creativity ?? current.creativity,
          style: input.style ?? current.style,
        });
        conversation.changeTutorProfile(profile, this.clock.now());
        await this.conversationRepository.save(conversation);
      });
    }, toTutoringError);
  }
}
