import { Inject, Injectable } from '@nestjs/common';
import { Either, retryOnConflict, tryCatchAsync } from '@application/common';
import { RenameConversationInputDto } from '@application/dtos';
import { ConversationNotFoundError, TutoringError, toTutoringError } from '@application/errors';
import { ICommandPort, IClockPort, IConversationRepositoryPort } from '@application/ports';
import { ConversationId } from '@domain/value-objects';

@Injectable()
export class RenameConversationUseCase implements ICommandPort<RenameConversationInputDto> {
  constructor(
    @Inject('IConversationRepository')
    private readonly conversationRepository: IConversationRepositoryPort,
    @Inject('IClock')
    private readonly clock: IClockPort,
  ) {}

  async execute(input: RenameConversationInputDto): Promise<Either<TutoringError, void>> {
    return tryCatchAsync(async () => {
      const id = ConversationId.fromString(input.conversationId);

      await retryOnConflict(async () => {
        const conversation = await this.conversationRepository.findById(id);
        if (!conversation) {
          throw new ConversationNotFoundError(input.conversationId);
        }
        conversation.rename(input.title, this.clock.now());
        await this.conversationRepository.save(conversation);
      });
    }, toTutoringError);
  }
}
