import { Inject, Injectable } from '@nestjs/common';
import { Either, retryOnConflict, tryCatchAsync } from '@application/common';
import { ConversationLifecycleInputDto } from '@application/dtos';
import { ConversationNotFoundError, TutoringError, toTutoringError } from '@application/errors';
import { ICommandPort, IClockPort, IConversationRepositoryPort } from '@application/ports';
import { Conversation } from '@domain/entities';
import { ConversationId } from '@domain/value-objects';

/**
 * Shared load-transition-save flow for the conversation lifecycle commands.
 * Subclasses only decide which transition to apply; an illegal one surfaces
 * as InvalidStateTransitionException.
 */
export abstract class ConversationLifecycleUseCase
  implements ICommandPort<ConversationLifecycleInputDto>
{
  constructor(
    private readonly conversationRepository: IConversationRepositoryPort,
    private readonly clock: IClockPort,
  ) {}

  protected abstract apply(conversation: Conversation, at: Date): void;

  async execute(input: ConversationLifecycleInputDto): Promise<Either<TutoringError, void>> {
    return tryCatchAsync(async () => {
      const id = ConversationId.fromString(input.conversationId);

      await retryOnConflict(async () => {
        const conversation = await this.conversationRepository.findById(id);
        if (!conversation) {
          throw new ConversationNotFoundError(input.conversationId);
        }
        this.apply(conversation, this.clock.now());
        await this.conversationRepository.save(conversation);
      });
    }, toTutoringError);
  }
}

/**
 * ACTIVE -> ARCHIVED. Archived conversations keep their history but take no messages.
 */
@Injectable()
export class ArchiveConversationUseCase extends ConversationLifecycleUseCase {
  constructor(
    @Inject('IConversationRepository') conversationRepository: IConversationRepositoryPort,
    @Inject('IClock') clock: IClockPort,
  ) {
    super(conversationRepository, clock);
  }

  protected apply(conversation: Conversation, at: Date): void {
    conversation.archive(at);
  }
}

/**
 * ARCHIVED -> ACTIVE.
 */
@Injectable()
export class ReactivateConversationUseCase extends ConversationLifecycleUseCase {
  constructor(
    @Inject('IConversationRepository') conversationRepository: IConversationRepositoryPort,
    @Inject('IClock') clock: IClockPort,
  ) {
    super(conversationRepository, clock);
  }

  protected apply(conversation: Conversation, at: Date): void {
    conversation.reactivate(at);
  }
}

/**
 * ACTIVE | ARCHIVED -> DELETED. Soft delete: the conversation is kept, and
 * can no longer change.
 */
@Injectable()
export class DeleteConversationUseCase extends ConversationLifecycleUseCase {
  constructor(
    @Inject('IConversationRepository') conversationRepository: IConversationRepositoryPort,
    @Inject('IClock') clock: IClockPort,
  ) {
    super(conversationRepository, clock);
  }

  protected apply(conversation: Conversation, at: Date): void {
    conversation.delete(at);
  }
}
