import { Inject, Injectable } from '@nestjs/common';
import { Either, tryCatchAsync } from '@application/common';
import { ConversationReadModel, GetConversationInputDto } from '@application/dtos';
import { ConversationNotFoundError, TutoringError, toTutoringError } from '@application/errors';
import { ReadModelMapper } from '@application/mappers';
import { IConversationReaderPort, IQueryPort } from '@application/ports';
import { ConversationId } from '@domain/value-objects';

/**
 * Retrieves a conversation with its messages. Deleted conversations are still
 * readable: deletion is a lifecycle state, not an erasure.
 */
@Injectable()
export class GetConversationUseCase
  implements IQueryPort<GetConversationInputDto, ConversationReadModel>
{
  constructor(
    @Inject('IConversationRepository')
    private readonly conversationReader: IConversationReaderPort,
  ) {}

  async execute(
    input: GetConversationInputDto,
  ): Promise<Either<TutoringError, ConversationReadModel>> {
    return tryCatchAsync(async () => {
      const conversation = await this.conversationReader.findById(
        ConversationId.fromString(input.conversationId),
      );
      if (!conversation) {
        throw new ConversationNotFoundError(input.conversationId);
      }
      return ReadModelMapper.toConversation(conversation, input.limit);
    }, toTutoringError);
  }
}
