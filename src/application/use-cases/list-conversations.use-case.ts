import { Inject, Injectable } from '@nestjs/common';
import { Either, tryCatchAsync } from '@application/common';
import { ConversationSummaryReadModel, ListConversationsInputDto } from '@application/dtos';
import { TutoringError, toTutoringError } from '@application/errors';
import { ReadModelMapper } from '@application/mappers';
import { IConversationReaderPort, IQueryPort } from '@application/ports';
import { ConversationStatus, UserId } from '@domain/value-objects';

/**
 * Lists a learner's conversations, most recently active first.
 * Without a status filter, deleted conversations are left out.
 */
@Injectable()
export class ListConversationsUseCase
  implements IQueryPort<ListConversationsInputDto, ConversationSummaryReadModel[]>
{
  constructor(
    @Inject('IConversationRepository')
    private readonly conversationReader: IConversationReaderPort,
  ) {}

  async execute(
    input: ListConversationsInputDto,
  ): Promise<Either<TutoringError, ConversationSummaryReadModel[]>> {
    return tryCatchAsync(async () => {
      const userId = UserId.fromString(input.userId);
      const status =
        input.status === undefined ? undefined : ConversationStatus.fromString(input.status);

      const conversations = await this.conversationReader.listByUser(userId, status);

      return conversations
        .filter((conversation) => status !== undefined || !conversation.status.isDeleted())
        .sort((a, b) => b.lastActivityAt.getTime() - a.lastActivityAt.getTime())
        .map((conversation) => ReadModelMapper.toConversationSummary(conversation));
    }, toTutoringError);
  }
}
