import { Inject, Injectable, Logger } from '@nestjs/common';
import { Either, retryOnConflict, tryCatchAsync } from '@application/common';
import { CaptureVocabularyInputDto, CaptureVocabularyOutputDto } from '@application/dtos';
import {
  ConversationNotFoundError,
  MessageNotFoundError,
  TutoringError,
  toTutoringError,
} from '@application/errors';
import {
  IAITutorPort,
  ICommandPort,
  IClockPort,
  IConversationRepositoryPort,
  IVocabularyRepositoryPort,
} from '@application/ports';
import { VocabularyItem } from '@domain/entities';
import { ConversationNotActiveException } from '@domain/exceptions';
import {
  ConversationId,
  Lexeme,
  MessageId,
  MessageRef,
  UserId,
  VocabularyItemId,
  VocabularyOrigin,
  vocabularyOriginFromRole,
} from '@domain/value-objects';

/**
 * CaptureVocabularyUseCase turns the lexemes found in one chat message into
 * vocabulary items of the conversation's owner.
 *
 * Each item is written on its own, so a conflict on one of them only replays
 * that item. Capturing the same message twice adds no second encounter.
 */
@Injectable()
export class CaptureVocabularyUseCase
  implements ICommandPort<CaptureVocabularyInputDto, CaptureVocabularyOutputDto>
{
  private readonly logger = new Logger(CaptureVocabularyUseCase.name);

  constructor(
    @Inject('IConversationRepository')
    private readonly conversationRepository: IConversationRepositoryPort,
    @Inject('IVocabularyRepository')
    private readonly vocabularyRepository: IVocabularyRepositoryPort,
    @Inject('IAITutor')
    private readonly aiTutor: IAITutorPort,
    @Inject('IClock')
    private readonly clock: IClockPort,
  ) {}

  async execute(
    input: CaptureVocabularyInputDto,
  ): Promise<Either<TutoringError, CaptureVocabularyOutputDto>> {
    return tryCatchAsync(async () => {
      const conversationId = ConversationId.fromString(input.conversationId);
      const messageId = MessageId.fromString(input.messageId);

      const conversation = await this.conversationRepository.findById(conversationId);
      if (!conversation) {
        throw new ConversationNotFoundError(input.conversationId);
      }
      if (conversation.status.isDeleted()) {
        throw new ConversationNotActiveException(
          conversation.id.toString(),
          conversation.status.value,
        );
      }
      const message = conversation.findMessage(messageId);
      if (!message) {
        throw new MessageNotFoundError(input.messageId);
      }

      const extracted = await this.aiTutor.extractVocabulary(
        message.content,
        conversation.languages.target,
      );
      const lexemes = this.uniqueByKey(extracted);
      const source = MessageRef.of(conversationId, messageId);
      const origin = vocabularyOriginFromRole(message.role);

      const itemIds: VocabularyItemId[] = [];
      for (const lexeme of lexemes) {
        itemIds.push(await this.captureLexeme(conversation.userId, lexeme, source, origin));
      }

      if (itemIds.length > 0) {
        await retryOnConflict(async () => {
          const current = await this.conversationRepository.findById(conversationId);
          if (!current) {
            throw new ConversationNotFoundError(input.conversationId);
          }
          current.linkVocabulary(messageId, itemIds);
          await this.conversationRepository.save(current);
        });
      }

      this.logger.debug(`Captured ${itemIds.length} lexemes from message ${source.toString()}`);
      return { vocabularyItemIds: itemIds.map((id) => id.toString()) };
    }, toTutoringError);
  }

  private async captureLexeme(
    userId: UserId,
    lexeme: Lexeme,
    source: MessageRef,
    origin: VocabularyOrigin,
  ): Promise<VocabularyItemId> {
    return retryOnConflict(async () => {
      const at = this.clock.now();
      const existing = await this.vocabularyRepository.findByLexeme(userId, lexeme);

      if (!existing) {
        const item = VocabularyItem.encounter({ userId, lexeme, source, origin, at });
        await this.vocabularyRepository.save(item);
        return item.id;
      }

      if (existing.recordEncounter(source, origin, at)) {
        await this.vocabularyRepository.save(existing);
      }
      return existing.id;
    });
  }

  private uniqueByKey(lexemes: readonly Lexeme[]): Lexeme[] {
    const byKey = new Map<string, Lexeme>();
    for (const lexeme of lexemes) {
      if (!byKey.has(lexeme.key)) {
        byKey.set(lexeme.key, lexeme);
      }
    }
    return [...byKey.values()];
  }
}
