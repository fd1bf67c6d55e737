import { Conversation, User, VocabularyItem } from '@domain/entities';
import { ReviewScheduler } from '@domain/services';
import {
  ConversationReadModel,
  ConversationSummaryReadModel,
  LearnerProfileReadModel,
  VocabularyReadModel,
} from '@application/dtos';
import { LexemeMapper } from './lexeme.mapper';

/**
 * Projections from aggregates to the read models queries return.
 */
export class ReadModelMapper {
  static toLearnerProfile(user: User): LearnerProfileReadModel {
    return {
      userId: user.id.toString(),
      nativeLanguage: user.nativeLanguage.code,
      targetLanguage: user.targetLanguage.code,
      level: user.currentLevel.value,
      levelDescription: user.currentLevel.description,
      proficiencies: user.proficiencies.map((proficiency) => ({
        language: proficiency.language.code,
        level: proficiency.level.value,
      })),
      createdAt: user.createdAt,
      updatedAt: user.updatedAt,
    };
  }

  static toConversationSummary(conversation: Conversation): ConversationSummaryReadModel {
    return {
      conversationId: conversation.id.toString(),
      title: conversation.title,
      status: conversation.status.value,
      messageCount: conversation.messageCount,
      createdAt: conversation.createdAt,
      lastActivityAt: conversation.lastActivityAt,
    };
  }

  static toConversation(conversation: Conversation, limit?: number): ConversationReadModel {
    const messages =
      limit === undefined ? conversation.messages : conversation.getRecentMessages(limit);

    return {
      conversationId: conversation.id.toString(),
      userId: conversation.userId.toString(),
      title: conversation.title,
      status: conversation.status.value,
      nativeLanguage: conversation.languages.native.code,
      targetLanguage: conversation.languages.target.code,
      tutorProfile: {
        creativity: conversation.tutorProfile.creativity,
        creativityLevel: conversation.tutorProfile.creativityLevel,
        style: conversation.tutorProfile.style,
      },
      messages: messages.map((message) => ({
        messageId: message.id.toString(),
        role: message.role.value,
        content: message.content,
        timestamp: message.timestamp,
        vocabularyItemIds: message.vocabularyRefs.map((ref) => ref.toString()),
      })),
      messageCount: conversation.messageCount,
      createdAt: conversation.createdAt,
      lastActivityAt: conversation.lastActivityAt,
    };
  }

  static toVocabulary(item: VocabularyItem, scheduler: ReviewScheduler): VocabularyReadModel {
    const schedule = scheduler.schedule(item);
    return {
      vocabularyItemId: item.id.toString(),
      surfaceForm: item.lexeme.surfaceForm,
      lemma: item.lexeme.lemma.term,
      partOfSpeech: item.lexeme.lemma.partOfSpeech,
      language: item.lexeme.language.code,
      morphology: LexemeMapper.morphologyToDto(item.lexeme.morphology),
      masteryTier: schedule.masteryTier,
      intervalMs: schedule.intervalMs,
      nextDueAt: schedule.nextDueAt,
      reviewCount: item.reviews.length,
      lastReviewedAt: item.lastReviewedAt,
      firstEncounteredAt: item.firstEncounteredAt,
    };
  }
}
