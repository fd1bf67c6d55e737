import { ChatMessage, Conversation } from '@domain/entities';
import {
  ConversationId,
  ConversationStatus,
  LanguagePair,
  MessageId,
  Role,
  TutorProfile,
  UserId,
  VocabularyItemId,
} from '@domain/value-objects';
import { ConversationDocument, MessageDocument, TutorProfileDocument } from '../schemas';

/**
 * Mapper for converting between the Conversation aggregate and its MongoDB document.
 */
export class ConversationMapper {
  /**
   * Converts a MongoDB document to a domain Conversation entity.
   */
  static toDomain(document: ConversationDocument): Conversation {
    return Conversation.reconstitute({
      id: ConversationId.fromString(document._id),
      userId: UserId.fromString(document.userId),
      languages: LanguagePair.fromCodes(document.nativeLanguage, document.targetLanguage),
      title: document.title,
      tutorProfile: TutorProfile.create({
        creativity: document.tutorProfile.creativity,
        style: document.tutorProfile.style,
      }),
      status: ConversationStatus.fromString(document.status),
      messages: document.messages.map((msg) => this.messageToDomain(msg)),
      createdAt: document.createdAt,
      lastActivityAt: document.lastActivityAt,
    });
  }

  /**
   * Converts a domain Conversation entity to a MongoDB document.
   */
  static toDocument(conversation: Conversation): ConversationDocument {
    const document = new ConversationDocument();
    document._id = conversation.id.toString();
    document.userId = conversation.userId.toString();
    document.nativeLanguage = conversation.languages.native.code;
    document.targetLanguage = conversation.languages.target.code;
    document.title = conversation.title;
    document.tutorProfile = new TutorProfileDocument();
    document.tutorProfile.creativity = conversation.tutorProfile.creativity;
    document.tutorProfile.style = conversation.tutorProfile.style;
    document.status = conversation.status.value;
    document.messages = conversation.messages.map((msg) => this.messageToDocument(msg));
    document.createdAt = conversation.createdAt;
    document.lastActivityAt = conversation.lastActivityAt;
    return document;
  }

  private static messageToDomain(document: MessageDocument): ChatMessage {
    return ChatMessage.reconstitute({
      id: MessageId.fromString(document.messageId),
      role: Role.fromString(document.role),
      content: document.content,
      timestamp: document.timestamp,
      vocabularyRefs: document.vocabularyItemIds.map((id) => VocabularyItemId.fromString(id)),
    });
  }

  private static messageToDocument(message: ChatMessage): MessageDocument {
    const document = new MessageDocument();
    document.messageId = message.id.toString();
    document.role = message.role.value;
    document.content = message.content;
    document.timestamp = message.timestamp;
    document.vocabularyItemIds = message.vocabularyRefs.map((ref) => ref.toString());
    return document;
  }
}
