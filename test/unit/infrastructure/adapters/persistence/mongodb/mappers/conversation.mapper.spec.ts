import { ConversationMapper } from '@infrastructure/adapters/persistence/mongodb/mappers';
import {
  ConversationDocument,
  MessageDocument,
  TutorProfileDocument,
} from '@infrastructure/adapters/persistence/mongodb/schemas';
import { Conversation } from '@domain/entities';
import {
  ConversationId,
  LanguagePair,
  Role,
  TutorProfile,
  UserId,
  VocabularyItemId,
} from '@domain/value-objects';
import { ValidationException } from '@domain/exceptions';

describe('ConversationMapper', () => {
  const createMessageDocument = (
    role: 'system' | 'user' | 'assistant',
    content: string,
    vocabularyItemIds: string[] = [],
  ): MessageDocument => {
    const doc = new MessageDocument();
    doc.messageId = `msg_${content.length}`;
    doc.role = role;
    doc.content = content;
    doc.timestamp = new Date('2024-03-01T10:01:00Z');
    doc.vocabularyItemIds = vocabularyItemIds;
    return doc;
  };

  const createConversationDocument = (
    overrides: Partial<{ status: string; messages: MessageDocument[]; targetLanguage: string }> = {},
  ): ConversationDocument => {
    const doc = new ConversationDocument();
    doc._id = 'conv_abc123';
    doc.userId = 'usr_test';
    doc.nativeLanguage = 'en';
    doc.targetLanguage = overrides.targetLanguage ?? 'es';
    doc.title = 'En el mercado';
    doc.tutorProfile = new TutorProfileDocument();
    doc.tutorProfile.creativity = 0.2;
    doc.tutorProfile.style = 'corrective';
    doc.status = overrides.status ?? 'archived';
    doc.messages = overrides.messages ?? [];
    doc.version = 3;
    doc.createdAt = new Date('2024-03-01T10:00:00Z');
    doc.lastActivityAt = new Date('2024-03-02T10:00:00Z');
    return doc;
  };

  describe('toDomain', () => {
    it('should convert document to domain entity', () => {
      // Arrange
      const document = createConversationDocument({
        messages: [createMessageDocument('user', 'Quiero manzanas', ['voc_manzana'])],
      });

      // Act
      const conversation = ConversationMapper.toDomain(document);

      // Assert
      expect(conversation.id.toString()).toBe('conv_abc123');
      expect(conversation.userId.toString()).toBe('usr_test');
      expect(conversation.languages.toString()).toBe('en->es');
      expect(conversation.title).toBe('En el mercado');
      expect(conversation.status.isArchived()).toBe(true);
      expect(conversation.tutorProfile.equals(TutorProfile.create({ creativity: 0.2, style: 'corrective' }))).toBe(true);
      expect(conversation.messages[0].role.isUser()).toBe(true);
      expect(conversation.messages[0].vocabularyRefs.map((ref) => ref.toString())).toEqual([
        'voc_manzana',
      ]);
      expect(conversation.lastActivityAt).toEqual(new Date('2024-03-02T10:00:00Z'));
    });

    it('should reject a document with an unknown status', () => {
      expect(() =>
        ConversationMapper.toDomain(createConversationDocument({ status: 'closed' })),
      ).toThrow(ValidationException);
    });

    it('should reject a document with the same native and target language', () => {
      expect(() =>
        ConversationMapper.toDomain(createConversationDocument({ targetLanguage: 'en' })),
      ).toThrow(ValidationException);
    });
  });

  describe('toDocument', () => {
    it('should convert domain entity to document', () => {
      // Arrange
      const conversation = Conversation.start({
        id: ConversationId.fromString('conv_abc123'),
        userId: UserId.fromString('usr_test'),
        languages: LanguagePair.fromCodes('en', 'fr'),
        now: new Date('2024-03-01T10:00:00Z'),
      });
      const message = conversation.appendMessage({
        role: Role.user(),
        content: 'Bonjour',
        at: new Date('2024-03-01T10:01:00Z'),
      });
      conversation.linkVocabulary(message.id, [VocabularyItemId.fromString('voc_bonjour')]);

      // Act
      const document = ConversationMapper.toDocument(conversation);

      // Assert
      expect(document._id).toBe('conv_abc123');
      expect(document.nativeLanguage).toBe('en');
      expect(document.targetLanguage).toBe('fr');
      expect(document.status).toBe('active');
      expect(document.tutorProfile.creativity).toBe(0.5);
      expect(document.tutorProfile.style).toBe('conversational');
      expect(document.messages).toHaveLength(1);
      expect(document.messages[0].messageId).toBe(message.id.toString());
      expect(document.messages[0].vocabularyItemIds).toEqual(['voc_bonjour']);
      expect(document.lastActivityAt).toEqual(new Date('2024-03-01T10:01:00Z'));
    });
  });

  it('should keep message ids and order across a round trip', () => {
    const document = createConversationDocument({
      status: 'active',
      messages: [createMessageDocument('user', 'Hola'), createMessageDocument('assistant', '¡Hola!')],
    });

    const restored = ConversationMapper.toDocument(ConversationMapper.toDomain(document));

    expect(restored.messages.map((message) => message.messageId)).toEqual(['msg_4', 'msg_6']);
    expect(restored.messages.map((message) => message.role)).toEqual(['user', 'assistant']);
  });
});
