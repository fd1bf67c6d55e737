import {
  CaptureVocabularyUseCase,
  GetDueVocabularyUseCase,
  ListVocabularyUseCase,
  RecordVocabularyReviewUseCase,
} from '@application/use-cases';
import {
  IAITutorPort,
  IClockPort,
  IConversationRepositoryPort,
  IVocabularyRepositoryPort,
} from '@application/ports';
import {
  ConflictError,
  ConversationNotFoundError,
  MessageNotFoundError,
  ProviderError,
} from '@application/errors';
import { TutoringOptions } from '@application/common';
import { Conversation, VocabularyItem } from '@domain/entities';
import {
  ConversationId,
  Language,
  LanguagePair,
  Lemma,
  Lexeme,
  MessageId,
  MessageRef,
  Role,
  UserId,
  VocabularyItemId,
} from '@domain/value-objects';
import { DEFAULT_REVIEW_POLICY } from '@domain/services';
import {
  ConversationNotActiveException,
  InvalidReviewOutcomeException,
  ValidationException,
} from '@domain/exceptions';

describe('Vocabulary use cases', () => {
  let mockConversationRepository: jest.Mocked<IConversationRepositoryPort>;
  let mockVocabularyRepository: jest.Mocked<IVocabularyRepositoryPort>;
  let mockAITutor: jest.Mocked<IAITutorPort>;
  let mockClock: jest.Mocked<IClockPort>;

  const DAY_MS = 24 * 60 * 60 * 1000;
  const startedAt = new Date('2024-03-01T10:00:00Z');
  const now = new Date('2024-03-01T10:30:00Z');
  const options: TutoringOptions = { contextWindow: 20, reviewPolicy: DEFAULT_REVIEW_POLICY };
  const spanish = Language.fromCode('es');

  // ============ Test Helpers ============

  const lexeme = (surfaceForm: string, lemma: string, partOfSpeech: 'noun' | 'verb' = 'noun') =>
    Lexeme.create(surfaceForm, Lemma.create(lemma, partOfSpeech, spanish));

  const createConversationWithMessage = (): { conversation: Conversation; messageId: string } => {
    const conversation = Conversation.start({
      id: ConversationId.fromString('conv_test'),
      userId: UserId.fromString('usr_test'),
      languages: LanguagePair.fromCodes('en', 'es'),
      now: startedAt,
    });
    const message = conversation.appendMessage({
      role: Role.user(),
      content: 'Quiero comprar dos casas',
      at: startedAt,
    });
    return { conversation, messageId: message.id.toString() };
  };

  const createItem = (
    id: string,
    firstSeen: Date,
    source = MessageRef.of(ConversationId.fromString('conv_old'), MessageId.fromString('msg_old')),
  ): VocabularyItem =>
    VocabularyItem.encounter({
      id: VocabularyItemId.fromString(id),
      userId: UserId.fromString('usr_test'),
      lexeme: lexeme('casas', 'casa'),
      source,
      origin: 'tutor',
      at: firstSeen,
    });

  // ============ Setup ============

  beforeEach(() => {
    mockConversationRepository = { save: jest.fn(), findById: jest.fn(), listByUser: jest.fn() };
    mockVocabularyRepository = {
      save: jest.fn(),
      findByLexeme: jest.fn(),
      listDue: jest.fn(),
      listByUser: jest.fn(),
    };
    mockAITutor = { generateReply: jest.fn(), extractVocabulary: jest.fn() };
    mockClock = { now: jest.fn().mockReturnValue(now) };
  });

  // ============ Tests ============

  describe('CaptureVocabularyUseCase', () => {
    let useCase: CaptureVocabularyUseCase;

    beforeEach(() => {
      useCase = new CaptureVocabularyUseCase(
        mockConversationRepository,
        mockVocabularyRepository,
        mockAITutor,
        mockClock,
      );
    });

    it('should create new items, extend known ones and link them to the message', async () => {
      // Arrange
      const { conversation, messageId } = createConversationWithMessage();
      const known = createItem('voc_casa', startedAt);
      mockConversationRepository.findById.mockResolvedValue(conversation);
      mockAITutor.extractVocabulary.mockResolvedValue([
        lexeme('casas', 'casa'),
        lexeme('comprar', 'comprar', 'verb'),
        lexeme('casas', 'casa'),
      ]);
      mockVocabularyRepository.findByLexeme.mockImplementation(async (_userId, found) =>
        found.lemma.term === 'casa' ? known : null,
      );

      // Act
      const result = await useCase.execute({ conversationId: 'conv_test', messageId });

      // Assert
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value.vocabularyItemIds).toHaveLength(2);
        expect(result.value.vocabularyItemIds[0]).toBe('voc_casa');
      }
      expect(mockAITutor.extractVocabulary).toHaveBeenCalledWith(
        'Quiero comprar dos casas',
        LanguagePair.fromCodes('en', 'es').target,
      );
      expect(known.encounters).toHaveLength(2);
      expect(known.encounters[1].origin).toBe('learner');
      expect(mockVocabularyRepository.save).toHaveBeenCalledTimes(2);
      const created = mockVocabularyRepository.save.mock.calls[1][0];
      expect(created.lexeme.lemma.term).toBe('comprar');
      expect(created.firstEncounteredAt).toEqual(now);
      expect(
        conversation.findMessage(MessageId.fromString(messageId))?.vocabularyRefs.map((ref) =>
          ref.toString(),
        ),
      ).toEqual(['voc_casa', created.id.toString()]);
      expect(mockConversationRepository.save).toHaveBeenCalledWith(conversation);
    });

    it('should not add a second encounter when the same message is captured again', async () => {
      // Arrange
      const { conversation, messageId } = createConversationWithMessage();
      const source = MessageRef.of(
        ConversationId.fromString('conv_test'),
        MessageId.fromString(messageId),
      );
      const known = createItem('voc_casa', startedAt, source);
      mockConversationRepository.findById.mockResolvedValue(conversation);
      mockAITutor.extractVocabulary.mockResolvedValue([lexeme('casas', 'casa')]);
      mockVocabularyRepository.findByLexeme.mockResolvedValue(known);

      // Act
      const result = await useCase.execute({ conversationId: 'conv_test', messageId });

      // Assert
      expect(result.isRight()).toBe(true);
      expect(known.encounters).toHaveLength(1);
      expect(mockVocabularyRepository.save).not.toHaveBeenCalled();
    });

    it('should save nothing when no lexemes were found', async () => {
      const { conversation, messageId } = createConversationWithMessage();
      mockConversationRepository.findById.mockResolvedValue(conversation);
      mockAITutor.extractVocabulary.mockResolvedValue([]);

      const result = await useCase.execute({ conversationId: 'conv_test', messageId });

      expect(result.isRight() && result.value.vocabularyItemIds).toEqual([]);
      expect(mockConversationRepository.save).not.toHaveBeenCalled();
    });

    it('should retry a lexeme whose item was created concurrently', async () => {
      // Arrange
      const { conversation, messageId } = createConversationWithMessage();
      const createdElsewhere = createItem('voc_casa', startedAt);
      mockConversationRepository.findById.mockResolvedValue(conversation);
      mockAITutor.extractVocabulary.mockResolvedValue([lexeme('casas', 'casa')]);
      mockVocabularyRepository.findByLexeme
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce(createdElsewhere);
      mockVocabularyRepository.save
        .mockRejectedValueOnce(new ConflictError('VocabularyItem', 'usr_test'))
        .mockResolvedValueOnce(undefined);

      // Act
      const result = await useCase.execute({ conversationId: 'conv_test', messageId });

      // Assert
      expect(result.isRight() && result.value.vocabularyItemIds).toEqual(['voc_casa']);
      expect(createdElsewhere.encounters).toHaveLength(2);
    });

    it('should return MessageNotFoundError for a message of another conversation', async () => {
      const { conversation } = createConversationWithMessage();
      mockConversationRepository.findById.mockResolvedValue(conversation);

      const result = await useCase.execute({ conversationId: 'conv_test', messageId: 'msg_other' });

      expect(result.isLeft() && result.value instanceof MessageNotFoundError).toBe(true);
      expect(mockAITutor.extractVocabulary).not.toHaveBeenCalled();
    });

    it('should return ConversationNotFoundError for an unknown conversation', async () => {
      mockConversationRepository.findById.mockResolvedValue(null);

      const result = await useCase.execute({ conversationId: 'conv_missing', messageId: 'msg_1' });

      expect(result.isLeft() && result.value instanceof ConversationNotFoundError).toBe(true);
    });

    it('should refuse a deleted conversation', async () => {
      const { conversation, messageId } = createConversationWithMessage();
      conversation.delete(now);
      mockConversationRepository.findById.mockResolvedValue(conversation);

      const result = await useCase.execute({ conversationId: 'conv_test', messageId });

      expect(result.isLeft() && result.value instanceof ConversationNotActiveException).toBe(true);
    });

    it('should pass extraction failures through', async () => {
      const { conversation, messageId } = createConversationWithMessage();
      const failure = new ProviderError('Anthropic', 'no vocabulary was recorded');
      mockConversationRepository.findById.mockResolvedValue(conversation);
      mockAITutor.extractVocabulary.mockRejectedValue(failure);

      const result = await useCase.execute({ conversationId: 'conv_test', messageId });

      expect(result.isLeft() && result.value).toBe(failure);
      expect(mockVocabularyRepository.save).not.toHaveBeenCalled();
    });
  });

  describe('RecordVocabularyReviewUseCase', () => {
    let useCase: RecordVocabularyReviewUseCase;
    const input = {
      userId: 'usr_test',
      lexeme: { surfaceForm: 'casas', lemma: 'casa', partOfSpeech: 'noun', language: 'es' },
      outcome: 'correct',
    };

    beforeEach(() => {
      useCase = new RecordVocabularyReviewUseCase(mockVocabularyRepository, mockClock);
    });

    it('should append the review and save the item', async () => {
      // Arrange
      const item = createItem('voc_casa', startedAt);
      mockVocabularyRepository.findByLexeme.mockResolvedValue(item);

      // Act
      const result = await useCase.execute(input);

      // Assert
      expect(result.isRight()).toBe(true);
      expect(item.reviews).toEqual([{ outcome: 'correct', reviewedAt: now }]);
      expect(mockVocabularyRepository.findByLexeme).toHaveBeenCalledWith(
        UserId.fromString('usr_test'),
        lexeme('casas', 'casa'),
      );
      expect(mockVocabularyRepository.save).toHaveBeenCalledWith(item);
    });

    it('should refuse a lexeme the learner never encountered', async () => {
      // Arrange
      mockVocabularyRepository.findByLexeme.mockResolvedValue(null);

      // Act
      const result = await useCase.execute(input);

      // Assert
      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(InvalidReviewOutcomeException);
        expect(result.value.message).toBe(
          'Cannot record review: "casas" has never been encountered',
        );
      }
      expect(mockVocabularyRepository.save).not.toHaveBeenCalled();
    });

    it('should reject an unknown outcome before loading anything', async () => {
      const result = await useCase.execute({ ...input, outcome: 'perfect' });

      expect(result.isLeft() && result.value instanceof ValidationException).toBe(true);
      expect(mockVocabularyRepository.findByLexeme).not.toHaveBeenCalled();
    });
  });

  describe('GetDueVocabularyUseCase', () => {
    let useCase: GetDueVocabularyUseCase;

    beforeEach(() => {
      useCase = new GetDueVocabularyUseCase(mockVocabularyRepository, mockClock, options);
    });

    it('should order due items by due date, then by id', async () => {
      // Arrange
      const early = new Date('2024-02-01T00:00:00Z');
      const late = new Date('2024-02-10T00:00:00Z');
      mockVocabularyRepository.listDue.mockResolvedValue([
        createItem('voc_c', late),
        createItem('voc_b', early),
        createItem('voc_a', early),
      ]);

      // Act
      const result = await useCase.execute({ userId: 'usr_test' });

      // Assert
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value.map((item) => item.vocabularyItemId)).toEqual([
          'voc_a',
          'voc_b',
          'voc_c',
        ]);
        expect(result.value[0].nextDueAt).toEqual(new Date(early.getTime() + DAY_MS));
        expect(result.value[0].masteryTier).toBe('new');
      }
      expect(mockVocabularyRepository.listDue).toHaveBeenCalledWith(
        UserId.fromString('usr_test'),
        now,
      );
    });

    it('should use the given point in time', async () => {
      const asOf = new Date('2024-06-01T00:00:00Z');
      mockVocabularyRepository.listDue.mockResolvedValue([]);

      await useCase.execute({ userId: 'usr_test', asOf });

      expect(mockVocabularyRepository.listDue).toHaveBeenCalledWith(
        UserId.fromString('usr_test'),
        asOf,
      );
      expect(mockVocabularyRepository.save).not.toHaveBeenCalled();
    });
  });

  describe('ListVocabularyUseCase', () => {
    it('should list items in the order they were first met', async () => {
      // Arrange
      const useCase = new ListVocabularyUseCase(mockVocabularyRepository, options);
      mockVocabularyRepository.listByUser.mockResolvedValue([
        createItem('voc_late', new Date('2024-02-10T00:00:00Z')),
        createItem('voc_early', new Date('2024-02-01T00:00:00Z')),
      ]);

      // Act
      const result = await useCase.execute({ userId: 'usr_test' });

      // Assert
      expect(result.isRight()).toBe(true);
      if (result.isRight()) {
        expect(result.value.map((item) => item.vocabularyItemId)).toEqual([
          'voc_early',
          'voc_late',
        ]);
        expect(result.value[0]).toMatchObject({
          surfaceForm: 'casas',
          lemma: 'casa',
          partOfSpeech: 'noun',
          language: 'es',
          morphology: {},
          reviewCount: 0,
          lastReviewedAt: null,
        });
      }
    });
  });
});
