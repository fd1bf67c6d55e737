import {
  UserMapper,
  VocabularyItemMapper,
} from '@infrastructure/adapters/persistence/mongodb/mappers';
import {
  EncounterDocument,
  LexemeDocument,
  MorphologyDocument,
  ProficiencyDocument,
  ReviewDocument,
  UserDocument,
  VocabularyItemDocument,
} from '@infrastructure/adapters/persistence/mongodb/schemas';
import { User, VocabularyItem } from '@domain/entities';
import {
  CEFRLevel,
  ConversationId,
  Language,
  Lemma,
  Lexeme,
  MessageId,
  MessageRef,
  Morphology,
  UserId,
  VocabularyItemId,
} from '@domain/value-objects';
import { ValidationException } from '@domain/exceptions';

describe('VocabularyItemMapper', () => {
  const createDocument = (outcome = 'correct'): VocabularyItemDocument => {
    const morphology = new MorphologyDocument();
    morphology.gender = 'feminine';
    morphology.number = 'plural';
    morphology.tense = null;
    morphology.person = null;

    const lexeme = new LexemeDocument();
    lexeme.surfaceForm = 'casas';
    lexeme.lemma = 'casa';
    lexeme.partOfSpeech = 'noun';
    lexeme.language = 'es';
    lexeme.morphology = morphology;

    const encounter = new EncounterDocument();
    encounter.conversationId = 'conv_test';
    encounter.messageId = 'msg_test';
    encounter.origin = 'tutor';
    encounter.encounteredAt = new Date('2024-03-01T10:00:00Z');

    const review = new ReviewDocument();
    review.outcome = outcome;
    review.reviewedAt = new Date('2024-03-02T10:00:00Z');

    const doc = new VocabularyItemDocument();
    doc._id = 'voc_casa';
    doc.userId = 'usr_test';
    doc.lexemeKey = 'es:casa:noun:casas:gender=feminine;number=plural';
    doc.lexeme = lexeme;
    doc.encounters = [encounter];
    doc.reviews = [review];
    doc.version = 2;
    return doc;
  };

  describe('toDomain', () => {
    it('should convert document to domain entity', () => {
      const item = VocabularyItemMapper.toDomain(createDocument());

      expect(item.id.toString()).toBe('voc_casa');
      expect(item.lexeme.key).toBe('es:casa:noun:casas:gender=feminine;number=plural');
      expect(item.encounters[0].source.toString()).toBe('conv_test/msg_test');
      expect(item.encounters[0].origin).toBe('tutor');
      expect(item.reviews).toEqual([
        { outcome: 'correct', reviewedAt: new Date('2024-03-02T10:00:00Z') },
      ]);
    });

    it('should reject an unknown review outcome', () => {
      expect(() => VocabularyItemMapper.toDomain(createDocument('maybe'))).toThrow(
        ValidationException,
      );
    });
  });

  describe('toDocument', () => {
    it('should store the lexeme key and null out missing tags', () => {
      // Arrange
      const item = VocabularyItem.encounter({
        id: VocabularyItemId.fromString('voc_comer'),
        userId: UserId.fromString('usr_test'),
        lexeme: Lexeme.create(
          'comí',
          Lemma.create('comer', 'verb', Language.fromCode('es')),
          Morphology.create({ tense: 'past', person: 1, number: 'singular' }),
        ),
        source: MessageRef.of(ConversationId.fromString('conv_test'), MessageId.fromString('msg_1')),
        origin: 'learner',
        at: new Date('2024-03-01T10:00:00Z'),
      });

      // Act
      const document = VocabularyItemMapper.toDocument(item);

      // Assert
      expect(document.lexemeKey).toBe('es:comer:verb:comí:number=singular;person=1;tense=past');
      expect(document.lexeme.morphology.gender).toBeNull();
      expect(document.lexeme.morphology.person).toBe(1);
      expect(document.encounters[0].origin).toBe('learner');
      expect(document.reviews).toEqual([]);
    });
  });
});

describe('UserMapper', () => {
  it('should keep every proficiency', () => {
    // Arrange
    const user = User.register({
      id: UserId.fromString('usr_test'),
      nativeLanguage: Language.fromCode('en'),
      targetLanguage: Language.fromCode('es'),
      level: CEFRLevel.fromString('B1'),
      now: new Date('2024-03-01T10:00:00Z'),
    });
    user.switchTargetLanguage(Language.fromCode('it'), new Date('2024-03-02T10:00:00Z'));

    // Act
    const document = UserMapper.toDocument(user);
    const restored = UserMapper.toDomain(document);

    // Assert
    expect(document.proficiencies.map((p) => `${p.language}:${p.level}`)).toEqual([
      'es:B1',
      'it:A1',
    ]);
    expect(restored.targetLanguage.code).toBe('it');
    expect(restored.levelFor(Language.fromCode('es'))?.value).toBe('B1');
    expect(restored.updatedAt).toEqual(new Date('2024-03-02T10:00:00Z'));
  });

  it('should convert document to domain entity', () => {
    const proficiency = new ProficiencyDocument();
    proficiency.language = 'de';
    proficiency.level = 'C1';
    const document = new UserDocument();
    document._id = 'usr_test';
    document.nativeLanguage = 'en';
    document.targetLanguage = 'de';
    document.proficiencies = [proficiency];
    document.version = 1;
    document.createdAt = new Date('2024-03-01T10:00:00Z');
    document.updatedAt = new Date('2024-03-01T10:00:00Z');

    const user = UserMapper.toDomain(document);

    expect(user.currentLevel.value).toBe('C1');
  });
});
