import { VocabularyItem } from '@domain/entities';
import {
  ConversationId,
  Language,
  Lemma,
  Lexeme,
  MessageId,
  MessageRef,
  Morphology,
  UserId,
  VocabularyItemId,
  parsePartOfSpeech,
  parseReviewOutcome,
  parseVocabularyOrigin,
} from '@domain/value-objects';
import {
  EncounterDocument,
  LexemeDocument,
  MorphologyDocument,
  ReviewDocument,
  VocabularyItemDocument,
} from '../schemas';

export class VocabularyItemMapper {
  static toDomain(document: VocabularyItemDocument): VocabularyItem {
    return VocabularyItem.reconstitute({
      id: VocabularyItemId.fromString(document._id),
      userId: UserId.fromString(document.userId),
      lexeme: this.lexemeToDomain(document.lexeme),
      encounters: document.encounters.map((encounter) => ({
        source: MessageRef.of(
          ConversationId.fromString(encounter.conversationId),
          MessageId.fromString(encounter.messageId),
        ),
        origin: parseVocabularyOrigin(encounter.origin),
        encounteredAt: encounter.encounteredAt,
      })),
      reviews: document.reviews.map((review) => ({
        outcome: parseReviewOutcome(review.outcome),
        reviewedAt: review.reviewedAt,
      })),
    });
  }

  static toDocument(item: VocabularyItem): VocabularyItemDocument {
    const document = new VocabularyItemDocument();
    document._id = item.id.toString();
    document.userId = item.userId.toString();
    document.lexemeKey = item.lexeme.key;
    document.lexeme = this.lexemeToDocument(item.lexeme);
    document.encounters = item.encounters.map((encounter) => {
      const sub = new EncounterDocument();
      sub.conversationId = encounter.source.conversationId.toString();
      sub.messageId = encounter.source.messageId.toString();
      sub.origin = encounter.origin;
      sub.encounteredAt = encounter.encounteredAt;
      return sub;
    });
    document.reviews = item.reviews.map((review) => {
      const sub = new ReviewDocument();
      sub.outcome = review.outcome;
      sub.reviewedAt = review.reviewedAt;
      return sub;
    });
    return document;
  }

  private static lexemeToDomain(document: LexemeDocument): Lexeme {
    const lemma = Lemma.create(
      document.lemma,
      parsePartOfSpeech(document.partOfSpeech),
      Language.fromCode(document.language),
    );
    return Lexeme.create(document.surfaceForm, lemma, Morphology.create(document.morphology));
  }

  private static lexemeToDocument(lexeme: Lexeme): LexemeDocument {
    const morphology = new MorphologyDocument();
    morphology.gender = lexeme.morphology.gender ?? null;
    morphology.number = lexeme.morphology.number ?? null;
    morphology.tense = lexeme.morphology.tense ?? null;
    morphology.person = lexeme.morphology.person ?? null;

    const document = new LexemeDocument();
    document.surfaceForm = lexeme.surfaceForm;
    document.lemma = lexeme.lemma.term;
    document.partOfSpeech = lexeme.lemma.partOfSpeech;
    document.language = lexeme.language.code;
    document.morphology = morphology;
    return document;
  }
}
