/**
 * DTOs for vocabulary use cases.
 */

export interface MorphologyInputDto {
  readonly gender?: string;
  readonly number?: string;
  readonly tense?: string;
  readonly person?: number;
}

/**
 * A lexeme as described by a caller: the word as written plus its dictionary form.
 */
export interface LexemeInputDto {
  readonly surfaceForm: string;
  readonly lemma: string;
  readonly partOfSpeech: string;
  readonly language: string;
  readonly morphology?: MorphologyInputDto;
}

export interface CaptureVocabularyInputDto {
  readonly conversationId: string;
  readonly messageId: string;
}

export interface CaptureVocabularyOutputDto {
  readonly vocabularyItemIds: string[];
}

export interface RecordVocabularyReviewInputDto {
  readonly userId: string;
  readonly lexeme: LexemeInputDto;
  readonly outcome: string;
}

export interface GetDueVocabularyInputDto {
  readonly userId: string;
  /** Defaults to the current time */
  readonly asOf?: Date;
}

export interface ListVocabularyInputDto {
  readonly userId: string;
}

export interface VocabularyReadModel {
  readonly vocabularyItemId: string;
  readonly surfaceForm: string;
  readonly lemma: string;
  readonly partOfSpeech: string;
  readonly language: string;
  readonly morphology: MorphologyInputDto;
  readonly masteryTier: string;
  readonly intervalMs: number;
  readonly nextDueAt: Date;
  readonly reviewCount: number;
  readonly lastReviewedAt: Date | null;
  readonly firstEncounteredAt: Date;
}
