/**
 * DTOs for learner use cases.
 */

export interface RegisterUserInputDto {
  readonly nativeLanguage: string;
  readonly targetLanguage: string;
  /** Starting CEFR level; A1 when omitted */
  readonly level?: string;
}

export interface RegisterUserOutputDto {
  readonly userId: string;
}

export interface ReassessProficiencyInputDto {
  readonly userId: string;
  readonly level: string;
}

export interface UpdateLearnerLanguagesInputDto {
  readonly userId: string;
  readonly nativeLanguage?: string;
  readonly targetLanguage?: string;
  /** Level to start at when the new target language was never studied */
  readonly level?: string;
}

export interface GetLearnerProfileInputDto {
  readonly userId: string;
}

export interface ProficiencyReadModel {
  readonly language: string;
  readonly level: string;
}

/**
 * Read model of a learner.
 */
export interface LearnerProfileReadModel {
  readonly userId: string;
  readonly nativeLanguage: string;
  readonly targetLanguage: string;
  readonly level: string;
  readonly levelDescription: string;
  readonly proficiencies: ProficiencyReadModel[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
}
