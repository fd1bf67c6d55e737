/**
 * DOMAIN LAYER
 *
 * The language-tutoring model: learners, conversations with the AI tutor,
 * and the vocabulary a learner meets along the way.
 * This layer has NO external dependencies (no frameworks, no databases, no APIs).
 *
 * Contains:
 * - Entities: User, Conversation (owning ChatMessage), VocabularyItem
 * - Value Objects: Language, CEFRLevel, TutorProfile, Lexeme, identifiers, ...
 * - Exceptions: ValidationException, InvalidStateTransitionException, ...
 * - Services: ReviewScheduler (spaced-repetition policy)
 *
 * Rules:
 * - NO imports from application or infrastructure layers
 * - NO imports from external libraries
 * - Pure TypeScript only
 */

export * from './entities';
export * from './value-objects';
export * from './exceptions';
export * from './services';
