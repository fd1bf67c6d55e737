export { EntityId } from './entity-id.vo';
export { UserId } from './user-id.vo';
export { ConversationId } from './conversation-id.vo';
export { MessageId } from './message-id.vo';
export { VocabularyItemId } from './vocabulary-item-id.vo';
export { Language } from './language.vo';
export { LanguagePair } from './language-pair.vo';
export { CEFRLevel, CEFRToken } from './cefr-level.vo';
export { Role, RoleValue } from './role.vo';
export { ConversationStatus, ConversationStatusValue } from './conversation-status.vo';
export {
  TutorProfile,
  TutorProfileProps,
  GenerationStyle,
  CreativityLevel,
} from './tutor-profile.vo';
export { REVIEW_OUTCOMES, ReviewOutcome, parseReviewOutcome } from './review-outcome.vo';
export {
  VocabularyOrigin,
  vocabularyOriginFromRole,
  parseVocabularyOrigin,
} from './vocabulary-origin.vo';
export { MessageRef } from './message-ref.vo';
export * from './linguistics';
