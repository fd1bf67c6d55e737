export { DomainException } from './domain.exception';
export { ValidationException } from './validation.exception';
export { InvalidStateTransitionException } from './invalid-state-transition.exception';
export { ConversationNotActiveException } from './conversation-not-active.exception';
export { InvalidReviewOutcomeException } from './invalid-review-outcome.exception';
