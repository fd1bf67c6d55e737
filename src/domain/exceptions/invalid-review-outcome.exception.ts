import { DomainException } from './domain.exception';

/**
 * Thrown when a review cannot be recorded against a vocabulary item:
 * the learner never encountered it, or the review is out of order.
 */
export class InvalidReviewOutcomeException extends DomainException {
  constructor(reason: string) {
    super(`Cannot record review: ${reason}`, 'INVALID_REVIEW_OUTCOME');
  }
}
