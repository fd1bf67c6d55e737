import { ValidationException } from '../exceptions';

export const REVIEW_OUTCOMES = ['correct', 'incorrect', 'skipped'] as const;

export type ReviewOutcome = (typeof REVIEW_OUTCOMES)[number];

export function parseReviewOutcome(outcome: string): ReviewOutcome {
  const normalized = outcome.toLowerCase().trim();
  const parsed = REVIEW_OUTCOMES.find((candidate) => candidate === normalized);
  if (!parsed) {
    throw new ValidationException(
      'ReviewOutcome',
      `"${outcome}" is not valid. Valid outcomes: ${REVIEW_OUTCOMES.join(', ')}`,
    );
  }
  return parsed;
}
