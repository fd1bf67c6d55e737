import { ValidationException } from '../exceptions';
import { ReviewRecord } from '../entities';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Tunables of the spaced-repetition policy.
 */
export interface ReviewPolicy {
  readonly minIntervalMs: number;
  readonly growthFactor: number;
  readonly maxIntervalMs: number;
  // Consecutive correct answers needed to call an item mastered
  readonly masteryStreak: number;
}

export const DEFAULT_REVIEW_POLICY: ReviewPolicy = {
  minIntervalMs: DAY_MS,
  growthFactor: 2,
  maxIntervalMs: 120 * DAY_MS,
  masteryStreak: 4,
};

export type MasteryTier = 'new' | 'learning' | 'reviewing' | 'mastered';

/**
 * The part of a vocabulary item the schedule depends on.
 */
export interface ReviewHistory {
  readonly firstEncounteredAt: Date;
  readonly reviews: readonly ReviewRecord[];
}

export interface ReviewSchedule {
  readonly masteryTier: MasteryTier;
  readonly intervalMs: number;
  readonly nextDueAt: Date;
  readonly correctStreak: number;
}

/**
 * Domain Service deriving mastery and due dates from a review history.
 *
 * The history is the single source of truth: nothing here is stored, and the
 * same history always yields the same schedule.
 *
 * - correct: interval grows by `growthFactor`, capped at `maxIntervalMs`
 * - incorrect: interval resets to `minIntervalMs`
 * - skipped: interval kept, next review pushed `minIntervalMs` out
 */
export class ReviewScheduler {
  constructor(private readonly policy: ReviewPolicy = DEFAULT_REVIEW_POLICY) {
    this.validatePolicy();
  }

  private validatePolicy(): void {
    const { minIntervalMs, growthFactor, maxIntervalMs, masteryStreak } = this.policy;
    if (!(minIntervalMs > 0)) {
      throw new ValidationException('ReviewPolicy', 'minimum interval must be positive');
    }
    if (!(growthFactor >= 1)) {
      throw new ValidationException('ReviewPolicy', 'growth factor must be at least 1');
    }
    if (!(maxIntervalMs >= minIntervalMs)) {
      throw new ValidationException('ReviewPolicy', 'maximum interval must not be below minimum');
    }
    if (!Number.isInteger(masteryStreak) || masteryStreak < 1) {
      throw new ValidationException('ReviewPolicy', 'mastery streak must be a positive integer');
    }
  }

  schedule(history: ReviewHistory): ReviewSchedule {
    const { minIntervalMs, growthFactor, maxIntervalMs } = this.policy;

    let intervalMs = minIntervalMs;
    let nextDueAt = history.firstEncounteredAt.getTime() + minIntervalMs;
    let correctStreak = 0;

    for (const review of history.reviews) {
      const reviewedAt = review.reviewedAt.getTime();
      switch (review.outcome) {
        case 'correct':
          intervalMs = Math.min(Math.round(intervalMs * growthFactor), maxIntervalMs);
          correctStreak += 1;
          nextDueAt = reviewedAt + intervalMs;
          break;
        case 'incorrect':
          intervalMs = minIntervalMs;
          correctStreak = 0;
          nextDueAt = reviewedAt + minIntervalMs;
          break;
        case 'skipped':
          nextDueAt = reviewedAt + minIntervalMs;
          break;
      }
    }

    return {
      masteryTier: this.tierFor(history.reviews.length, correctStreak),
      intervalMs,
      nextDueAt: new Date(nextDueAt),
      correctStreak,
    };
  }

  isDue(history: ReviewHistory, asOf: Date): boolean {
    return asOf.getTime() >= this.schedule(history).nextDueAt.getTime();
  }

  private tierFor(reviewCount: number, correctStreak: number): MasteryTier {
    if (reviewCount === 0) return 'new';
    if (correctStreak === 0) return 'learning';
    if (correctStreak < this.policy.masteryStreak) return 'reviewing';
    return 'mastered';
  }
}
