import { ReviewRecord } from '@domain/entities';
import { ReviewOutcome } from '@domain/value-objects';
import { DEFAULT_REVIEW_POLICY, ReviewScheduler } from '@domain/services';
import { ValidationException } from '@domain/exceptions';

describe('ReviewScheduler', () => {
  const DAY_MS = 24 * 60 * 60 * 1000;
  const firstEncounteredAt = new Date('2024-03-01T00:00:00Z');
  const day = (n: number): Date => new Date(firstEncounteredAt.getTime() + n * DAY_MS);

  const history = (...outcomes: Array<[ReviewOutcome, number]>) => ({
    firstEncounteredAt,
    reviews: outcomes.map(
      ([outcome, reviewDay]): ReviewRecord => ({ outcome, reviewedAt: day(reviewDay) }),
    ),
  });

  let scheduler: ReviewScheduler;

  beforeEach(() => {
    scheduler = new ReviewScheduler();
  });

  it('should make a new item due one minimum interval after it was first seen', () => {
    const schedule = scheduler.schedule(history());

    expect(schedule).toEqual({
      masteryTier: 'new',
      intervalMs: DAY_MS,
      nextDueAt: day(1),
      correctStreak: 0,
    });
  });

  it('should double the interval after each correct answer', () => {
    const schedule = scheduler.schedule(history(['correct', 1], ['correct', 3]));

    expect(schedule.intervalMs).toBe(4 * DAY_MS);
    expect(schedule.nextDueAt).toEqual(day(7));
    expect(schedule.correctStreak).toBe(2);
    expect(schedule.masteryTier).toBe('reviewing');
  });

  it('should reset the interval and streak after an incorrect answer', () => {
    const schedule = scheduler.schedule(
      history(['correct', 1], ['correct', 3], ['incorrect', 7]),
    );

    expect(schedule.intervalMs).toBe(DAY_MS);
    expect(schedule.nextDueAt).toEqual(day(8));
    expect(schedule.correctStreak).toBe(0);
    expect(schedule.masteryTier).toBe('learning');
  });

  it('should keep the interval but postpone a skipped item', () => {
    const schedule = scheduler.schedule(history(['correct', 1], ['skipped', 2]));

    expect(schedule.intervalMs).toBe(2 * DAY_MS);
    expect(schedule.nextDueAt).toEqual(day(3));
    expect(schedule.correctStreak).toBe(1);
  });

  it('should call an item mastered after the required streak', () => {
    const schedule = scheduler.schedule(
      history(['correct', 1], ['correct', 3], ['correct', 7], ['correct', 15]),
    );

    expect(schedule.masteryTier).toBe('mastered');
    expect(schedule.intervalMs).toBe(16 * DAY_MS);
    expect(schedule.nextDueAt).toEqual(day(31));
  });

  it('should cap the interval', () => {
    const capped = new ReviewScheduler({ ...DEFAULT_REVIEW_POLICY, maxIntervalMs: 3 * DAY_MS });

    const schedule = capped.schedule(history(['correct', 1], ['correct', 3], ['correct', 6]));

    expect(schedule.intervalMs).toBe(3 * DAY_MS);
    expect(schedule.nextDueAt).toEqual(day(9));
  });

  it('should derive the same schedule from the same history', () => {
    const reviews = history(['correct', 1], ['incorrect', 2], ['correct', 4]);

    expect(scheduler.schedule(reviews)).toEqual(scheduler.schedule(reviews));
  });

  describe('isDue', () => {
    it('should be due exactly at the next due date', () => {
      expect(scheduler.isDue(history(), day(1))).toBe(true);
      expect(scheduler.isDue(history(), new Date(day(1).getTime() - 1))).toBe(false);
    });
  });

  describe('policy validation', () => {
    it('should reject a non-positive minimum interval', () => {
      expect(() => new ReviewScheduler({ ...DEFAULT_REVIEW_POLICY, minIntervalMs: 0 })).toThrow(
        ValidationException,
      );
    });

    it('should reject a growth factor below 1', () => {
      expect(() => new ReviewScheduler({ ...DEFAULT_REVIEW_POLICY, growthFactor: 0.5 })).toThrow(
        'Invalid ReviewPolicy: growth factor must be at least 1',
      );
    });

    it('should reject a maximum below the minimum', () => {
      expect(
        () => new ReviewScheduler({ ...DEFAULT_REVIEW_POLICY, maxIntervalMs: DAY_MS / 2 }),
      ).toThrow(ValidationException);
    });
  });
});
