import { InvalidReviewOutcomeException, ValidationException } from '../exceptions';
import {
  Lexeme,
  MessageRef,
  ReviewOutcome,
  UserId,
  VocabularyItemId,
  VocabularyOrigin,
} from '../value-objects';

export interface VocabularyEncounter {
  readonly source: MessageRef;
  readonly origin: VocabularyOrigin;
  readonly encounteredAt: Date;
}

export interface ReviewRecord {
  readonly outcome: ReviewOutcome;
  readonly reviewedAt: Date;
}

/**
 * Aggregate root for one lexeme a learner has met in a conversation.
 *
 * Both the encounter list and the review history are append-only. Mastery and
 * due dates are never stored here: they are derived from the review history by
 * the ReviewScheduler whenever they are needed.
 */
export class VocabularyItem {
  private constructor(
    public readonly id: VocabularyItemId,
    public readonly userId: UserId,
    public readonly lexeme: Lexeme,
    private _encounters: VocabularyEncounter[],
    private _reviews: ReviewRecord[],
  ) {}

  /**
   * Creates the item the first time the learner meets a lexeme.
   */
  static encounter(props: {
    userId: UserId;
    lexeme: Lexeme;
    source: MessageRef;
    origin: VocabularyOrigin;
    at: Date;
    id?: VocabularyItemId;
  }): VocabularyItem {
    return new VocabularyItem(
      props.id ?? VocabularyItemId.generate(),
      props.userId,
      props.lexeme,
      [{ source: props.source, origin: props.origin, encounteredAt: props.at }],
      [],
    );
  }

  static reconstitute(props: {
    id: VocabularyItemId;
    userId: UserId;
    lexeme: Lexeme;
    encounters: VocabularyEncounter[];
    reviews: ReviewRecord[];
  }): VocabularyItem {
    if (props.encounters.length === 0) {
      throw new ValidationException('VocabularyItem', 'an item needs at least one encounter');
    }
    return new VocabularyItem(props.id, props.userId, props.lexeme, [...props.encounters], [
      ...props.reviews,
    ]);
  }

  get encounters(): readonly VocabularyEncounter[] {
    return [...this._encounters];
  }

  get reviews(): readonly ReviewRecord[] {
    return [...this._reviews];
  }

  // Always present: an item cannot exist without its first encounter
  get firstEncounteredAt(): Date {
    return this._encounters[0].encounteredAt;
  }

  get lastReviewedAt(): Date | null {
    return this._reviews.length > 0 ? this._reviews[this._reviews.length - 1].reviewedAt : null;
  }

  /**
   * Records that the lexeme showed up again. Recording the same source message
   * twice is a no-op; returns whether a new encounter was added.
   */
  recordEncounter(source: MessageRef, origin: VocabularyOrigin, at: Date): boolean {
    if (this._encounters.some((encounter) => encounter.source.equals(source))) {
      return false;
    }
    const last = this._encounters[this._encounters.length - 1];
    if (at.getTime() < last.encounteredAt.getTime()) {
      throw new ValidationException('VocabularyItem', 'encounter precedes the previous one');
    }
    this._encounters.push({ source, origin, encounteredAt: at });
    return true;
  }

  recordReview(outcome: ReviewOutcome, at: Date): void {
    if (at.getTime() < this.firstEncounteredAt.getTime()) {
      throw new InvalidReviewOutcomeException('review precedes the first encounter');
    }
    const lastReviewedAt = this.lastReviewedAt;
    if (lastReviewedAt && at.getTime() < lastReviewedAt.getTime()) {
      throw new InvalidReviewOutcomeException('review precedes the previous review');
    }
    this._reviews.push({ outcome, reviewedAt: at });
  }

  equals(other: VocabularyItem): boolean {
    return this.id.equals(other.id);
  }
}
