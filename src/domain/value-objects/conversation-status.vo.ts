import { InvalidStateTransitionException, ValidationException } from '../exceptions';

export type ConversationStatusValue = 'active' | 'archived' | 'deleted';

/**
 * Value Object representing the lifecycle state of a conversation.
 * Conversations follow: active <-> archived, and either -> deleted (terminal).
 */
export class ConversationStatus {
  private static readonly VALID_STATUSES: readonly ConversationStatusValue[] = [
    'active',
    'archived',
    'deleted',
  ];

  private static readonly TRANSITIONS: Readonly<
    Record<ConversationStatusValue, readonly ConversationStatusValue[]>
  > = {
    active: ['archived', 'deleted'],
    archived: ['active', 'deleted'],
    deleted: [],
  };

  private constructor(public readonly value: ConversationStatusValue) {}

  // Factory methods for each status
  static active(): ConversationStatus {
    return new ConversationStatus('active');
  }

  static archived(): ConversationStatus {
    return new ConversationStatus('archived');
  }

  static deleted(): ConversationStatus {
    return new ConversationStatus('deleted');
  }

  static fromString(status: string): ConversationStatus {
    const normalized = status.toLowerCase().trim();
    const value = ConversationStatus.VALID_STATUSES.find((candidate) => candidate === normalized);
    if (!value) {
      throw new ValidationException(
        'ConversationStatus',
        `"${status}" is not valid. Valid statuses: ${ConversationStatus.VALID_STATUSES.join(', ')}`,
      );
    }
    return new ConversationStatus(value);
  }

  // Status checks
  isActive(): boolean {
    return this.value === 'active';
  }

  isArchived(): boolean {
    return this.value === 'archived';
  }

  isDeleted(): boolean {
    return this.value === 'deleted';
  }

  // Business rule: only active conversations take new messages
  acceptsMessages(): boolean {
    return this.isActive();
  }

  canTransitionTo(next: ConversationStatus): boolean {
    return ConversationStatus.TRANSITIONS[this.value].includes(next.value);
  }

  transitionTo(next: ConversationStatus): ConversationStatus {
    if (!this.canTransitionTo(next)) {
      throw new InvalidStateTransitionException('conversation', this.value, next.value);
    }
    return next;
  }

  equals(other: ConversationStatus): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
