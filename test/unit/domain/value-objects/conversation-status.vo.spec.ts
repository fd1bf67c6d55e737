import { ConversationStatus } from '@domain/value-objects';
import { InvalidStateTransitionException, ValidationException } from '@domain/exceptions';

describe('ConversationStatus', () => {
  describe('transitions', () => {
    it('should allow archiving and deleting an active conversation', () => {
      const active = ConversationStatus.active();

      expect(active.canTransitionTo(ConversationStatus.archived())).toBe(true);
      expect(active.canTransitionTo(ConversationStatus.deleted())).toBe(true);
    });

    it('should allow reactivating and deleting an archived conversation', () => {
      const archived = ConversationStatus.archived();

      expect(archived.transitionTo(ConversationStatus.active()).isActive()).toBe(true);
      expect(archived.transitionTo(ConversationStatus.deleted()).isDeleted()).toBe(true);
    });

    it('should treat deleted as terminal', () => {
      const deleted = ConversationStatus.deleted();

      expect(() => deleted.transitionTo(ConversationStatus.active())).toThrow(
        InvalidStateTransitionException,
      );
      expect(() => deleted.transitionTo(ConversationStatus.archived())).toThrow(
        'Cannot transition conversation from "deleted" to "archived"',
      );
    });

    it('should reject transitions to the same status', () => {
      expect(() => ConversationStatus.active().transitionTo(ConversationStatus.active())).toThrow(
        InvalidStateTransitionException,
      );
    });
  });

  it('should only accept messages while active', () => {
    expect(ConversationStatus.active().acceptsMessages()).toBe(true);
    expect(ConversationStatus.archived().acceptsMessages()).toBe(false);
    expect(ConversationStatus.deleted().acceptsMessages()).toBe(false);
  });

  it('should parse statuses', () => {
    expect(ConversationStatus.fromString('Archived').value).toBe('archived');
    expect(() => ConversationStatus.fromString('closed')).toThrow(ValidationException);
  });
});
