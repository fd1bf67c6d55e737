import { EntityId } from './entity-id.vo';

/**
 * Identifier of a tutoring conversation.
 */
export class ConversationId extends EntityId {
  readonly kind = 'ConversationId';

  private constructor(value: string) {
    super(value, 'ConversationId');
  }

  static fromString(id: string): ConversationId {
    return new ConversationId(id.trim());
  }

  static generate(): ConversationId {
    return new ConversationId(EntityId.newValue('conv'));
  }
}
