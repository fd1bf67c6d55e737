import { EntityId } from './entity-id.vo';

/**
 * Identifier of a chat message. Unique within its owning conversation.
 */
export class MessageId extends EntityId {
  readonly kind = 'MessageId';

  private constructor(value: string) {
    super(value, 'MessageId');
  }

  static fromString(id: string): MessageId {
    return new MessageId(id.trim());
  }

  static generate(): MessageId {
    return new MessageId(EntityId.newValue('msg'));
  }
}
