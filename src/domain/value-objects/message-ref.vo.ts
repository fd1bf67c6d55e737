import { ConversationId } from './conversation-id.vo';
import { MessageId } from './message-id.vo';

/**
 * Points at a chat message from outside its conversation aggregate.
 */
export class MessageRef {
  private constructor(
    public readonly conversationId: ConversationId,
    public readonly messageId: MessageId,
  ) {}

  static of(conversationId: ConversationId, messageId: MessageId): MessageRef {
    return new MessageRef(conversationId, messageId);
  }

  equals(other: MessageRef): boolean {
    return this.conversationId.equals(other.conversationId) && this.messageId.equals(other.messageId);
  }

  toString(): string {
    return `${this.conversationId.toString()}/${this.messageId.toString()}`;
  }
}
