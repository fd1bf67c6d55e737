import { DomainException } from './domain.exception';

export class ConversationNotActiveException extends DomainException {
  constructor(
    public readonly conversationId: string,
    public readonly status: string,
  ) {
    super(
      `Conversation "${conversationId}" is ${status} and does not accept changes`,
      'CONVERSATION_NOT_ACTIVE',
    );
  }
}
