import { ValidationException } from '../exceptions';
import { MessageId, Role, VocabularyItemId } from '../value-objects';

/**
 * A single message inside a conversation.
 * Messages have no lifecycle of their own: they are created and only
 * ever reached through their owning Conversation.
 */
export class ChatMessage {
  private constructor(
    public readonly id: MessageId,
    public readonly role: Role,
    public readonly content: string,
    public readonly timestamp: Date,
    private _vocabularyRefs: VocabularyItemId[],
  ) {
    this.validate();
  }

  static create(props: { role: Role; content: string; timestamp: Date; id?: MessageId }): ChatMessage {
    return new ChatMessage(
      props.id ?? MessageId.generate(),
      props.role,
      props.content,
      new Date(props.timestamp.getTime()),
      [],
    );
  }

  static reconstitute(props: {
    id: MessageId;
    role: Role;
    content: string;
    timestamp: Date;
    vocabularyRefs: VocabularyItemId[];
  }): ChatMessage {
    return new ChatMessage(props.id, props.role, props.content, props.timestamp, [
      ...props.vocabularyRefs,
    ]);
  }

  private validate(): void {
    if (!this.content || this.content.trim().length === 0) {
      throw new ValidationException('ChatMessage', 'content cannot be empty');
    }
    if (Number.isNaN(this.timestamp.getTime())) {
      throw new ValidationException('ChatMessage', 'timestamp is not a valid date');
    }
  }

  get vocabularyRefs(): readonly VocabularyItemId[] {
    return [...this._vocabularyRefs];
  }

  /**
   * Appends vocabulary references, skipping ids already linked.
   * Only the owning Conversation calls this.
   */
  attachVocabulary(itemIds: readonly VocabularyItemId[]): void {
    for (const itemId of itemIds) {
      if (!this._vocabularyRefs.some((existing) => existing.equals(itemId))) {
        this._vocabularyRefs.push(itemId);
      }
    }
  }

  equals(other: ChatMessage): boolean {
    return this.id.equals(other.id);
  }

  toString(): string {
    return `[${this.role.value}]: ${this.content}`;
  }
}
