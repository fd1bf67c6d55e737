import {
  ConversationNotActiveException,
  ValidationException,
} from '../exceptions';
import {
  ConversationId,
  ConversationStatus,
  LanguagePair,
  MessageId,
  Role,
  TutorProfile,
  UserId,
  VocabularyItemId,
} from '../value-objects';
import { ChatMessage } from './chat-message.entity';

/**
 * Aggregate root for a tutoring conversation between a learner and the AI tutor.
 *
 * Owns its ChatMessage sequence exclusively. Messages are append-only and
 * their timestamps never go backwards; only an active conversation accepts
 * new messages. Archiving and deleting are soft: history is kept.
 */
export class Conversation {
  static readonly DEFAULT_TITLE = 'New conversation';
  static readonly MAX_TITLE_LENGTH = 100;

  private constructor(
    public readonly id: ConversationId,
    public readonly userId: UserId,
    public readonly languages: LanguagePair,
    private _title: string,
    private _tutorProfile: TutorProfile,
    private _status: ConversationStatus,
    private _messages: ChatMessage[],
    public readonly createdAt: Date,
    private _lastActivityAt: Date,
  ) {}

  static start(props: {
    userId: UserId;
    languages: LanguagePair;
    now: Date;
    tutorProfile?: TutorProfile;
    title?: string;
    id?: ConversationId;
  }): Conversation {
    return new Conversation(
      props.id ?? ConversationId.generate(),
      props.userId,
      props.languages,
      Conversation.normalizeTitle(props.title ?? Conversation.DEFAULT_TITLE),
      props.tutorProfile ?? TutorProfile.default(),
      ConversationStatus.active(),
      [],
      props.now,
      props.now,
    );
  }

  static reconstitute(props: {
    id: ConversationId;
    userId: UserId;
    languages: LanguagePair;
    title: string;
    tutorProfile: TutorProfile;
    status: ConversationStatus;
    messages: ChatMessage[];
    createdAt: Date;
    lastActivityAt: Date;
  }): Conversation {
    return new Conversation(
      props.id,
      props.userId,
      props.languages,
      props.title,
      props.tutorProfile,
      props.status,
      [...props.messages],
      props.createdAt,
      props.lastActivityAt,
    );
  }

  private static normalizeTitle(title: string): string {
    const trimmed = title.trim();
    if (trimmed.length === 0) {
      throw new ValidationException('Conversation', 'title cannot be empty');
    }
    if (trimmed.length > Conversation.MAX_TITLE_LENGTH) {
      throw new ValidationException(
        'Conversation',
        `title cannot exceed ${Conversation.MAX_TITLE_LENGTH} characters`,
      );
    }
    return trimmed;
  }

  get title(): string {
    return this._title;
  }

  get tutorProfile(): TutorProfile {
    return this._tutorProfile;
  }

  get status(): ConversationStatus {
    return this._status;
  }

  get messages(): readonly ChatMessage[] {
    return [...this._messages];
  }

  get messageCount(): number {
    return this._messages.length;
  }

  get lastActivityAt(): Date {
    return this._lastActivityAt;
  }

  get lastMessage(): ChatMessage | null {
    return this._messages.length > 0 ? this._messages[this._messages.length - 1] : null;
  }

  /**
   * Throws ConversationNotActiveException unless a message could be appended now.
   * Lets callers fail before doing expensive work (e.g. calling the tutor).
   */
  ensureAcceptsMessages(): void {
    if (!this._status.acceptsMessages()) {
      throw new ConversationNotActiveException(this.id.toString(), this._status.value);
    }
  }

  appendMessage(props: { role: Role; content: string; at: Date }): ChatMessage {
    this.ensureAcceptsMessages();

    if (props.at.getTime() < this.createdAt.getTime()) {
      throw new ValidationException('ChatMessage', 'timestamp precedes conversation start');
    }
    const previous = this.lastMessage;
    if (previous && props.at.getTime() < previous.timestamp.getTime()) {
      throw new ValidationException('ChatMessage', 'timestamp precedes the previous message');
    }

    const message = ChatMessage.create({
      role: props.role,
      content: props.content,
      timestamp: props.at,
    });
    this._messages.push(message);
    this.touch(props.at);
    return message;
  }

  archive(at: Date): void {
    this._status = this._status.transitionTo(ConversationStatus.archived());
    this.touch(at);
  }

  reactivate(at: Date): void {
    this._status = this._status.transitionTo(ConversationStatus.active());
    this.touch(at);
  }

  delete(at: Date): void {
    this._status = this._status.transitionTo(ConversationStatus.deleted());
    this.touch(at);
  }

  // Replaces the profile wholesale; TutorProfile itself is immutable
  changeTutorProfile(profile: TutorProfile, at: Date): void {
    this.ensureNotDeleted();
    this._tutorProfile = profile;
    this.touch(at);
  }

  rename(title: string, at: Date): void {
    this.ensureNotDeleted();
    this._title = Conversation.normalizeTitle(title);
    this.touch(at);
  }

  /**
   * Records which vocabulary items were extracted from one of this conversation's messages.
   */
  linkVocabulary(messageId: MessageId, itemIds: readonly VocabularyItemId[]): void {
    this.ensureNotDeleted();
    const message = this.findMessage(messageId);
    if (!message) {
      throw new ValidationException(
        'Conversation',
        `message "${messageId.toString()}" does not belong to this conversation`,
      );
    }
    message.attachVocabulary(itemIds);
  }

  findMessage(messageId: MessageId): ChatMessage | null {
    return this._messages.find((message) => message.id.equals(messageId)) ?? null;
  }

  // Get the last N messages (AI context window)
  getRecentMessages(count: number): readonly ChatMessage[] {
    const start = Math.max(0, this._messages.length - Math.max(0, count));
    return this._messages.slice(start);
  }

  isEmpty(): boolean {
    return this._messages.length === 0;
  }

  // Entity equality
  equals(other: Conversation): boolean {
    return this.id.equals(other.id);
  }

  toSummary(): string {
    return `Conversation ${this.id.toString()} "${this._title}" - ${this._status.value}, ${
      this._messages.length
    } messages`;
  }

  private ensureNotDeleted(): void {
    if (this._status.isDeleted()) {
      throw new ConversationNotActiveException(this.id.toString(), this._status.value);
    }
  }

  // Last activity never moves backwards
  private touch(at: Date): void {
    if (at.getTime() > this._lastActivityAt.getTime()) {
      this._lastActivityAt = at;
    }
  }
}
