/**
 * DTOs for conversation use cases.
 */

export interface TutorProfileInputDto {
  /** 0 (strict) .. 1 (expressive) */
  readonly creativity?: number;
  readonly style?: string;
}

export interface StartConversationInputDto {
  readonly userId: string;
  readonly tutorProfile?: TutorProfileInputDto;
  readonly title?: string;
}

export interface StartConversationOutputDto {
  readonly conversationId: string;
}

export interface SendMessageInputDto {
  readonly conversationId: string;
  readonly role: string;
  readonly content: string;
}

export interface SendMessageOutputDto {
  readonly messageId: string;
  /** Set when the message came from the learner and the tutor answered */
  readonly replyMessageId: string | null;
  readonly reply: string | null;
}

/**
 * Input shared by archive, reactivate and delete.
 */
export interface ConversationLifecycleInputDto {
  readonly conversationId: string;
}

export interface ChangeTutorProfileInputDto extends TutorProfileInputDto {
  readonly conversationId: string;
}

export interface RenameConversationInputDto {
  readonly conversationId: string;
  readonly title: string;
}

export interface ListConversationsInputDto {
  readonly userId: string;
  /** When omitted, deleted conversations are left out */
  readonly status?: string;
}

export interface GetConversationInputDto {
  readonly conversationId: string;
  /** Keep only the last N messages */
  readonly limit?: number;
}

/**
 * Lightweight row for listing a learner's conversations.
 */
export interface ConversationSummaryReadModel {
  readonly conversationId: string;
  readonly title: string;
  readonly status: string;
  readonly messageCount: number;
  readonly createdAt: Date;
  readonly lastActivityAt: Date;
}

export interface MessageReadModel {
  readonly messageId: string;
  readonly role: string;
  readonly content: string;
  readonly timestamp: Date;
  readonly vocabularyItemIds: string[];
}

export interface TutorProfileReadModel {
  readonly creativity: number;
  readonly creativityLevel: string;
  readonly style: string;
}

export interface ConversationReadModel {
  readonly conversationId: string;
  readonly userId: string;
  readonly title: string;
  readonly status: string;
  readonly nativeLanguage: string;
  readonly targetLanguage: string;
  readonly tutorProfile: TutorProfileReadModel;
  readonly messages: MessageReadModel[];
  readonly messageCount: number;
  readonly createdAt: Date;
  readonly lastActivityAt: Date;
}
