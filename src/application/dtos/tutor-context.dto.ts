/**
 * What the AI tutor is told about a conversation when asked for a reply.
 */
export interface TutorContextMessageDto {
  readonly role: 'system' | 'user' | 'assistant';
  readonly content: string;
}

export interface TutorContextDto {
  readonly conversationId: string;
  readonly nativeLanguage: string;
  readonly targetLanguage: string;
  /** CEFR token of the learner in the target language */
  readonly learnerLevel: string;
  /** Oldest first; the last entry is the message being answered */
  readonly messages: TutorContextMessageDto[];
}
