import { Conversation } from '@domain/entities';
import { ConversationId, ConversationStatus, UserId } from '@domain/value-objects';

export interface IConversationRepositoryPort {
  /**
   * Persists a conversation together with all of its messages.
   *
   * The load-mutate-save cycle is atomic per aggregate: if the stored
   * conversation changed since this instance was loaded, the promise rejects
   * with ConflictError and nothing is written.
   *
   * @param conversation - The conversation aggregate to save
   */
  save(conversation: Conversation): Promise<void>;

  /**
   * Retrieves a conversation by its unique identifier.
   *
   * @param id - The conversation's unique identifier
   * @returns Promise resolving to the conversation if found, null otherwise
   */
  findById(id: ConversationId): Promise<Conversation | null>;

  /**
   * Lists a learner's conversations.
   *
   * @param userId - Owner of the conversations
   * @param status - When given, only conversations in that status are returned
   */
  listByUser(userId: UserId, status?: ConversationStatus): Promise<Conversation[]>;
}

// Read-only view handed to queries
export type IConversationReaderPort = Pick<IConversationRepositoryPort, 'findById' | 'listByUser'>;
