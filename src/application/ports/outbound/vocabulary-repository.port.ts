import { VocabularyItem } from '@domain/entities';
import { Lexeme, UserId } from '@domain/value-objects';

export interface IVocabularyRepositoryPort {
  /**
   * Finds the learner's item for a lexeme (matched on `Lexeme.key`).
   *
   * @returns the item if the learner has met this lexeme, null otherwise
   */
  findByLexeme(userId: UserId, lexeme: Lexeme): Promise<VocabularyItem | null>;

  /**
   * Persists an item. Rejects with ConflictError on a concurrent write.
   */
  save(item: VocabularyItem): Promise<void>;

  /**
   * Items whose review schedule is due at `asOf`, computed from their history.
   */
  listDue(userId: UserId, asOf: Date): Promise<VocabularyItem[]>;

  listByUser(userId: UserId): Promise<VocabularyItem[]>;
}

// Read-only view handed to queries
export type IVocabularyReaderPort = Pick<IVocabularyRepositoryPort, 'findByLexeme' | 'listDue' | 'listByUser'>;
