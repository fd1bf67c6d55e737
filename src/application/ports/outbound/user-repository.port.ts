import { User } from '@domain/entities';
import { UserId } from '@domain/value-objects';

export interface IUserRepositoryPort {
  /**
   * Retrieves a learner by id.
   *
   * @returns the user if found, null otherwise
   */
  findById(id: UserId): Promise<User | null>;

  /**
   * Persists a learner, creating or updating it.
   * Rejects with ConflictError when the stored user changed since it was loaded.
   */
  save(user: User): Promise<void>;
}

// Read-only view handed to queries
export type IUserReaderPort = Pick<IUserRepositoryPort, 'findById'>;
