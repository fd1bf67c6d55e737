import { ConflictError } from '@application/errors';
import { AppLoggerService, RepositoryOperation } from '../../../../observability/logging';
import { AggregateVersionTracker, isDuplicateKeyError } from '../../aggregate-version-tracker';

/**
 * Shared plumbing of the MongoDB repositories: timing and logging of every
 * operation, and the versioned write that backs optimistic concurrency.
 */
export abstract class MongoRepository {
  protected readonly versions = new AggregateVersionTracker();

  protected constructor(
    private readonly appLogger: AppLoggerService,
    private readonly collection: string,
  ) {}

  protected async timed<T>(operation: RepositoryOperation, fn: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await fn();
      this.log(operation, startedAt, true);
      return result;
    } catch (error: unknown) {
      this.log(operation, startedAt, false, error instanceof Error ? error.message : String(error));
      throw error;
    }
  }

  /**
   * Inserts a new aggregate (expected version 0) or updates the stored one
   * only if it is still at the expected version. Either way, losing the race
   * raises ConflictError.
   */
  protected async writeVersioned(
    resource: string,
    id: string,
    expected: number,
    create: () => Promise<unknown>,
    update: () => Promise<{ matchedCount: number }>,
  ): Promise<void> {
    try {
      if (expected === 0) {
        await create();
        return;
      }
      const result = await update();
      if (result.matchedCount === 0) {
        throw new ConflictError(resource, id);
      }
    } catch (error: unknown) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError(resource, id);
      }
      throw error;
    }
  }

  private log(operation: RepositoryOperation, startedAt: number, success: boolean, error?: string): void {
    this.appLogger.logRepositoryOperation({
      driver: 'mongodb',
      collection: this.collection,
      operation,
      durationMs: Date.now() - startedAt,
      success,
      ...(error !== undefined && { error }),
    });
  }
}
