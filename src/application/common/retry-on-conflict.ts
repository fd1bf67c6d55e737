import { ConflictError } from '../errors';

/**
 * Runs a load-mutate-save cycle, running it again from the start when the
 * repository reports a concurrent write. After `maxAttempts` the ConflictError
 * is surfaced to the caller.
 */
export async function retryOnConflict<T>(operation: () => Promise<T>, maxAttempts = 2): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof ConflictError) || attempt >= maxAttempts) {
        throw error;
      }
    }
  }
}
