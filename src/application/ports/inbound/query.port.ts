import { Either } from '@application/common';
import { TutoringError } from '@application/errors';

/**
 * A use case that only reads. Implementations depend on reader ports, which
 * expose no write operation.
 */
export interface IQueryPort<TInput, TReadModel> {
  execute(input: TInput): Promise<Either<TutoringError, TReadModel>>;
}
