import { Either } from '@application/common';
import { TutoringError } from '@application/errors';

/**
 * A use case that changes state. Output is an id or an acknowledgement,
 * never a domain entity.
 */
export interface ICommandPort<TInput, TOutput = void> {
  execute(input: TInput): Promise<Either<TutoringError, TOutput>>;
}
