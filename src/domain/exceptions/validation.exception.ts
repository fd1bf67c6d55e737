import { DomainException } from './domain.exception';

/**
 * Thrown when a value object or entity receives a value that breaks its invariants.
 * Examples: unknown language code, native language equal to target, empty message.
 */
export class ValidationException extends DomainException {
  constructor(
    public readonly subject: string,
    public readonly reason: string,
  ) {
    super(`Invalid ${subject}: ${reason}`, 'VALIDATION_ERROR');
  }
}
