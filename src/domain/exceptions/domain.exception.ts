/**
 * Root of every rule violation raised by the domain model.
 *
 * `code` is stable across releases (e.g. `VALIDATION_ERROR`); adapters key
 * their own translation off it, never off the message text.
 */
export abstract class DomainException extends Error {
  protected constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace(this, new.target);
  }
}
