import { DomainException } from '@domain/exceptions';

/**
 * Base class for all application-level errors.
 * These errors represent failures in use case execution or at a port
 * boundary, not domain rule violations (which are in the domain layer).
 * Transport mapping (HTTP status, exit code) is left to the adapters.
 */
export abstract class ApplicationError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): { code: string; message: string; name: string } {
    return {
      code: this.code,
      message: this.message,
      name: this.name,
    };
  }
}

// ============ Not Found ============

export class NotFoundError extends ApplicationError {
  readonly code: string = 'NOT_FOUND';

  constructor(
    public readonly resource: string,
    public readonly resourceId: string,
  ) {
    super(`${resource} with ID '${resourceId}' not found`);
  }
}

export class UserNotFoundError extends NotFoundError {
  override readonly code = 'USER_NOT_FOUND';

  constructor(userId: string) {
    super('User', userId);
  }
}

export class ConversationNotFoundError extends NotFoundError {
  override readonly code = 'CONVERSATION_NOT_FOUND';

  constructor(conversationId: string) {
    super('Conversation', conversationId);
  }
}

export class MessageNotFoundError extends NotFoundError {
  override readonly code = 'MESSAGE_NOT_FOUND';

  constructor(messageId: string) {
    super('Message', messageId);
  }
}

// ============ Concurrency ============

/**
 * Raised by a repository when the aggregate changed since it was loaded.
 */
export class ConflictError extends ApplicationError {
  readonly code = 'CONFLICT';

  constructor(resource: string, resourceId: string) {
    super(`${resource} '${resourceId}' was modified concurrently`);
  }
}

// ============ Port Errors ============

export class ProviderError extends ApplicationError {
  readonly code = 'PROVIDER_ERROR';

  constructor(provider: string, reason: string) {
    super(`${provider} provider error: ${reason}`);
  }
}

export class PortTimeoutError extends ApplicationError {
  readonly code = 'PORT_TIMEOUT';

  constructor(port: string, timeoutMs?: number) {
    super(
      timeoutMs === undefined
        ? `${port} did not respond in time`
        : `${port} did not respond within ${timeoutMs}ms`,
    );
  }
}

export class PortUnavailableError extends ApplicationError {
  readonly code = 'PORT_UNAVAILABLE';

  constructor(port: string, reason: string) {
    super(`${port} is unavailable: ${reason}`);
  }
}

// ============ Generic Errors ============

export class UnexpectedError extends ApplicationError {
  readonly code = 'UNEXPECTED_ERROR';

  constructor(reason: string) {
    super(`An unexpected error occurred: ${reason}`);
  }
}

/**
 * Everything a use case may return on its Left side.
 */
export type TutoringError = DomainException | ApplicationError;

/**
 * Known errors pass through untouched; anything else becomes an UnexpectedError.
 */
export function toTutoringError(error: unknown): TutoringError {
  if (error instanceof DomainException || error instanceof ApplicationError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new UnexpectedError(message);
}
