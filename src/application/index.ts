/**
 * Application layer: the use cases of the tutoring service.
 *
 * Every command and query is one class with an `execute` method returning
 * `Either<TutoringError, Output>`. Use cases talk to the outside only
 * through the ports declared here (repositories, AI tutor, clock); the
 * infrastructure layer supplies the implementations.
 *
 * Depends on the domain layer only.
 */

// Common utilities
export * from './common';

// Error types
export * from './errors';

// DTOs
export * from './dtos';

// Aggregate -> read model projections
export * from './mappers';

// Ports (interfaces)
export * from './ports';

// Use cases
export * from './use-cases';
