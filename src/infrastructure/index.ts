/**
 * INFRASTRUCTURE LAYER
 *
 * Contains all external implementations and framework-specific code.
 * This layer adapts external tools to work with our application.
 *
 * Contains:
 * - Adapters: Implementations of application ports
 *   - Persistence: in-memory and MongoDB repositories
 *   - AI: Claude tutor adapter
 *   - Clock: system time
 * - HTTP: NestJS controllers, request DTOs and error mapping
 * - Config: Configuration modules and environment setup
 * - Observability: pino logging
 *
 * Rules:
 * - CAN import from domain and application layers
 * - Implements interfaces defined in application/ports
 * - Contains all framework-specific code (NestJS, Mongoose, etc.)
 */

export * from './adapters';
export * from './config';
export * from './observability/logging';
