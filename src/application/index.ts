/**
 * Application layer: the ordering use cases and the ports they talk through.
 *
 * Every agent intent has one use case; IntentRouterUseCase reads a webhook
 * event, validates its parameters with the Zod schemas in ./validation and
 * hands it to the right one. Inbound ports describe what the HTTP layer may
 * call, outbound ports what infrastructure must provide (session store,
 * order repository, catalog).
 *
 * Depends on the domain layer only.
 */

// Common utilities
export * from './common';

// Error types
export * from './errors';

// DTOs
export * from './dtos';

// Ports (interfaces)
export * from './ports';

// Parameter validation
export * from './validation';

// Use cases
export * from './use-cases';
