import { DomainException } from '@domain/exceptions';

/**
 * Base class for all application-level errors.
 * These are the failures a webhook caller gets back as a rejected request.
 * Soft ordering problems are not errors; they are fulfillment messages.
 */
export abstract class ApplicationError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

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

// ============ Routing Errors ============

export class IntentNotFoundError extends ApplicationError {
  readonly code = 'INTENT_NOT_FOUND';
  readonly statusCode = 400;

  constructor(public readonly intent: string) {
    super(`Intent '${intent}' not found`);
  }
}

// ============ Validation Errors ============

export class ValidationError extends ApplicationError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

export class SessionNotIdentifiedError extends ValidationError {
  constructor() {
    super('Could not extract a session id from the output contexts', 'outputContexts');
  }
}

// ============ Generic Errors ============

export class UnexpectedError extends ApplicationError {
  readonly code = 'UNEXPECTED_ERROR';
  readonly statusCode = 500;

  constructor(reason: string) {
    super(`An unexpected error occurred: ${reason}`);
  }
}

/**
 * Normalizes anything thrown inside a use case.
 * Domain rule violations are the caller's fault (400); the rest is ours (500).
 */
export function toApplicationError(error: unknown): ApplicationError {
  if (error instanceof ApplicationError) {
    return error;
  }
  if (error instanceof DomainException) {
    return new ValidationError(error.message);
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new UnexpectedError(message);
}

// Type union for all errors the intent router can return
export type IntentRoutingError = IntentNotFoundError | ValidationError | UnexpectedError;
