export type ErrorKind =
  | 'ValidationError'
  | 'Unauthenticated'
  | 'Forbidden'
  | 'NotFound'
  | 'Conflict'
  | 'Unavailable';

/**
 * Base for every failure the core reports to its callers. The message is
 * meant for the client; anything about storage internals goes in `cause`.
 */
export abstract class CoreError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends CoreError {
  readonly kind = 'ValidationError';
}

export class UnauthenticatedError extends CoreError {
  readonly kind = 'Unauthenticated';

  constructor(message = 'Authentication credentials are missing or invalid') {
    super(message);
  }
}

export class ForbiddenError extends CoreError {
  readonly kind = 'Forbidden';

  constructor(message = 'You do not have permission to perform this action') {
    super(message);
  }
}

export class NotFoundError extends CoreError {
  readonly kind = 'NotFound';
}

export class ConflictError extends CoreError {
  readonly kind = 'Conflict';
}

// Retryable; the unit of work that raised it has been rolled back.
export class UnavailableError extends CoreError {
  readonly kind = 'Unavailable';

  constructor(options?: { cause?: unknown }) {
    super('The service is temporarily unavailable, please retry', options);
  }
}
