import { ErrorCodes } from './contracts/common';

/**
 * Base class for every error that maps onto an HTTP response.
 * Anything else reaching the error middleware is reported as a generic 500.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details?: Record<string, string>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Malformed or out-of-range input. `errors` maps each offending field to its message.
 */
export class ValidationError extends AppError {
  constructor(public readonly errors: Record<string, string>, message?: string) {
    super(message ?? `Validation failed: ${Object.values(errors).join('; ')}`, 400, ErrorCodes.VALIDATION_ERROR, errors);
    this.name = 'ValidationError';
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: message }, message);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400, ErrorCodes.BAD_REQUEST);
    this.name = 'BadRequestError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Could not validate credentials') {
    super(message, 401, ErrorCodes.UNAUTHORIZED);
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends AppError {
  constructor(message = 'Access denied') {
    super(message, 403, ErrorCodes.FORBIDDEN);
    this.name = 'AuthorizationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 404, ErrorCodes.NOT_FOUND);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, ErrorCodes.CONFLICT);
    this.name = 'ConflictError';
  }
}

/**
 * A third-party provider could not be reached at all (no HTTP response).
 * Provider answers with an error status are absorbed by the adapters instead.
 */
export class UpstreamError extends AppError {
  constructor(public readonly provider: string, message: string) {
    super(message, 502, ErrorCodes.UPSTREAM_ERROR);
    this.name = 'UpstreamError';
  }
}

export class UnavailableError extends AppError {
  constructor(message = 'Database not available. Please try again later.') {
    super(message, 503, ErrorCodes.SERVICE_UNAVAILABLE);
    this.name = 'UnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
