/**
 * Application Error Classes
 * The classified error taxonomy: every failure that reaches the response path
 * ends up as one of these, carrying the HTTP status it is answered with.
 */

/**
 * Log level a classified error is reported at
 */
export type ErrorSeverity = 'warn' | 'error';

/**
 * Check that a value is a client or server error status (4xx/5xx).
 * Informational, success and redirect codes are not failure outcomes.
 */
export function isErrorStatusCode(statusCode: number): boolean {
  return Number.isInteger(statusCode) && statusCode >= 400 && statusCode <= 599;
}

/**
 * Base Application Error
 * All classified errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly timestamp: Date;

  constructor(
    public readonly message: string,
    statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.statusCode = isErrorStatusCode(statusCode) ? statusCode : 500;
    this.timestamp = new Date();
    Error.captureStackTrace(this, this.constructor);
  }

  get severity(): ErrorSeverity {
    return this.statusCode >= 500 ? 'error' : 'warn';
  }

  /**
   * Log-safe representation. The cause is left out on purpose: it goes
   * through the logger's error serializer instead.
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * 400 - Bad Request
 */
export class BadRequestError extends AppError {
  constructor(message: string = 'Bad Request', options?: { cause?: unknown }) {
    super(message, 400, 'BAD_REQUEST', options);
  }
}

/**
 * 403 - Forbidden
 */
export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 403, 'FORBIDDEN');
  }
}

/**
 * 404 - Not Found
 */
export class NotFoundError extends AppError {
  constructor(message: string = 'Not Found') {
    super(message, 404, 'NOT_FOUND');
  }
}

/**
 * 405 - Method Not Allowed
 */
export class MethodNotAllowedError extends AppError {
  constructor(message: string = 'Method Not Allowed') {
    super(message, 405, 'METHOD_NOT_ALLOWED');
  }
}

/**
 * 500 - Internal Server Error
 */
export class InternalError extends AppError {
  constructor(message: string = 'Internal Server Error', options?: { cause?: unknown }) {
    super(message, 500, 'INTERNAL_ERROR', options);
  }
}

// ============================================
// NAMED CONSTRUCTORS
// ============================================
// Handlers signal outcomes with `return notFound();`

export function badRequest(message?: string): BadRequestError {
  return new BadRequestError(message);
}

export function forbidden(message?: string): ForbiddenError {
  return new ForbiddenError(message);
}

export function notFound(message?: string): NotFoundError {
  return new NotFoundError(message);
}

export function methodNotAllowed(message?: string): MethodNotAllowedError {
  return new MethodNotAllowedError(message);
}

export function internalError(message?: string, cause?: unknown): InternalError {
  return new InternalError(message, cause === undefined ? undefined : { cause });
}
