/**
 * Errors thrown by services and mapped to HTTP responses by the server's error handler.
 * The message is sent to the client as `{ error: message }`.
 */

export class ApiError extends Error {
  readonly statusCode: number;
  readonly headers: Record<string, string>;

  constructor(statusCode: number, message: string, headers: Record<string, string> = {}) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.headers = headers;
  }
}

/** Validation failures, bad credentials on profile updates, duplicate resources. */
export class BadRequestError extends ApiError {
  constructor(message: string) {
    super(400, message);
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message = 'Could not validate credentials') {
    super(401, message, { 'WWW-Authenticate': 'Bearer' });
  }
}

export class ForbiddenError extends ApiError {
  constructor(message: string) {
    super(403, message);
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(404, message);
  }
}

export class TooManyRequestsError extends ApiError {
  constructor(message: string) {
    super(429, message);
  }
}

/** A write to the payment provider failed. Surfaced as a server error. */
export class PaymentProviderError extends ApiError {
  constructor(message: string, cause?: unknown) {
    super(500, message);
    this.cause = cause;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
