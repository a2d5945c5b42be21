/**
 * Error taxonomy surfaced to API callers. Every subclass carries the HTTP
 * status and a machine-readable code; the global error handler in app.ts
 * renders them as `{ error: { code, message } }`.
 */
export abstract class AppError extends Error {
  abstract readonly status: number;

  constructor(
    message: string,
    readonly code: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad input shape or range. Maps to 400. */
export class ValidationError extends AppError {
  readonly status = 400;

  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
  }
}

/** Missing, invalid or expired token, or bad credentials. Maps to 401. */
export class UnauthorizedError extends AppError {
  readonly status = 401;

  constructor(message: string, code = 'UNAUTHORIZED') {
    super(message, code);
  }
}

/** Authenticated, but the role may not perform the action. Maps to 403. */
export class PermissionDeniedError extends AppError {
  readonly status = 403;

  constructor(message = 'Insufficient permissions') {
    super(message, 'FORBIDDEN');
  }
}

/** Maps to 404. */
export class NotFoundError extends AppError {
  readonly status = 404;

  constructor(message: string) {
    super(message, 'NOT_FOUND');
  }
}

/** Duplicate unique field, double assignment or double completion. Maps to 409. */
export class ConflictError extends AppError {
  readonly status = 409;

  constructor(message: string) {
    super(message, 'CONFLICT');
  }
}
