// Utilities: Error taxonomy
// Every error the core raises on purpose carries its HTTP status and a stable code

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, statusCode: number, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

/** Malformed input. Expected traffic, never logged as unexpected. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 404, 'NOT_FOUND', details);
  }
}

/** Duplicate username, email or character name. Reported as 400. */
export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'CONFLICT', details);
  }
}

export type AuthFailureReason = 'invalid_credentials' | 'locked' | 'unverified';

const AUTH_STATUS: Record<AuthFailureReason, number> = {
  invalid_credentials: 401,
  locked: 403,
  unverified: 403,
};

export class AuthError extends AppError {
  readonly reason: AuthFailureReason;

  constructor(message: string, reason: AuthFailureReason) {
    super(message, AUTH_STATUS[reason], reason.toUpperCase());
    this.reason = reason;
  }
}

/** Storage or mail failure. The response body stays generic. */
export class InternalError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 500, 'INTERNAL_ERROR', details);
  }
}
