/**
 * utils/errors.ts — Application error class hierarchy.
 *
 * Every error a caller can act on carries an HTTP status and a
 * machine-readable code. The Express error handler and the socket handlers
 * both serialize them as `{ error, code, ...details }`.
 *
 * Hierarchy:
 *   Error (native)
 *     └── AppError
 *           ├── ValidationError       (400)
 *           ├── UnauthenticatedError  (401 — no identity; prompt to sign in again)
 *           ├── ForbiddenError        (403 — not this room's doctor/patient, or wrong role)
 *           ├── NotFoundError         (404)
 *           ├── ConflictError         (409 — lost a compare-and-swap; re-read status)
 *           │     ├── SessionClosedError (409 — room is ENDED or CANCELLED)
 *           │     └── RelayRefusedError  (409 — state changed between check and admit)
 *           ├── NotYetStartedError    (425 — doctor has not started the call)
 *           └── RateLimitError        (429)
 */
import type { SessionState } from '../shared';

export type ErrorDetails = Record<string, string | number | boolean | null>;

/** Base application error — carries an HTTP statusCode and a machine-readable code */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
    public details: ErrorDetails = {},
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code = 'VALIDATION_ERROR') {
    super(message, 400, code);
    this.name = 'ValidationError';
  }
}

export class UnauthenticatedError extends AppError {
  constructor(message = 'Authentication required', code = 'UNAUTHENTICATED') {
    super(message, 401, code);
    this.name = 'UnauthenticatedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'You are not allowed to access this consultation', code = 'FORBIDDEN') {
    super(message, 403, code);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code = 'NOT_FOUND') {
    super(message, 404, code);
    this.name = 'NotFoundError';
  }
}

/**
 * 409 — the request lost a race or targets a state that does not allow it.
 * `state` is what the caller should show / re-decide on: the stored state,
 * or ALREADY_ACTIVE for a second start.
 */
export class ConflictError extends AppError {
  constructor(message: string, state?: SessionState | 'ALREADY_ACTIVE', code = 'CONFLICT') {
    super(message, 409, code, state ? { state } : {});
    this.name = 'ConflictError';
  }
}

export class SessionClosedError extends ConflictError {
  constructor(state: SessionState, message = 'Consultation has ended') {
    super(message, state, 'SESSION_CLOSED');
    this.name = 'SessionClosedError';
  }
}

export class RelayRefusedError extends ConflictError {
  constructor(message = 'Consultation state changed, check status before joining again') {
    super(message, undefined, 'RELAY_REFUSED');
    this.name = 'RelayRefusedError';
  }
}

export class NotYetStartedError extends AppError {
  constructor(message = 'Waiting for doctor to start consultation') {
    super(message, 425, 'NOT_YET_STARTED', { state: 'SCHEDULED' });
    this.name = 'NotYetStartedError';
  }
}

export class RateLimitError extends AppError {
  constructor(message = 'Too many requests', code = 'RATE_LIMIT_EXCEEDED') {
    super(message, 429, code);
    this.name = 'RateLimitError';
  }
}

/** DynamoDB conditional write rejected — the only expected failure of a CAS */
export function isConditionalCheckFailed(err: unknown): boolean {
  return err instanceof Error && err.name === 'ConditionalCheckFailedException';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
