/**
 * Error Taxonomy
 *
 * Every error a caller may act on carries an HTTP `status` and a stable
 * `code`; the error handler middleware renders them as
 * `{ error, code, requestId, details? }`.
 */

/** Every status an error response can carry */
export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 410 | 413 | 429 | 500 | 503;

export abstract class RelayError extends Error {
  abstract readonly status: ErrorStatus;
  abstract readonly code: string;
  details?: Record<string, unknown>;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad or missing credential. Never says which half of a credential was wrong. */
export class UnauthorizedError extends RelayError {
  readonly status = 401;
  readonly code = 'UNAUTHORIZED';

  constructor(message = 'Invalid credentials') {
    super(message);
  }
}

export type ForbiddenReason = 'forbidden' | 'pending_approval';

/**
 * Authenticated but not permitted. A `pending_approval` reason means the
 * role matrix requires an approved permission request first.
 */
export class ForbiddenError extends RelayError {
  readonly status = 403;
  readonly code: 'FORBIDDEN' | 'PENDING_APPROVAL';

  constructor(readonly reason: ForbiddenReason, message?: string) {
    super(message ?? (reason === 'pending_approval'
      ? 'Approval required: file a permission request for this sender'
      : 'Not permitted to act as this sender'));
    this.code = reason === 'pending_approval' ? 'PENDING_APPROVAL' : 'FORBIDDEN';
  }
}

export class UnknownSenderError extends RelayError {
  readonly status = 404;
  readonly code = 'UNKNOWN_SENDER';

  constructor(readonly senderId: string) {
    super(`Unknown or disabled sender: ${senderId}`);
  }
}

export class NotFoundError extends RelayError {
  readonly status = 404;
  readonly code = 'NOT_FOUND';
}

/** Report against a lease that is not (or no longer) held. */
export class InvalidLeaseError extends RelayError {
  readonly status = 409;
  readonly code = 'INVALID_LEASE';

  constructor(readonly messageId: string) {
    super(`Lease for message ${messageId} is not held or has expired`);
  }
}

export class InvalidStateError extends RelayError {
  readonly status = 409;
  readonly code = 'INVALID_STATE';
}

/** The message aged out of the queue and was failed as "expired". */
export class ExpiredError extends RelayError {
  readonly status = 410;
  readonly code = 'EXPIRED';

  constructor(readonly messageId: string) {
    super(`Message ${messageId} expired before delivery`);
  }
}

export class MessageTooLargeError extends RelayError {
  readonly status = 413;
  readonly code = 'MESSAGE_TOO_LARGE';

  constructor(readonly length: number, readonly limit: number) {
    super(`Message body is ${length} characters (max ${limit})`);
  }
}

/** Transient storage race. Retried by the store before it ever reaches a caller. */
export class ContentionError extends RelayError {
  readonly status = 503;
  readonly code = 'CONTENTION';

  constructor(message = 'Storage is busy, retry the operation') {
    super(message);
  }
}

export class ValidationError extends RelayError {
  readonly status = 400;
  readonly code = 'VALIDATION_ERROR';

  constructor(readonly fields: Record<string, string>) {
    super(`Validation failed: ${Object.keys(fields).join(', ')}`);
    this.details = fields;
  }
}

export function isRelayError(err: unknown): err is RelayError {
  return err instanceof RelayError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
