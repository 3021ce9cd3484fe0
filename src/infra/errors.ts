import type { ZodIssue } from 'zod';

export class ParkingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ParkingError';
  }
}

/**
 * Raised when a reply does not arrive within the ask timeout.
 * Not retried inside the core; the caller decides.
 */
export class AskTimeoutError extends ParkingError {
  constructor(
    public readonly target: string,
    public readonly timeoutMs: number,
    requestId: string
  ) {
    super(`No reply from ${target} within ${timeoutMs}ms`, 'ASK_TIMEOUT', { requestId });
    this.name = 'AskTimeoutError';
  }
}

export class ValidationError extends ParkingError {
  constructor(message: string, public readonly issues: ZodIssue[]) {
    super(message, 'VALIDATION_FAILED', issues);
    this.name = 'ValidationError';
  }
}
