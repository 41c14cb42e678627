/**
 * Error taxonomy shared by scoring, conversation and delivery code.
 *
 * Every error carries a stable `code` so routes and logs can branch on it
 * without instanceof chains across module boundaries.
 */

export type FitCoachErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONTENT_UNAVAILABLE'
  | 'RATE_LIMIT_EXCEEDED'
  | 'STATE_CONFLICT'
  | 'GENERATION_FAILED'
  | 'DELIVERY_FAILED';

export class FitCoachError extends Error {
  readonly code: FitCoachErrorCode;

  constructor(code: FitCoachErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed or empty résumé / job input. Rejected before scoring. */
export class ValidationError extends FitCoachError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_ERROR', message);
    this.issues = issues;
  }
}

/** The advice corpus has not been loaded (or was torn down). */
export class ContentUnavailable extends FitCoachError {
  constructor(message = 'Advice corpus is not loaded') {
    super('CONTENT_UNAVAILABLE', message);
  }
}

export class RateLimitExceeded extends FitCoachError {
  readonly windowResetsAt: number;

  constructor(windowResetsAt: number) {
    super('RATE_LIMIT_EXCEEDED', 'Outbound message budget exhausted for this window');
    this.windowResetsAt = windowResetsAt;
  }
}

/** Optimistic-concurrency version mismatch on a session write. */
export class StateConflict extends FitCoachError {
  readonly sessionId: string;
  readonly expectedVersion: number;

  constructor(sessionId: string, expectedVersion: number, message?: string) {
    super('STATE_CONFLICT', message ?? `Session version ${expectedVersion} is stale`);
    this.sessionId = sessionId;
    this.expectedVersion = expectedVersion;
  }
}

export class GenerationFailed extends FitCoachError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_FAILED', message, options);
  }
}

export class DeliveryFailed extends FitCoachError {
  readonly idempotencyKey: string;

  constructor(idempotencyKey: string, message: string, options?: { cause?: unknown }) {
    super('DELIVERY_FAILED', message, options);
    this.idempotencyKey = idempotencyKey;
  }
}

export function isFitCoachError(err: unknown): err is FitCoachError {
  return err instanceof FitCoachError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
