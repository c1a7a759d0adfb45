/**
 * Timeline Errors
 *
 * Error types raised by the timeline model, the playback clock and the
 * import/config parsers. Each carries a stable `code` for programmatic
 * handling and serializes to a plain object for logging.
 */

import type { SegmentId } from '@/types';

// =============================================================================
// Base Error
// =============================================================================

export abstract class TimelineError extends Error {
  /** Error code for programmatic handling */
  abstract readonly code: string;
  /** Whether the caller can continue after this error */
  abstract readonly recoverable: boolean;
  readonly timestamp: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    this.timestamp = Date.now();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// Model Errors
// =============================================================================

/**
 * A time range, duration or rate outside what the model accepts.
 * `limit` is the bound that was violated (usually the total duration).
 */
export class InvalidRangeError extends TimelineError {
  readonly code = 'INVALID_RANGE';
  readonly recoverable = true;
  readonly start: number;
  readonly end: number;
  readonly limit: number | undefined;

  constructor(message: string, start: number, end: number, limit?: number) {
    super(message);
    this.start = start;
    this.end = end;
    this.limit = limit;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), start: this.start, end: this.end, limit: this.limit };
  }
}

export class NotFoundError extends TimelineError {
  readonly code = 'NOT_FOUND';
  readonly recoverable = true;
  readonly segmentId: SegmentId;

  constructor(segmentId: SegmentId) {
    super(`Segment not found: ${segmentId}`);
    this.segmentId = segmentId;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), segmentId: this.segmentId };
  }
}

/** Logged, never thrown: the easing falls back to linear. */
export class UnknownEasingWarning extends TimelineError {
  readonly code = 'UNKNOWN_EASING';
  readonly recoverable = true;
  readonly easing: string;

  constructor(easing: string) {
    super(`Unknown easing "${easing}", falling back to linear`);
    this.easing = easing;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), easing: this.easing };
  }
}

// =============================================================================
// Payload Errors
// =============================================================================

/** An import payload, converter output or config object failed validation. */
export class TimelineValidationError extends TimelineError {
  readonly code = 'VALIDATION_FAILED';
  readonly recoverable = false;
  readonly issues: readonly string[];

  constructor(context: string, issues: readonly string[]) {
    super(`${context}: ${issues.join('; ')}`);
    this.issues = issues;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: [...this.issues] };
  }
}

// =============================================================================
// Result Type
// =============================================================================

export type MutationResult<T> = { ok: true; value: T } | { ok: false; error: TimelineError };

export function ok<T>(value: T): MutationResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: TimelineError): MutationResult<T> {
  return { ok: false, error };
}

export function isTimelineError(error: unknown): error is TimelineError {
  return error instanceof TimelineError;
}
