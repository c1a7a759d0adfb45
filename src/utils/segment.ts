/**
 * Segment Helpers
 *
 * Derived quantities of a timeline segment plus input validation shared by
 * the model and the import path.
 */

import type { SegmentKind, TimelineSegment, TimeSec } from '@/types';
import { HEX_COLOR_PATTERN, KIND_COLORS } from '@/constants/timeline';
import { InvalidRangeError, TimelineValidationError } from '@/core/errors';

type TimeRange = Pick<TimelineSegment, 'startTime' | 'endTime'>;

// =============================================================================
// Derived Values
// =============================================================================

export function segmentDuration(segment: TimeRange): TimeSec {
  return segment.endTime - segment.startTime;
}

/** Closed interval: both edges count as inside. */
export function containsTime(segment: TimeRange, time: TimeSec): boolean {
  return segment.startTime <= time && time <= segment.endTime;
}

/** Ranges that merely touch do not overlap. */
export function segmentsOverlap(a: TimeRange, b: TimeRange): boolean {
  return !(a.endTime <= b.startTime || a.startTime >= b.endTime);
}

export function defaultColorFor(kind: SegmentKind): string {
  return KIND_COLORS[kind];
}

export function defaultNameFor(kind: SegmentKind): string {
  return `New ${kind}`;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check `0 <= start < end <= totalDuration`.
 *
 * @returns The violation, or `null` when the range is acceptable
 */
export function checkRange(start: TimeSec, end: TimeSec, totalDuration: TimeSec): InvalidRangeError | null {
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    return new InvalidRangeError('Segment times must be finite', start, end, totalDuration);
  }
  if (start < 0) {
    return new InvalidRangeError(`Start ${start} is before 0`, start, end, totalDuration);
  }
  if (end <= start) {
    return new InvalidRangeError(`End ${end} must be after start ${start}`, start, end, totalDuration);
  }
  if (end > totalDuration) {
    return new InvalidRangeError(
      `End ${end} exceeds the timeline duration ${totalDuration}`,
      start,
      end,
      totalDuration,
    );
  }
  return null;
}

export function checkTrackIndex(trackIndex: number): TimelineValidationError | null {
  if (!Number.isInteger(trackIndex) || trackIndex < 0) {
    return new TimelineValidationError('Invalid segment', [
      `trackIndex must be a non-negative integer, got ${trackIndex}`,
    ]);
  }
  return null;
}

export function checkColor(color: string): TimelineValidationError | null {
  if (!HEX_COLOR_PATTERN.test(color)) {
    return new TimelineValidationError('Invalid segment', [`color must be #RRGGBB, got "${color}"`]);
  }
  return null;
}
