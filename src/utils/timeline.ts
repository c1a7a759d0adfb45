/**
 * Timeline Layout Utilities
 *
 * Time/pixel conversion and track geometry for the editing surface.
 * All x values are viewport-relative; `scrollX` is the horizontal offset.
 */

import {
  DEFAULT_PIXELS_PER_SECOND,
  DEFAULT_TRACK_COUNT,
  MAX_PIXELS_PER_SECOND,
  MIN_PIXELS_PER_SECOND,
  RULER_HEIGHT_PX,
  TRACK_HEIGHT_PX,
  TRACK_SPACING_PX,
} from '@/constants/timeline';

// =============================================================================
// Types
// =============================================================================

export interface TimelineLayout {
  pixelsPerSecond: number;
  scrollX: number;
  rulerHeight: number;
  trackHeight: number;
  trackSpacing: number;
  trackCount: number;
}

export const DEFAULT_LAYOUT: Readonly<TimelineLayout> = Object.freeze({
  pixelsPerSecond: DEFAULT_PIXELS_PER_SECOND,
  scrollX: 0,
  rulerHeight: RULER_HEIGHT_PX,
  trackHeight: TRACK_HEIGHT_PX,
  trackSpacing: TRACK_SPACING_PX,
  trackCount: DEFAULT_TRACK_COUNT,
});

// =============================================================================
// Time <-> Pixel Conversion
// =============================================================================

/**
 * @example
 * ```ts
 * timeToPixel(2, { ...DEFAULT_LAYOUT, scrollX: 20 }); // 80
 * ```
 */
export function timeToPixel(time: number, layout: Pick<TimelineLayout, 'pixelsPerSecond' | 'scrollX'>): number {
  if (!Number.isFinite(time) || !Number.isFinite(layout.pixelsPerSecond) || !Number.isFinite(layout.scrollX)) {
    return 0;
  }
  return time * layout.pixelsPerSecond - layout.scrollX;
}

/** Returns 0 when the zoom is unusable. */
export function pixelToTime(x: number, layout: Pick<TimelineLayout, 'pixelsPerSecond' | 'scrollX'>): number {
  if (!(layout.pixelsPerSecond > 0) || !Number.isFinite(layout.pixelsPerSecond)) {
    return 0;
  }
  const result = (x + layout.scrollX) / layout.pixelsPerSecond;
  return Number.isFinite(result) ? result : 0;
}

// =============================================================================
// Track Geometry
// =============================================================================

/**
 * Track under a y coordinate. The gap below a track belongs to that track.
 *
 * @returns The track index, or `null` over the ruler or past the last track
 */
export function trackAtY(y: number, layout: TimelineLayout): number | null {
  if (!Number.isFinite(y) || y < layout.rulerHeight) {
    return null;
  }
  const index = Math.floor((y - layout.rulerHeight) / (layout.trackHeight + layout.trackSpacing));
  return index < layout.trackCount ? index : null;
}

/** Top edge of a track in pixels. */
export function trackTop(trackIndex: number, layout: TimelineLayout): number {
  return layout.rulerHeight + trackIndex * (layout.trackHeight + layout.trackSpacing);
}

// =============================================================================
// Clamping & Formatting
// =============================================================================

export function clampTime(time: number, min: number = 0, max: number = Number.POSITIVE_INFINITY): number {
  return Math.max(min, Math.min(max, time));
}

export function clampZoom(pixelsPerSecond: number): number {
  if (!Number.isFinite(pixelsPerSecond)) {
    return DEFAULT_PIXELS_PER_SECOND;
  }
  return clampTime(pixelsPerSecond, MIN_PIXELS_PER_SECOND, MAX_PIXELS_PER_SECOND);
}

/** `MM:SS` for the ruler and transport display. */
export function formatTime(seconds: number): string {
  const safe = Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
  const minutes = Math.floor(safe / 60);
  const wholeSeconds = Math.floor(safe % 60);
  return `${String(minutes).padStart(2, '0')}:${String(wholeSeconds).padStart(2, '0')}`;
}

// =============================================================================
// Float Placement
// =============================================================================

/** Step `value` by at least one representable double in `direction`. */
export function nudgeTime(value: number, direction: 1 | -1): number {
  const step = Math.max(Math.abs(value) * Number.EPSILON, Number.MIN_VALUE);
  return value + direction * step;
}

export interface PlacedSpan {
  startTime: number;
  endTime: number;
}

/**
 * Place a range of `duration` starting near `start` inside
 * `[0, totalDuration]`. The start is derived back from the end, so
 * `endTime - startTime` reproduces `duration` wherever the double grid at
 * the new position can hold it.
 */
export function placeSpan(start: number, duration: number, totalDuration: number): PlacedSpan {
  const endTime = Math.min(start + duration, totalDuration);
  const startTime = endTime - duration;
  if (startTime < 0) {
    return { startTime: 0, endTime: duration };
  }
  return { startTime, endTime };
}
