/**
 * Timeline Constants
 *
 * Layout, gesture and playback values shared by the controller and clock.
 *
 * @module constants/timeline
 */

import type { SegmentKind } from '@/types';

// =============================================================================
// Duration Constants
// =============================================================================

/** Default timeline length in seconds */
export const DEFAULT_TOTAL_DURATION_SEC = 30;

/** Smallest span a resize can leave between start and end */
export const MIN_SEGMENT_DURATION_SEC = 0.1;

/** Span of a segment created by clicking an empty track */
export const DEFAULT_SEGMENT_SPAN_SEC = 2;

/** Markers are created as a sliver rather than a full block */
export const MARKER_SPAN_SEC = 0.1;

// =============================================================================
// Layout Constants
// =============================================================================

export const DEFAULT_PIXELS_PER_SECOND = 50;
export const MIN_PIXELS_PER_SECOND = 10;
export const MAX_PIXELS_PER_SECOND = 200;

export const RULER_HEIGHT_PX = 30;
export const TRACK_HEIGHT_PX = 40;
export const TRACK_SPACING_PX = 5;
export const DEFAULT_TRACK_COUNT = 4;

// =============================================================================
// Gesture Constants
// =============================================================================

/** Pointer distance from a segment edge that starts a resize */
export const EDGE_TOLERANCE_PX = 8;

/** Distance in pixels to detect snap targets */
export const SNAP_THRESHOLD_PX = 8;

// =============================================================================
// Playback Constants
// =============================================================================

/** Clock tick period */
export const TICK_INTERVAL_MS = 50;

export const PLAYBACK_SPEED_STEPS = [0.25, 0.5, 0.75, 1, 1.25, 1.5, 2] as const;

// =============================================================================
// Color Constants
// =============================================================================

export const KIND_COLORS: Record<SegmentKind, string> = {
  animation: '#2196F3',
  pause: '#FF9800',
  transition: '#4CAF50',
  marker: '#F44336',
  audio: '#9C27B0',
  video: '#00BCD4',
};

export const HEX_COLOR_PATTERN = /^#[0-9A-Fa-f]{6}$/;
