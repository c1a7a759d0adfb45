/**
 * Segment Snapping
 *
 * Pulls dragged and resized segment edges onto nearby edges of other
 * segments, the playhead and the timeline bounds.
 */

import type { SegmentId, TimelineSegment, TimeSec } from '@/types';

// =============================================================================
// Types
// =============================================================================

export type SnapPointType = 'playhead' | 'segment-start' | 'segment-end' | 'timeline-bound';

export interface SnapPoint {
  time: TimeSec;
  type: SnapPointType;
  segmentId?: SegmentId;
}

export interface SnapResult {
  snapped: boolean;
  time: TimeSec;
  snapPoint?: SnapPoint;
}

export interface RangeSnapResult {
  snapped: boolean;
  /** Start of the moved range after snapping */
  start: TimeSec;
  /** Which edge of the range met the snap point */
  edge?: 'start' | 'end';
  snapPoint?: SnapPoint;
}

export interface CollectSnapPointsOptions {
  segments: readonly TimelineSegment[];
  playheadTime: TimeSec;
  totalDuration: TimeSec;
  /** The segment being edited never snaps to itself */
  excludeSegmentId: SegmentId | null;
}

// =============================================================================
// Constants
// =============================================================================

/** Lower number wins on equal distance */
const SNAP_TYPE_PRIORITY: Record<SnapPointType, number> = {
  playhead: 1,
  'segment-start': 2,
  'segment-end': 2,
  'timeline-bound': 3,
};

const SNAP_EPSILON = 1e-9;

// =============================================================================
// Snap Point Collection
// =============================================================================

export function collectSnapPoints(options: CollectSnapPointsOptions): SnapPoint[] {
  const points: SnapPoint[] = [
    { time: options.playheadTime, type: 'playhead' },
    { time: 0, type: 'timeline-bound' },
    { time: options.totalDuration, type: 'timeline-bound' },
  ];

  for (const segment of options.segments) {
    if (segment.id === options.excludeSegmentId || !segment.visible) continue;
    points.push(
      { time: segment.startTime, type: 'segment-start', segmentId: segment.id },
      { time: segment.endTime, type: 'segment-end', segmentId: segment.id },
    );
  }

  return points;
}

// =============================================================================
// Snapping
// =============================================================================

/** Convert a pixel threshold into seconds at the given zoom. */
export function snapThresholdSeconds(thresholdPx: number, pixelsPerSecond: number): TimeSec {
  return pixelsPerSecond > 0 ? thresholdPx / pixelsPerSecond : 0;
}

export function findNearestSnapPoint(
  time: TimeSec,
  points: readonly SnapPoint[],
  threshold: TimeSec,
): { point: SnapPoint; distance: number } | null {
  let nearest: { point: SnapPoint; distance: number } | null = null;

  for (const point of points) {
    const distance = Math.abs(point.time - time);
    if (distance > threshold) continue;

    if (
      nearest === null ||
      distance < nearest.distance - SNAP_EPSILON ||
      (Math.abs(distance - nearest.distance) <= SNAP_EPSILON &&
        SNAP_TYPE_PRIORITY[point.type] < SNAP_TYPE_PRIORITY[nearest.point.type])
    ) {
      nearest = { point, distance };
    }
  }

  return nearest;
}

export function snapTime(time: TimeSec, points: readonly SnapPoint[], threshold: TimeSec): SnapResult {
  const nearest = findNearestSnapPoint(time, points, threshold);
  if (nearest === null) {
    return { snapped: false, time };
  }
  return { snapped: true, time: nearest.point.time, snapPoint: nearest.point };
}

/**
 * Snap a moving range of fixed duration by whichever edge lands closer to a
 * snap point. The start edge wins ties.
 */
export function snapRange(
  start: TimeSec,
  duration: TimeSec,
  points: readonly SnapPoint[],
  threshold: TimeSec,
): RangeSnapResult {
  const startHit = findNearestSnapPoint(start, points, threshold);
  const endHit = findNearestSnapPoint(start + duration, points, threshold);

  if (startHit && (!endHit || startHit.distance <= endHit.distance)) {
    return { snapped: true, start: startHit.point.time, edge: 'start', snapPoint: startHit.point };
  }
  if (endHit) {
    return { snapped: true, start: endHit.point.time - duration, edge: 'end', snapPoint: endHit.point };
  }
  return { snapped: false, start };
}
