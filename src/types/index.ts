/**
 * Timeline Type Definitions
 *
 * Shared types for the segment model, the keyframe interpolator and the
 * collaborators (renderer, audio transport) the engine talks to.
 */

// =============================================================================
// ID Types
// =============================================================================

/** Segment unique identifier (nanoid) */
export type SegmentId = string;

/** Animated element identifier, supplied by the description converter */
export type ElementId = string;

// =============================================================================
// Time Types
// =============================================================================

/** Time in seconds (floating point) */
export type TimeSec = number;

// =============================================================================
// Segment Types
// =============================================================================

/** Closed set of segment kinds */
export const SEGMENT_KINDS = ['animation', 'pause', 'transition', 'marker', 'audio', 'video'] as const;
export type SegmentKind = (typeof SEGMENT_KINDS)[number];

/** A time-bounded block on a numbered track */
export interface TimelineSegment {
  readonly id: SegmentId;
  trackIndex: number;
  startTime: TimeSec;
  endTime: TimeSec;
  name: string;
  kind: SegmentKind;
  /** `#RRGGBB` */
  color: string;
  description: string;
  /** Locked segments ignore interactive drag, resize and delete */
  locked: boolean;
  /** Hidden segments are skipped by hit-testing */
  visible: boolean;
}

/** Fields accepted when creating a segment; the rest are defaulted. */
export interface SegmentInput {
  trackIndex: number;
  startTime: TimeSec;
  endTime: TimeSec;
  kind: SegmentKind;
  name?: string;
  color?: string;
  description?: string;
  locked?: boolean;
  visible?: boolean;
}

/** Property-panel edits. Times go through `updateSegmentTime`. */
export type SegmentPatch = Partial<
  Pick<TimelineSegment, 'name' | 'kind' | 'color' | 'description' | 'locked' | 'visible' | 'trackIndex'>
>;

// =============================================================================
// Animation Types
// =============================================================================

export const EASING_NAMES = ['linear', 'ease-in', 'ease-out', 'ease-in-out', 'bounce'] as const;
export type EasingName = (typeof EASING_NAMES)[number];

/** Numeric properties interpolate; anything else switches at the midpoint. */
export type PropertyValue = number | string | boolean;

/** Well-known keys are x, y, width, height, opacity, rotation and scale. */
export type PropertyMap = Record<string, PropertyValue>;

export interface AnimationDescriptor {
  startTime: TimeSec;
  duration: TimeSec;
  /** Unknown names fall back to linear */
  easing: string;
  /** Keys must be a subset of the element's initial state */
  endState: PropertyMap;
}

export interface AnimatedElement {
  id: ElementId;
  name?: string;
  initialState: PropertyMap;
  animation?: AnimationDescriptor;
}

// =============================================================================
// Collaborator Interfaces
// =============================================================================

/** Receives one property map per element per frame. */
export interface Renderer {
  beginFrame?(time: TimeSec): void;
  renderElement(elementId: ElementId, state: PropertyMap): void;
  endFrame?(time: TimeSec): void;
}

export type Unsubscribe = () => void;

/** Audio transport that can drive the playhead in audio-follow mode. */
export interface AudioTransport {
  onDurationKnown(listener: (duration: TimeSec) => void): Unsubscribe;
  onPosition(listener: (time: TimeSec) => void): Unsubscribe;
}

// =============================================================================
// Export Types
// =============================================================================

/** Round-trippable object model of a timeline */
export interface TimelineExport {
  duration: TimeSec;
  segments: TimelineSegment[];
  /** Opaque path or identifier, never resolved by the engine */
  audioFileRef: string;
}
