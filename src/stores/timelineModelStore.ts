/**
 * Timeline Model Store
 *
 * Authoritative segment collection, total duration, playhead and selection
 * for one editing session. Each session creates its own store; nothing here
 * is global.
 *
 * Every mutation validates first and then applies a single `set`, so
 * subscribers never observe a half-applied change. Subscribing to the store
 * is how views learn that a re-render is needed.
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import { nanoid } from 'nanoid';
import type { SegmentId, SegmentInput, SegmentPatch, TimelineSegment, TimeSec } from '@/types';
import { DEFAULT_TOTAL_DURATION_SEC } from '@/constants/timeline';
import {
  InvalidRangeError,
  NotFoundError,
  TimelineValidationError,
  fail,
  ok,
  type MutationResult,
  type TimelineError,
} from '@/core/errors';
import {
  checkColor,
  checkRange,
  checkTrackIndex,
  containsTime,
  defaultColorFor,
  defaultNameFor,
  segmentDuration,
  segmentsOverlap,
} from '@/utils/segment';
import { createLogger } from '@/services/logger';

const logger = createLogger('TimelineModel');

// =============================================================================
// Types
// =============================================================================

export interface TimelineModelState {
  /** Insertion order; hit-testing prefers earlier segments */
  segments: TimelineSegment[];
  totalDuration: TimeSec;
  /** Always within [0, totalDuration] */
  currentTime: TimeSec;
  selectedSegmentId: SegmentId | null;
  /** Opaque reference to the soundtrack, round-tripped through export */
  audioFileRef: string;
}

export interface TimelineModelActions {
  /** Throws `InvalidRangeError` or `TimelineValidationError` on bad input */
  addSegment: (input: SegmentInput) => SegmentId;
  /** Throws `NotFoundError` */
  removeSegment: (id: SegmentId) => void;
  /** Clamps into the timeline; fails if the clamped range is empty */
  updateSegmentTime: (id: SegmentId, start: TimeSec, end: TimeSec) => MutationResult<TimelineSegment>;
  updateSegment: (id: SegmentId, patch: SegmentPatch) => MutationResult<TimelineSegment>;
  toggleSegmentLock: (id: SegmentId) => MutationResult<TimelineSegment>;
  /** Copy placed right after the source on the same track */
  duplicateSegment: (id: SegmentId) => MutationResult<SegmentId>;

  getSegment: (id: SegmentId) => TimelineSegment | undefined;
  segmentAt: (time: TimeSec, trackIndex: number) => TimelineSegment | undefined;
  segmentsAt: (time: TimeSec) => TimelineSegment[];
  segmentsInRange: (start: TimeSec, end: TimeSec) => TimelineSegment[];
  findOverlaps: (trackIndex?: number) => Array<[TimelineSegment, TimelineSegment]>;
  findOutOfBoundsSegments: () => TimelineSegment[];
  getTrackCount: () => number;
  getSnapshot: () => Readonly<TimelineModelState>;

  /** Throws `InvalidRangeError` for non-positive durations */
  setTotalDuration: (duration: TimeSec) => void;
  setCurrentTime: (time: TimeSec) => void;
  /** Throws `NotFoundError` for unknown ids */
  selectSegment: (id: SegmentId | null) => void;
  setAudioFileRef: (ref: string) => void;
  clear: () => void;
  /** Replace all content, keeping ids. Throws and changes nothing on bad input. */
  loadSegments: (segments: readonly TimelineSegment[], totalDuration: TimeSec, audioFileRef?: string) => void;
}

export type TimelineModel = TimelineModelState & TimelineModelActions;

export interface TimelineModelOptions {
  totalDuration?: TimeSec;
  /** Segment id generator, defaults to nanoid */
  createId?: () => SegmentId;
}

// =============================================================================
// Helpers
// =============================================================================

function checkDuration(duration: TimeSec): InvalidRangeError | null {
  if (!Number.isFinite(duration) || duration <= 0) {
    return new InvalidRangeError(`Total duration must be positive, got ${duration}`, 0, duration);
  }
  return null;
}

function clampCurrentTime(time: TimeSec, totalDuration: TimeSec): TimeSec {
  if (!Number.isFinite(time)) {
    return time === Number.POSITIVE_INFINITY ? totalDuration : 0;
  }
  return Math.max(0, Math.min(totalDuration, time));
}

function checkSegmentFields(segment: Pick<TimelineSegment, 'trackIndex' | 'color'>): TimelineError | null {
  return checkTrackIndex(segment.trackIndex) ?? checkColor(segment.color);
}

// =============================================================================
// Store Factory
// =============================================================================

export function createTimelineModelStore(options: TimelineModelOptions = {}) {
  const createId = options.createId ?? (() => nanoid());
  const initialDuration = options.totalDuration ?? DEFAULT_TOTAL_DURATION_SEC;
  const durationError = checkDuration(initialDuration);
  if (durationError) {
    throw durationError;
  }

  return createStore<TimelineModel>()(
    immer((set, get) => {
      const rejectUpdate = <T>(id: SegmentId, error: TimelineError): MutationResult<T> => {
        logger.warn('Segment update rejected', { segmentId: id, error: error.toJSON() });
        return fail(error);
      };

      return {
        segments: [],
        totalDuration: initialDuration,
        currentTime: 0,
        selectedSegmentId: null,
        audioFileRef: '',

        // =====================================================================
        // Segment Mutations
        // =====================================================================

        addSegment: (input) => {
          const { totalDuration } = get();
          const color = input.color ?? defaultColorFor(input.kind);
          const error =
            checkRange(input.startTime, input.endTime, totalDuration) ??
            checkSegmentFields({ trackIndex: input.trackIndex, color });
          if (error) {
            throw error;
          }

          const segment: TimelineSegment = {
            id: createId(),
            trackIndex: input.trackIndex,
            startTime: input.startTime,
            endTime: input.endTime,
            name: input.name ?? defaultNameFor(input.kind),
            kind: input.kind,
            color,
            description: input.description ?? '',
            locked: input.locked ?? false,
            visible: input.visible ?? true,
          };

          set((state) => {
            state.segments.push(segment);
          });
          logger.debug('Segment added', { segmentId: segment.id, kind: segment.kind });
          return segment.id;
        },

        removeSegment: (id) => {
          if (!get().getSegment(id)) {
            throw new NotFoundError(id);
          }
          set((state) => {
            state.segments = state.segments.filter((segment) => segment.id !== id);
            if (state.selectedSegmentId === id) {
              state.selectedSegmentId = null;
            }
          });
          logger.debug('Segment removed', { segmentId: id });
        },

        updateSegmentTime: (id, start, end) => {
          const { totalDuration } = get();
          const current = get().getSegment(id);
          if (!current) {
            return rejectUpdate(id, new NotFoundError(id));
          }

          const clampedStart = Math.max(0, start);
          const clampedEnd = Math.min(totalDuration, end);
          const error = checkRange(clampedStart, clampedEnd, totalDuration);
          if (error) {
            return rejectUpdate(id, error);
          }

          const next: TimelineSegment = { ...current, startTime: clampedStart, endTime: clampedEnd };
          set((state) => {
            const index = state.segments.findIndex((segment) => segment.id === id);
            if (index >= 0) {
              state.segments[index] = next;
            }
          });
          logger.debug('Segment time updated', { segmentId: id, start: clampedStart, end: clampedEnd });
          return ok(next);
        },

        updateSegment: (id, patch) => {
          const current = get().getSegment(id);
          if (!current) {
            return rejectUpdate(id, new NotFoundError(id));
          }

          const next: TimelineSegment = { ...current, ...patch, id };
          const error = checkSegmentFields(next);
          if (error) {
            return rejectUpdate(id, error);
          }

          set((state) => {
            const index = state.segments.findIndex((segment) => segment.id === id);
            if (index >= 0) {
              state.segments[index] = next;
            }
          });
          logger.debug('Segment updated', { segmentId: id, fields: Object.keys(patch) });
          return ok(next);
        },

        toggleSegmentLock: (id) => {
          const current = get().getSegment(id);
          if (!current) {
            return rejectUpdate(id, new NotFoundError(id));
          }
          return get().updateSegment(id, { locked: !current.locked });
        },

        duplicateSegment: (id) => {
          const source = get().getSegment(id);
          if (!source) {
            return rejectUpdate(id, new NotFoundError(id));
          }

          const { totalDuration } = get();
          const startTime = source.endTime;
          const endTime = Math.min(source.endTime + segmentDuration(source), totalDuration);
          const error = checkRange(startTime, endTime, totalDuration);
          if (error) {
            return rejectUpdate(id, error);
          }

          const copy: TimelineSegment = {
            ...source,
            id: createId(),
            startTime,
            endTime,
            name: `${source.name} copy`,
            locked: false,
          };
          set((state) => {
            state.segments.push(copy);
          });
          logger.debug('Segment duplicated', { sourceId: id, segmentId: copy.id });
          return ok(copy.id);
        },

        // =====================================================================
        // Queries
        // =====================================================================

        getSegment: (id) => get().segments.find((segment) => segment.id === id),

        segmentAt: (time, trackIndex) =>
          get().segments.find(
            (segment) => segment.visible && segment.trackIndex === trackIndex && containsTime(segment, time),
          ),

        segmentsAt: (time) => get().segments.filter((segment) => segment.visible && containsTime(segment, time)),

        segmentsInRange: (start, end) => {
          const range = { startTime: start, endTime: end };
          return get().segments.filter((segment) => segmentsOverlap(segment, range));
        },

        findOverlaps: (trackIndex) => {
          const candidates = get().segments.filter(
            (segment) => trackIndex === undefined || segment.trackIndex === trackIndex,
          );
          const pairs: Array<[TimelineSegment, TimelineSegment]> = [];
          candidates.forEach((a, i) => {
            for (const b of candidates.slice(i + 1)) {
              if (a.trackIndex === b.trackIndex && segmentsOverlap(a, b)) {
                pairs.push([a, b]);
              }
            }
          });
          return pairs;
        },

        findOutOfBoundsSegments: () => {
          const { segments, totalDuration } = get();
          return segments.filter((segment) => segment.endTime > totalDuration);
        },

        getTrackCount: () => get().segments.reduce((count, segment) => Math.max(count, segment.trackIndex + 1), 0),

        getSnapshot: () => {
          const { segments, totalDuration, currentTime, selectedSegmentId, audioFileRef } = get();
          return Object.freeze({ segments, totalDuration, currentTime, selectedSegmentId, audioFileRef });
        },

        // =====================================================================
        // Timeline State
        // =====================================================================

        setTotalDuration: (duration) => {
          const error = checkDuration(duration);
          if (error) {
            throw error;
          }
          set((state) => {
            state.totalDuration = duration;
            state.currentTime = clampCurrentTime(state.currentTime, duration);
          });

          const outOfBounds = get().findOutOfBoundsSegments();
          if (outOfBounds.length > 0) {
            logger.warn('Segments extend past the new duration', {
              duration,
              segmentIds: outOfBounds.map((segment) => segment.id),
            });
          }
        },

        setCurrentTime: (time) => {
          set((state) => {
            state.currentTime = clampCurrentTime(time, state.totalDuration);
          });
        },

        selectSegment: (id) => {
          if (id !== null && !get().getSegment(id)) {
            throw new NotFoundError(id);
          }
          set((state) => {
            state.selectedSegmentId = id;
          });
        },

        setAudioFileRef: (ref) => {
          set((state) => {
            state.audioFileRef = ref;
          });
        },

        clear: () => {
          set((state) => {
            state.segments = [];
            state.selectedSegmentId = null;
            state.currentTime = 0;
          });
          logger.debug('Timeline cleared');
        },

        loadSegments: (segments, totalDuration, audioFileRef = '') => {
          const durationProblem = checkDuration(totalDuration);
          if (durationProblem) {
            throw durationProblem;
          }

          const seen = new Set<SegmentId>();
          for (const segment of segments) {
            const error =
              checkRange(segment.startTime, segment.endTime, totalDuration) ?? checkSegmentFields(segment);
            if (error) {
              throw error;
            }
            if (seen.has(segment.id)) {
              throw new TimelineValidationError('Invalid timeline', [`duplicate segment id "${segment.id}"`]);
            }
            seen.add(segment.id);
          }

          set((state) => {
            state.segments = segments.map((segment) => ({ ...segment }));
            state.totalDuration = totalDuration;
            state.currentTime = 0;
            state.selectedSegmentId = null;
            state.audioFileRef = audioFileRef;
          });
          logger.info('Timeline loaded', { segmentCount: segments.length, totalDuration });
        },
      };
    }),
  );
}

export type TimelineModelStore = ReturnType<typeof createTimelineModelStore>;
