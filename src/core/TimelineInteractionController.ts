/**
 * TimelineInteractionController
 *
 * Pointer and keyboard state machine for the editing surface. Raw pointer
 * coordinates come in; model mutations and preview events go out.
 *
 * A gesture keeps a transient draft of the segment range and never touches
 * the model until pointer-up. Every move is recomputed from the pointer-down
 * anchor plus the cumulative delta, so a long drag does not accumulate drift.
 *
 * States:
 * - `idle`: nothing in progress
 * - `selecting`: pointer is down on a locked segment; no edit will happen
 * - `dragging`: both edges move together, duration fixed
 * - `resizing-start` / `resizing-end`: one edge moves, the other is fixed
 * - `creating-segment`: a new segment is being sized on an empty track
 */

import type { SegmentId, SegmentKind, TimelineSegment, TimeSec } from '@/types';
import type { TimelineModelStore } from '@/stores/timelineModelStore';
import {
  DEFAULT_SEGMENT_SPAN_SEC,
  EDGE_TOLERANCE_PX,
  MARKER_SPAN_SEC,
  MIN_SEGMENT_DURATION_SEC,
  SNAP_THRESHOLD_PX,
} from '@/constants/timeline';
import { isTimelineError } from './errors';
import { TypedEmitter } from './TypedEmitter';
import {
  DEFAULT_LAYOUT,
  clampTime,
  clampZoom,
  nudgeTime,
  pixelToTime,
  placeSpan,
  timeToPixel,
  trackAtY,
  type TimelineLayout,
} from '@/utils/timeline';
import { collectSnapPoints, snapRange, snapThresholdSeconds, snapTime, type SnapPoint } from '@/utils/snapping';
import { createLogger } from '@/services/logger';

const logger = createLogger('InteractionController');

// =============================================================================
// Types
// =============================================================================

export type InteractionState =
  | 'idle'
  | 'selecting'
  | 'dragging'
  | 'resizing-start'
  | 'resizing-end'
  | 'creating-segment';

export interface Modifiers {
  shift?: boolean;
  ctrl?: boolean;
  meta?: boolean;
  alt?: boolean;
}

export interface PointerInput {
  x: number;
  y: number;
  modifiers?: Modifiers;
}

/** Range shown while a gesture is in progress */
export interface SegmentDraft {
  /** `null` while creating a new segment */
  segmentId: SegmentId | null;
  trackIndex: number;
  kind: SegmentKind;
  startTime: TimeSec;
  endTime: TimeSec;
  snapPoint?: SnapPoint;
}

export type HitResult =
  | { type: 'ruler' }
  | { type: 'outside' }
  | { type: 'edge'; segment: TimelineSegment; edge: 'start' | 'end' }
  | { type: 'body'; segment: TimelineSegment }
  | { type: 'empty'; trackIndex: number; time: TimeSec };

export type CursorHint = 'default' | 'move' | 'ew-resize';

export interface InteractionEvents {
  stateChange: { from: InteractionState; to: InteractionState };
  segmentSelected: { segmentId: SegmentId | null };
  timeClicked: { time: TimeSec };
  /** `draft` is null when a gesture ends */
  preview: { draft: SegmentDraft | null };
  segmentMoved: { segment: TimelineSegment };
  segmentResized: { segment: TimelineSegment; edge: 'start' | 'end' };
  segmentCreated: { segment: TimelineSegment };
  segmentDeleted: { segmentId: SegmentId };
}

export interface InteractionControllerConfig extends Partial<TimelineLayout> {
  edgeTolerancePx?: number;
  snapThresholdPx?: number;
  snapEnabled?: boolean;
  /** Kind given to segments created on empty track space */
  creationKind?: SegmentKind;
}

interface Gesture {
  state: Exclude<InteractionState, 'idle'>;
  anchorX: number;
  anchorStart: TimeSec;
  anchorEnd: TimeSec;
  draft: SegmentDraft;
}

// =============================================================================
// TimelineInteractionController Class
// =============================================================================

export class TimelineInteractionController extends TypedEmitter<InteractionEvents> {
  private _state: InteractionState = 'idle';
  private _gesture: Gesture | null = null;
  private _layout: TimelineLayout;
  private _snapEnabled: boolean;
  private _creationKind: SegmentKind;
  private readonly _edgeTolerancePx: number;
  private readonly _snapThresholdPx: number;
  private readonly _model: TimelineModelStore;

  constructor(model: TimelineModelStore, config: InteractionControllerConfig = {}) {
    super();
    this._model = model;
    const { edgeTolerancePx, snapThresholdPx, snapEnabled, creationKind, ...layout } = config;
    this._layout = { ...DEFAULT_LAYOUT, ...layout };
    this._layout.pixelsPerSecond = clampZoom(this._layout.pixelsPerSecond);
    this._edgeTolerancePx = edgeTolerancePx ?? EDGE_TOLERANCE_PX;
    this._snapThresholdPx = snapThresholdPx ?? SNAP_THRESHOLD_PX;
    this._snapEnabled = snapEnabled ?? true;
    this._creationKind = creationKind ?? 'animation';
  }

  // ---------------------------------------------------------------------------
  // Getters
  // ---------------------------------------------------------------------------

  get state(): InteractionState {
    return this._state;
  }

  get draft(): SegmentDraft | null {
    return this._gesture ? { ...this._gesture.draft } : null;
  }

  get layout(): Readonly<TimelineLayout> {
    return { ...this._layout };
  }

  get snapEnabled(): boolean {
    return this._snapEnabled;
  }

  get creationKind(): SegmentKind {
    return this._creationKind;
  }

  // ---------------------------------------------------------------------------
  // View Settings
  // ---------------------------------------------------------------------------

  /** @returns The zoom actually applied after clamping */
  setZoom(pixelsPerSecond: number): number {
    this._layout.pixelsPerSecond = clampZoom(pixelsPerSecond);
    return this._layout.pixelsPerSecond;
  }

  setScrollX(scrollX: number): void {
    this._layout.scrollX = Number.isFinite(scrollX) ? Math.max(0, scrollX) : 0;
  }

  setTrackCount(trackCount: number): void {
    this._layout.trackCount = Math.max(1, Math.floor(trackCount));
  }

  setSnapEnabled(enabled: boolean): void {
    this._snapEnabled = enabled;
  }

  setCreationKind(kind: SegmentKind): void {
    this._creationKind = kind;
  }

  // ---------------------------------------------------------------------------
  // Hit Testing
  // ---------------------------------------------------------------------------

  /**
   * Resolve what is under a point. Edge handles win over segment bodies;
   * among edges the nearest wins, and a start edge wins a tie.
   */
  hitTest(x: number, y: number): HitResult {
    if (y < this._layout.rulerHeight) {
      return { type: 'ruler' };
    }
    const trackIndex = trackAtY(y, this._layout);
    if (trackIndex === null) {
      return { type: 'outside' };
    }

    const edgeHit = this._findEdgeHit(x, trackIndex);
    if (edgeHit) {
      return edgeHit;
    }

    const time = pixelToTime(x, this._layout);
    const segment = this._model.getState().segmentAt(time, trackIndex);
    if (segment) {
      return { type: 'body', segment };
    }
    return { type: 'empty', trackIndex, time };
  }

  cursorAt(x: number, y: number): CursorHint {
    const hit = this.hitTest(x, y);
    if (hit.type === 'edge' && !hit.segment.locked) return 'ew-resize';
    if (hit.type === 'body' && !hit.segment.locked) return 'move';
    return 'default';
  }

  private _findEdgeHit(x: number, trackIndex: number): HitResult | null {
    let best: { segment: TimelineSegment; edge: 'start' | 'end'; distance: number } | null = null;

    for (const segment of this._model.getState().segments) {
      if (!segment.visible || segment.trackIndex !== trackIndex) continue;

      const startDistance = Math.abs(x - timeToPixel(segment.startTime, this._layout));
      if (startDistance < this._edgeTolerancePx && (!best || startDistance < best.distance)) {
        best = { segment, edge: 'start', distance: startDistance };
      }
      const endDistance = Math.abs(x - timeToPixel(segment.endTime, this._layout));
      if (endDistance < this._edgeTolerancePx && (!best || endDistance < best.distance)) {
        best = { segment, edge: 'end', distance: endDistance };
      }
    }

    return best ? { type: 'edge', segment: best.segment, edge: best.edge } : null;
  }

  // ---------------------------------------------------------------------------
  // Pointer Input
  // ---------------------------------------------------------------------------

  pointerDown(input: PointerInput): void {
    if (this._gesture) {
      this.cancel();
    }

    const hit = this.hitTest(input.x, input.y);
    switch (hit.type) {
      case 'ruler':
      case 'outside':
        this._seek(input.x);
        return;
      case 'edge':
      case 'body': {
        const { segment } = hit;
        this._select(segment.id);
        let state: Gesture['state'] = 'selecting';
        if (!segment.locked) {
          if (hit.type === 'body') {
            state = 'dragging';
          } else {
            state = hit.edge === 'start' ? 'resizing-start' : 'resizing-end';
          }
        }
        this._begin(state, input.x, {
          segmentId: segment.id,
          trackIndex: segment.trackIndex,
          kind: segment.kind,
          startTime: segment.startTime,
          endTime: segment.endTime,
        });
        return;
      }
      case 'empty':
        this._beginCreation(hit.trackIndex, hit.time, input.x);
        return;
    }
  }

  pointerMove(input: PointerInput): void {
    const gesture = this._gesture;
    if (!gesture || gesture.state === 'selecting') {
      return;
    }

    // No movement means no edit, snapping included
    if (input.x === gesture.anchorX) {
      gesture.draft = {
        ...gesture.draft,
        startTime: gesture.anchorStart,
        endTime: gesture.anchorEnd,
        snapPoint: undefined,
      };
      this._emit('preview', { draft: { ...gesture.draft } });
      return;
    }

    const { totalDuration } = this._model.getState();
    const deltaTime = (input.x - gesture.anchorX) / this._layout.pixelsPerSecond;
    const snapping = this._snapEnabled && !input.modifiers?.shift;
    const points = snapping ? this._snapPoints(gesture.draft.segmentId) : [];
    const threshold = snapThresholdSeconds(this._snapThresholdPx, this._layout.pixelsPerSecond);

    let startTime = gesture.anchorStart;
    let endTime = gesture.anchorEnd;
    let snapPoint: SnapPoint | undefined;

    switch (gesture.state) {
      case 'dragging': {
        const duration = gesture.anchorEnd - gesture.anchorStart;
        const maxStart = Math.max(0, totalDuration - duration);
        startTime = clampTime(gesture.anchorStart + deltaTime, 0, maxStart);
        if (snapping) {
          const snapped = snapRange(startTime, duration, points, threshold);
          startTime = clampTime(snapped.start, 0, maxStart);
          snapPoint = snapped.snapPoint;
        }
        ({ startTime, endTime } = placeSpan(startTime, duration, totalDuration));
        break;
      }
      case 'resizing-start': {
        const maxStart = Math.max(0, gesture.anchorEnd - MIN_SEGMENT_DURATION_SEC);
        startTime = clampTime(gesture.anchorStart + deltaTime, 0, maxStart);
        if (snapping) {
          const snapped = snapTime(startTime, points, threshold);
          startTime = clampTime(snapped.time, 0, maxStart);
          snapPoint = snapped.snapPoint;
        }
        while (endTime - startTime < MIN_SEGMENT_DURATION_SEC && startTime > 0) {
          startTime = Math.max(0, nudgeTime(startTime, -1));
        }
        break;
      }
      case 'resizing-end':
      case 'creating-segment': {
        const minEnd = Math.min(gesture.anchorStart + MIN_SEGMENT_DURATION_SEC, totalDuration);
        endTime = clampTime(gesture.anchorEnd + deltaTime, minEnd, totalDuration);
        if (snapping) {
          const snapped = snapTime(endTime, points, threshold);
          endTime = clampTime(snapped.time, minEnd, totalDuration);
          snapPoint = snapped.snapPoint;
        }
        while (endTime - startTime < MIN_SEGMENT_DURATION_SEC && endTime < totalDuration) {
          endTime = Math.min(totalDuration, nudgeTime(endTime, 1));
        }
        break;
      }
    }

    gesture.draft = { ...gesture.draft, startTime, endTime, snapPoint };
    this._emit('preview', { draft: { ...gesture.draft } });
  }

  pointerUp(input: PointerInput): void {
    if (!this._gesture) {
      return;
    }
    this.pointerMove(input);

    const gesture = this._gesture;
    this._gesture = null;
    this._commit(gesture);
    this._emit('preview', { draft: null });
    this._setState('idle');
  }

  /** Drop the active gesture without touching the model. */
  cancel(): void {
    if (!this._gesture) {
      return;
    }
    this._gesture = null;
    this._emit('preview', { draft: null });
    this._setState('idle');
  }

  // ---------------------------------------------------------------------------
  // Keyboard Input
  // ---------------------------------------------------------------------------

  /** @returns Whether the key was handled */
  keyDown(key: string, modifiers: Modifiers = {}): boolean {
    const command = modifiers.ctrl || modifiers.meta;

    if (key === 'Escape') {
      this.cancel();
      return true;
    }
    if (key === 'Delete' || key === 'Backspace') {
      return this.deleteSelected();
    }
    if (command && (key === 'd' || key === 'D')) {
      return this.duplicateSelected();
    }
    if (!command && (key === 'l' || key === 'L')) {
      return this.toggleSelectedLock();
    }
    return false;
  }

  /** Locked segments are kept. */
  deleteSelected(): boolean {
    const segment = this._selectedSegment();
    if (!segment || segment.locked) {
      return false;
    }
    this.cancel();
    this._model.getState().removeSegment(segment.id);
    this._emit('segmentSelected', { segmentId: null });
    this._emit('segmentDeleted', { segmentId: segment.id });
    return true;
  }

  duplicateSelected(): boolean {
    const segment = this._selectedSegment();
    if (!segment) {
      return false;
    }
    const result = this._model.getState().duplicateSegment(segment.id);
    if (!result.ok) {
      return false;
    }
    const copy = this._model.getState().getSegment(result.value);
    if (copy) {
      this._select(copy.id);
      this._emit('segmentCreated', { segment: copy });
    }
    return true;
  }

  toggleSelectedLock(): boolean {
    const segment = this._selectedSegment();
    if (!segment) {
      return false;
    }
    return this._model.getState().toggleSegmentLock(segment.id).ok;
  }

  dispose(): void {
    this.cancel();
    this._removeAllListeners();
  }

  // ---------------------------------------------------------------------------
  // Gesture Lifecycle
  // ---------------------------------------------------------------------------

  private _begin(state: Gesture['state'], anchorX: number, draft: SegmentDraft): void {
    this._gesture = {
      state,
      anchorX,
      anchorStart: draft.startTime,
      anchorEnd: draft.endTime,
      draft,
    };
    this._setState(state);
    logger.debug('Gesture started', { state, segmentId: draft.segmentId });
  }

  private _beginCreation(trackIndex: number, time: TimeSec, x: number): void {
    const { totalDuration } = this._model.getState();
    const kind = this._creationKind;
    const span = kind === 'marker' ? MARKER_SPAN_SEC : DEFAULT_SEGMENT_SPAN_SEC;
    const startTime = clampTime(time, 0, totalDuration);
    const endTime = Math.min(startTime + span, totalDuration);

    if (endTime <= startTime) {
      this._seek(x);
      return;
    }

    this._select(null);
    this._begin('creating-segment', x, { segmentId: null, trackIndex, kind, startTime, endTime });
    this._emit('preview', { draft: this.draft });
  }

  private _commit(gesture: Gesture): void {
    const { draft } = gesture;
    const model = this._model.getState();

    switch (gesture.state) {
      case 'selecting':
        return;
      case 'creating-segment': {
        try {
          const id = model.addSegment({
            trackIndex: draft.trackIndex,
            startTime: draft.startTime,
            endTime: draft.endTime,
            kind: draft.kind,
          });
          this._select(id);
          const segment = this._model.getState().getSegment(id);
          if (segment) {
            this._emit('segmentCreated', { segment });
          }
        } catch (error) {
          if (!isTimelineError(error)) throw error;
          logger.warn('Segment creation rejected', { error: error.toJSON() });
        }
        return;
      }
      case 'dragging':
      case 'resizing-start':
      case 'resizing-end': {
        if (draft.segmentId === null) return;
        if (draft.startTime === gesture.anchorStart && draft.endTime === gesture.anchorEnd) return;

        const result = model.updateSegmentTime(draft.segmentId, draft.startTime, draft.endTime);
        if (!result.ok) return;

        if (gesture.state === 'dragging') {
          this._emit('segmentMoved', { segment: result.value });
        } else {
          const edge = gesture.state === 'resizing-start' ? 'start' : 'end';
          this._emit('segmentResized', { segment: result.value, edge });
        }
        logger.debug('Gesture committed', { state: gesture.state, segmentId: draft.segmentId });
        return;
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private _seek(x: number): void {
    const model = this._model.getState();
    model.setCurrentTime(pixelToTime(x, this._layout));
    this._select(null);
    this._emit('timeClicked', { time: this._model.getState().currentTime });
  }

  private _select(id: SegmentId | null): void {
    if (this._model.getState().selectedSegmentId === id) {
      return;
    }
    this._model.getState().selectSegment(id);
    this._emit('segmentSelected', { segmentId: id });
  }

  private _selectedSegment(): TimelineSegment | undefined {
    const { selectedSegmentId, getSegment } = this._model.getState();
    return selectedSegmentId === null ? undefined : getSegment(selectedSegmentId);
  }

  private _snapPoints(excludeSegmentId: SegmentId | null): SnapPoint[] {
    const { segments, currentTime, totalDuration } = this._model.getState();
    return collectSnapPoints({ segments, playheadTime: currentTime, totalDuration, excludeSegmentId });
  }

  private _setState(next: InteractionState): void {
    const from = this._state;
    if (from === next) return;
    this._state = next;
    this._emit('stateChange', { from, to: next });
  }
}

