/**
 * TimelineInteractionController Tests
 *
 * Default layout: 50 px/s, 30 px ruler, 40 px tracks with 5 px spacing.
 * Track 0 spans y 30-74 and track 1 spans y 75-119.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TimelineInteractionController, type SegmentDraft } from './TimelineInteractionController';
import { createTimelineModelStore, type TimelineModelStore } from '@/stores/timelineModelStore';

const TRACK_0_Y = 50;
const TRACK_1_Y = 95;

function sequentialIds(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `seg-${next}`;
  };
}

describe('TimelineInteractionController', () => {
  let model: TimelineModelStore;
  let controller: TimelineInteractionController;
  let segmentId: string;

  beforeEach(() => {
    model = createTimelineModelStore({ totalDuration: 10, createId: sequentialIds() });
    // 100 px to 200 px on track 0
    segmentId = model.getState().addSegment({ trackIndex: 0, startTime: 2, endTime: 4, kind: 'animation' });
    controller = new TimelineInteractionController(model);
  });

  afterEach(() => {
    controller.dispose();
  });

  const segment = () => model.getState().getSegment(segmentId);

  // ===========================================================================
  // Hit Testing
  // ===========================================================================

  describe('hitTest', () => {
    it('should resolve ruler, body, edge, empty and outside', () => {
      expect(controller.hitTest(150, 10)).toEqual({ type: 'ruler' });
      expect(controller.hitTest(150, TRACK_0_Y)).toMatchObject({ type: 'body', segment: { id: segmentId } });
      expect(controller.hitTest(104, TRACK_0_Y)).toMatchObject({ type: 'edge', edge: 'start' });
      expect(controller.hitTest(196, TRACK_0_Y)).toMatchObject({ type: 'edge', edge: 'end' });
      expect(controller.hitTest(300, TRACK_1_Y)).toEqual({ type: 'empty', trackIndex: 1, time: 6 });
      expect(controller.hitTest(300, 500)).toEqual({ type: 'outside' });
    });

    it('should require the pointer strictly inside the edge tolerance', () => {
      expect(controller.hitTest(108, TRACK_0_Y)).toMatchObject({ type: 'body' });
      expect(controller.hitTest(92, TRACK_0_Y)).toMatchObject({ type: 'empty' });
    });

    it('should ignore hidden segments', () => {
      model.getState().updateSegment(segmentId, { visible: false });
      expect(controller.hitTest(150, TRACK_0_Y)).toMatchObject({ type: 'empty' });
      expect(controller.hitTest(100, TRACK_0_Y)).toMatchObject({ type: 'empty' });
    });

    it('should report cursor hints', () => {
      expect(controller.cursorAt(100, TRACK_0_Y)).toBe('ew-resize');
      expect(controller.cursorAt(150, TRACK_0_Y)).toBe('move');
      expect(controller.cursorAt(300, TRACK_0_Y)).toBe('default');

      model.getState().toggleSegmentLock(segmentId);
      expect(controller.cursorAt(150, TRACK_0_Y)).toBe('default');
    });

    it('should follow the zoom level', () => {
      expect(controller.setZoom(100)).toBe(100);
      // segment now spans 200 px to 400 px
      expect(controller.hitTest(300, TRACK_0_Y)).toMatchObject({ type: 'body' });
      expect(controller.hitTest(150, TRACK_0_Y)).toMatchObject({ type: 'empty' });
    });

    it('should clamp the zoom level', () => {
      expect(controller.setZoom(5)).toBe(10);
      expect(controller.setZoom(500)).toBe(200);
    });
  });

  // ===========================================================================
  // Dragging
  // ===========================================================================

  describe('dragging', () => {
    it('should select and enter dragging on a body press', () => {
      const selected = vi.fn();
      const stateChange = vi.fn();
      controller.on('segmentSelected', selected);
      controller.on('stateChange', stateChange);

      controller.pointerDown({ x: 150, y: TRACK_0_Y });

      expect(controller.state).toBe('dragging');
      expect(model.getState().selectedSegmentId).toBe(segmentId);
      expect(selected).toHaveBeenCalledWith({ segmentId });
      expect(stateChange).toHaveBeenCalledWith({ from: 'idle', to: 'dragging' });
    });

    it('should preview without touching the model, then commit on release', () => {
      const previews: Array<SegmentDraft | null> = [];
      const moved = vi.fn();
      controller.on('preview', ({ draft }) => previews.push(draft));
      controller.on('segmentMoved', moved);

      controller.pointerDown({ x: 150, y: TRACK_0_Y });
      controller.pointerMove({ x: 175, y: TRACK_0_Y });

      expect(previews[0]).toMatchObject({ segmentId, startTime: 2.5, endTime: 4.5 });
      expect(segment()).toMatchObject({ startTime: 2, endTime: 4 });

      controller.pointerUp({ x: 175, y: TRACK_0_Y });

      expect(segment()).toMatchObject({ startTime: 2.5, endTime: 4.5 });
      expect(moved).toHaveBeenCalledWith({ segment: expect.objectContaining({ startTime: 2.5, endTime: 4.5 }) });
      expect(previews[previews.length - 1]).toBeNull();
      expect(controller.state).toBe('idle');
    });

    it('should clamp at both ends of the timeline', () => {
      controller.pointerDown({ x: 150, y: TRACK_0_Y });
      controller.pointerMove({ x: -500, y: TRACK_0_Y });
      expect(controller.draft).toMatchObject({ startTime: 0, endTime: 2 });

      controller.pointerMove({ x: 1000, y: TRACK_0_Y });
      expect(controller.draft).toMatchObject({ startTime: 8, endTime: 10 });

      controller.pointerUp({ x: 1000, y: TRACK_0_Y });
      expect(segment()).toMatchObject({ startTime: 8, endTime: 10 });
    });

    it('should recompute from the anchor so many moves end where one move would', () => {
      controller.pointerDown({ x: 150, y: TRACK_0_Y });
      for (let x = 151; x <= 163; x += 1) {
        controller.pointerMove({ x, y: TRACK_0_Y, modifiers: { shift: true } });
      }
      const afterMany = controller.draft;
      controller.pointerMove({ x: 150, y: TRACK_0_Y, modifiers: { shift: true } });
      controller.pointerMove({ x: 163, y: TRACK_0_Y, modifiers: { shift: true } });

      expect(controller.draft).toEqual(afterMany);
      const draft = controller.draft;
      expect(draft ? draft.endTime - draft.startTime : 0).toBeCloseTo(2, 12);
    });

    it('should snap an edge onto another segment', () => {
      model.getState().addSegment({ trackIndex: 1, startTime: 5, endTime: 7, kind: 'pause' });

      controller.pointerDown({ x: 150, y: TRACK_0_Y });
      controller.pointerMove({ x: 197, y: TRACK_0_Y });

      expect(controller.draft).toMatchObject({
        startTime: 3,
        endTime: 5,
        snapPoint: { time: 5, type: 'segment-start', segmentId: 'seg-2' },
      });
    });

    it('should not snap while shift is held', () => {
      model.getState().addSegment({ trackIndex: 1, startTime: 5, endTime: 7, kind: 'pause' });

      controller.pointerDown({ x: 150, y: TRACK_0_Y });
      controller.pointerMove({ x: 197, y: TRACK_0_Y, modifiers: { shift: true } });

      expect(controller.draft?.startTime).toBeCloseTo(2.94, 10);
      expect(controller.draft?.endTime).toBeCloseTo(4.94, 10);
    });

    it('should not commit a click without movement', () => {
      const moved = vi.fn();
      const listener = vi.fn();
      controller.on('segmentMoved', moved);
      model.subscribe(listener);

      controller.pointerDown({ x: 150, y: TRACK_0_Y });
      listener.mockClear();
      controller.pointerUp({ x: 150, y: TRACK_0_Y });

      expect(moved).not.toHaveBeenCalled();
      expect(listener).not.toHaveBeenCalled();
    });

    it('should leave a clicked segment in place beside the playhead', () => {
      const nearId = model.getState().addSegment({ trackIndex: 1, startTime: 1.1, endTime: 3, kind: 'pause' });
      model.getState().setCurrentTime(1);
      const moved = vi.fn();
      controller.on('segmentMoved', moved);

      controller.pointerDown({ x: 100, y: TRACK_1_Y });
      expect(controller.state).toBe('dragging');
      controller.pointerUp({ x: 100, y: TRACK_1_Y });

      expect(model.getState().getSegment(nearId)).toMatchObject({ startTime: 1.1, endTime: 3 });
      expect(moved).not.toHaveBeenCalled();
    });

    it('should restore the anchor range when the pointer returns', () => {
      controller.pointerDown({ x: 150, y: TRACK_0_Y });
      controller.pointerMove({ x: 175, y: TRACK_0_Y });
      controller.pointerMove({ x: 150, y: TRACK_0_Y });

      expect(controller.draft).toMatchObject({ startTime: 2, endTime: 4, snapPoint: undefined });
    });

    it('should keep the duration exact for any drag offset', () => {
      for (const offset of [1, 3, 7, 13, 29, 57, -17, -63, 111, 250, -500]) {
        const local = createTimelineModelStore({ totalDuration: 10 });
        const id = local.getState().addSegment({ trackIndex: 0, startTime: 2, endTime: 4, kind: 'animation' });
        const dragger = new TimelineInteractionController(local);

        dragger.pointerDown({ x: 150, y: TRACK_0_Y });
        dragger.pointerUp({ x: 150 + offset, y: TRACK_0_Y, modifiers: { shift: true } });

        const moved = local.getState().getSegment(id);
        expect((moved?.endTime ?? 0) - (moved?.startTime ?? 0)).toBe(2);
        dragger.dispose();
      }
    });
  });

  // ===========================================================================
  // Resizing
  // ===========================================================================

  describe('resizing', () => {
    it('should resize the start edge and keep the minimum gap', () => {
      const resized = vi.fn();
      controller.on('segmentResized', resized);

      controller.pointerDown({ x: 104, y: TRACK_0_Y });
      expect(controller.state).toBe('resizing-start');

      controller.pointerMove({ x: 250, y: TRACK_0_Y });
      controller.pointerUp({ x: 250, y: TRACK_0_Y });

      const current = segment();
      expect(current?.endTime).toBe(4);
      expect(current?.startTime).toBeCloseTo(3.9, 10);
      expect(resized).toHaveBeenCalledWith({ segment: expect.objectContaining({ endTime: 4 }), edge: 'start' });
    });

    it('should not let the start edge go below zero', () => {
      controller.pointerDown({ x: 100, y: TRACK_0_Y });
      controller.pointerUp({ x: -400, y: TRACK_0_Y });
      expect(segment()).toMatchObject({ startTime: 0, endTime: 4 });
    });

    it('should resize the end edge and never cross the start', () => {
      controller.pointerDown({ x: 197, y: TRACK_0_Y });
      expect(controller.state).toBe('resizing-end');

      controller.pointerMove({ x: 0, y: TRACK_0_Y });
      controller.pointerUp({ x: 0, y: TRACK_0_Y });

      const current = segment();
      expect(current?.startTime).toBe(2);
      expect(current?.endTime).toBeCloseTo(2.1, 10);
      expect((current?.endTime ?? 0) - (current?.startTime ?? 0)).toBeGreaterThanOrEqual(0.1);
    });

    it('should hold the minimum gap for any range when an edge overshoots', () => {
      const ranges: Array<[number, number]> = [
        [3, 5],
        [0.7, 1.3],
        [6.2, 7.9],
        [1.1, 4.3],
      ];
      for (const [start, end] of ranges) {
        for (const edge of ['start', 'end'] as const) {
          const local = createTimelineModelStore({ totalDuration: 10 });
          const id = local.getState().addSegment({ trackIndex: 0, startTime: start, endTime: end, kind: 'pause' });
          const resizer = new TimelineInteractionController(local);
          const x = (edge === 'start' ? start : end) * 50;
          const overshoot = edge === 'start' ? 1000 : -1000;

          resizer.pointerDown({ x, y: TRACK_0_Y });
          expect(resizer.state).toBe(edge === 'start' ? 'resizing-start' : 'resizing-end');
          resizer.pointerUp({ x: x + overshoot, y: TRACK_0_Y, modifiers: { shift: true } });

          const resized = local.getState().getSegment(id);
          expect((resized?.endTime ?? 0) - (resized?.startTime ?? 0)).toBeGreaterThanOrEqual(0.1);
          expect(edge === 'start' ? resized?.endTime : resized?.startTime).toBe(edge === 'start' ? end : start);
          resizer.dispose();
        }
      }
    });

    it('should leave a clicked edge in place beside the playhead', () => {
      const nearId = model.getState().addSegment({ trackIndex: 1, startTime: 2, endTime: 4.1, kind: 'pause' });
      model.getState().setCurrentTime(4);
      const resized = vi.fn();
      controller.on('segmentResized', resized);

      controller.pointerDown({ x: 206, y: TRACK_1_Y });
      expect(controller.state).toBe('resizing-end');
      controller.pointerUp({ x: 206, y: TRACK_1_Y });

      expect(model.getState().getSegment(nearId)).toMatchObject({ startTime: 2, endTime: 4.1 });
      expect(resized).not.toHaveBeenCalled();
    });

    it('should not let the end edge pass the timeline end', () => {
      controller.pointerDown({ x: 200, y: TRACK_0_Y });
      controller.pointerUp({ x: 2000, y: TRACK_0_Y });
      expect(segment()).toMatchObject({ startTime: 2, endTime: 10 });
    });
  });

  // ===========================================================================
  // Locked Segments
  // ===========================================================================

  describe('locked segments', () => {
    beforeEach(() => {
      model.getState().toggleSegmentLock(segmentId);
    });

    it('should select without starting a gesture', () => {
      const preview = vi.fn();
      controller.on('preview', preview);

      controller.pointerDown({ x: 150, y: TRACK_0_Y });
      expect(controller.state).toBe('selecting');
      expect(model.getState().selectedSegmentId).toBe(segmentId);

      controller.pointerMove({ x: 300, y: TRACK_0_Y });
      controller.pointerUp({ x: 300, y: TRACK_0_Y });

      expect(preview).toHaveBeenCalledTimes(1);
      expect(preview).toHaveBeenCalledWith({ draft: null });
      expect(segment()).toMatchObject({ startTime: 2, endTime: 4 });
      expect(controller.state).toBe('idle');
    });

    it('should not resize from an edge', () => {
      controller.pointerDown({ x: 100, y: TRACK_0_Y });
      expect(controller.state).toBe('selecting');
    });

    it('should refuse to delete', () => {
      controller.pointerDown({ x: 150, y: TRACK_0_Y });
      controller.pointerUp({ x: 150, y: TRACK_0_Y });

      expect(controller.keyDown('Delete')).toBe(false);
      expect(segment()).toBeDefined();
    });
  });

  // ===========================================================================
  // Creating Segments
  // ===========================================================================

  describe('creating segments', () => {
    it('should create a two second segment on empty track space', () => {
      const created = vi.fn();
      controller.on('segmentCreated', created);

      controller.pointerDown({ x: 300, y: TRACK_1_Y });
      expect(controller.state).toBe('creating-segment');
      expect(controller.draft).toEqual({
        segmentId: null,
        trackIndex: 1,
        kind: 'animation',
        startTime: 6,
        endTime: 8,
      });

      controller.pointerUp({ x: 300, y: TRACK_1_Y });

      expect(model.getState().getSegment('seg-2')).toMatchObject({
        trackIndex: 1,
        startTime: 6,
        endTime: 8,
        name: 'New animation',
      });
      expect(model.getState().selectedSegmentId).toBe('seg-2');
      expect(created).toHaveBeenCalledWith({ segment: expect.objectContaining({ id: 'seg-2' }) });
    });

    it('should size the new segment by dragging', () => {
      controller.pointerDown({ x: 300, y: TRACK_1_Y });
      controller.pointerUp({ x: 400, y: TRACK_1_Y });
      expect(model.getState().getSegment('seg-2')).toMatchObject({ startTime: 6, endTime: 10 });
    });

    it('should create markers as a sliver', () => {
      controller.setCreationKind('marker');

      controller.pointerDown({ x: 300, y: TRACK_1_Y });
      controller.pointerUp({ x: 300, y: TRACK_1_Y });

      expect(model.getState().getSegment('seg-2')).toMatchObject({
        kind: 'marker',
        startTime: 6,
        endTime: 6.1,
        color: '#F44336',
      });
    });

    it('should clip the default span at the timeline end', () => {
      controller.pointerDown({ x: 475, y: TRACK_1_Y });
      expect(controller.draft).toMatchObject({ startTime: 9.5, endTime: 10 });
    });

    it('should seek instead when no span fits', () => {
      const clicked = vi.fn();
      controller.on('timeClicked', clicked);

      controller.pointerDown({ x: 500, y: TRACK_1_Y });

      expect(controller.state).toBe('idle');
      expect(clicked).toHaveBeenCalledWith({ time: 10 });
    });

    it('should drop the draft on cancel', () => {
      controller.pointerDown({ x: 300, y: TRACK_1_Y });
      expect(controller.keyDown('Escape')).toBe(true);

      expect(controller.state).toBe('idle');
      expect(model.getState().segments).toHaveLength(1);
    });
  });

  // ===========================================================================
  // Seeking
  // ===========================================================================

  describe('seeking', () => {
    it('should seek and clear the selection on a ruler click', () => {
      const clicked = vi.fn();
      controller.on('timeClicked', clicked);
      model.getState().selectSegment(segmentId);

      controller.pointerDown({ x: 250, y: 10 });

      expect(model.getState().currentTime).toBe(5);
      expect(model.getState().selectedSegmentId).toBeNull();
      expect(clicked).toHaveBeenCalledWith({ time: 5 });
      expect(controller.state).toBe('idle');
    });

    it('should seek below the last track', () => {
      controller.pointerDown({ x: 100, y: 500 });
      expect(model.getState().currentTime).toBe(2);
    });

    it('should account for horizontal scroll', () => {
      controller.setScrollX(100);
      controller.pointerDown({ x: 50, y: 10 });
      expect(model.getState().currentTime).toBe(3);
    });
  });

  // ===========================================================================
  // Keyboard
  // ===========================================================================

  describe('keyboard', () => {
    beforeEach(() => {
      controller.pointerDown({ x: 150, y: TRACK_0_Y });
      controller.pointerUp({ x: 150, y: TRACK_0_Y });
    });

    it('should delete the selected segment', () => {
      const deleted = vi.fn();
      controller.on('segmentDeleted', deleted);

      expect(controller.keyDown('Backspace')).toBe(true);

      expect(model.getState().segments).toHaveLength(0);
      expect(deleted).toHaveBeenCalledWith({ segmentId });
    });

    it('should duplicate with ctrl+d and select the copy', () => {
      expect(controller.keyDown('d', { ctrl: true })).toBe(true);

      expect(model.getState().getSegment('seg-2')).toMatchObject({ startTime: 4, endTime: 6 });
      expect(model.getState().selectedSegmentId).toBe('seg-2');
    });

    it('should toggle the lock with l', () => {
      expect(controller.keyDown('l')).toBe(true);
      expect(segment()?.locked).toBe(true);
    });

    it('should ignore unbound keys', () => {
      expect(controller.keyDown('x')).toBe(false);
      expect(controller.keyDown('d')).toBe(false);
    });

    it('should cancel a drag on escape without committing', () => {
      controller.pointerDown({ x: 150, y: TRACK_0_Y });
      controller.pointerMove({ x: 250, y: TRACK_0_Y });
      controller.keyDown('Escape');

      expect(segment()).toMatchObject({ startTime: 2, endTime: 4 });
      expect(controller.draft).toBeNull();
    });
  });
});
