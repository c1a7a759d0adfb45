import { describe, it, expect } from 'vitest';
import * as api from './index';

describe('public API', () => {
  it('should expose the session factory and its parts', () => {
    expect(typeof api.createTimelineSession).toBe('function');
    expect(typeof api.createTimelineModelStore).toBe('function');
    expect(api.PlaybackClock).toBeDefined();
    expect(api.TimelineInteractionController).toBeDefined();
    expect(api.FrameDriver).toBeDefined();
  });

  it('should publish only constants the engine reads', () => {
    expect(api.KIND_COLORS.marker).toBe('#F44336');
    expect(api.MIN_SEGMENT_DURATION_SEC).toBe(0.1);
    expect(Object.keys(api)).not.toContain('COLOR_PRESETS');
    expect(Object.keys(api)).not.toContain('DEFAULT_TRACK_NAMES');
  });

  it('should carry a timeline through export and import', () => {
    const source = api.createTimelineModelStore({ totalDuration: 6 });
    source.getState().addSegment({ trackIndex: 3, startTime: 2, endTime: 2.1, kind: 'marker' });

    const target = api.createTimelineModelStore();
    api.importTimelineJson(target, api.exportTimelineJson(source));

    expect(target.getState().totalDuration).toBe(6);
    expect(target.getState().segments).toEqual(source.getState().segments);
  });
});
