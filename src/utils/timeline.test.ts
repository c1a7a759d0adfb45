/**
 * Timeline Layout Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_LAYOUT,
  clampTime,
  clampZoom,
  formatTime,
  nudgeTime,
  pixelToTime,
  placeSpan,
  timeToPixel,
  trackAtY,
  trackTop,
  type TimelineLayout,
} from './timeline';

const layout: TimelineLayout = { ...DEFAULT_LAYOUT };

// =============================================================================
// Time <-> Pixel Conversion Tests
// =============================================================================

describe('timeToPixel / pixelToTime', () => {
  it('converts at the default zoom', () => {
    expect(timeToPixel(2, layout)).toBe(100);
    expect(pixelToTime(125, layout)).toBe(2.5);
  });

  it('applies the scroll offset', () => {
    const scrolled = { ...layout, scrollX: 50 };
    expect(timeToPixel(2, scrolled)).toBe(50);
    expect(pixelToTime(50, scrolled)).toBe(2);
  });

  it('guards against unusable input', () => {
    expect(timeToPixel(Number.NaN, layout)).toBe(0);
    expect(pixelToTime(100, { ...layout, pixelsPerSecond: 0 })).toBe(0);
  });
});

// =============================================================================
// Track Geometry Tests
// =============================================================================

describe('trackAtY', () => {
  it('returns null over the ruler', () => {
    expect(trackAtY(29, layout)).toBeNull();
  });

  it('maps rows of track height plus spacing', () => {
    expect(trackAtY(30, layout)).toBe(0);
    expect(trackAtY(74, layout)).toBe(0);
    expect(trackAtY(75, layout)).toBe(1);
    expect(trackAtY(209, layout)).toBe(3);
  });

  it('returns null below the last track', () => {
    expect(trackAtY(210, layout)).toBeNull();
  });

  it('locates track tops', () => {
    expect(trackTop(2, layout)).toBe(120);
  });
});

// =============================================================================
// Clamping & Formatting Tests
// =============================================================================

describe('clamping', () => {
  it('clamps time and zoom', () => {
    expect(clampTime(-1)).toBe(0);
    expect(clampTime(12, 0, 10)).toBe(10);
    expect(clampZoom(5)).toBe(10);
    expect(clampZoom(500)).toBe(200);
    expect(clampZoom(Number.NaN)).toBe(50);
  });
});

describe('formatTime', () => {
  it('formats minutes and seconds', () => {
    expect(formatTime(0)).toBe('00:00');
    expect(formatTime(75.9)).toBe('01:15');
    expect(formatTime(-3)).toBe('00:00');
  });
});

describe('float placement', () => {
  it('nudges by one step in either direction', () => {
    expect(nudgeTime(1, 1)).toBe(1 + Number.EPSILON);
    expect(nudgeTime(1, -1)).toBe(1 - Number.EPSILON);
    expect(nudgeTime(0, 1)).toBe(Number.MIN_VALUE);
  });

  it('keeps dyadic spans exact at any position', () => {
    for (const start of [0.13, 1.37, 2.718, 5.55, 7.999]) {
      for (const duration of [2, 1.25]) {
        const { startTime, endTime } = placeSpan(start, duration, 10);
        expect(endTime - startTime).toBe(duration);
      }
    }
  });

  it('keeps the span inside the timeline', () => {
    expect(placeSpan(9.5, 2, 10)).toEqual({ startTime: 8, endTime: 10 });
    expect(placeSpan(0, 2, 10)).toEqual({ startTime: 0, endTime: 2 });
  });
});
