/**
 * Keyframe Interpolation
 *
 * Resolves an animated element's property map at a point in time from its
 * initial state, end state and easing. Pure: no caching, never throws, and
 * every call returns a fresh object.
 *
 * Numeric properties interpolate linearly along the eased progress. Other
 * values hold their initial value until eased progress passes 0.5 and then
 * switch to the end value.
 */

import type { AnimatedElement, ElementId, PropertyMap, PropertyValue, TimeSec } from '@/types';
import { ease } from './easing';

// =============================================================================
// Helpers
// =============================================================================

const hasOwn = (map: PropertyMap, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(map, key);

function interpolateValue(from: PropertyValue, to: PropertyValue, eased: number): PropertyValue {
  if (typeof from === 'number' && typeof to === 'number') {
    return from + (to - from) * eased;
  }
  return eased > 0.5 ? to : from;
}

/** Initial state with the end values applied to the keys it shares. */
function settledState(initial: PropertyMap, end: PropertyMap): PropertyMap {
  const state: PropertyMap = { ...initial };
  for (const key of Object.keys(initial)) {
    if (hasOwn(end, key)) {
      state[key] = end[key];
    }
  }
  return state;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Property map of `element` at `time`.
 *
 * - no animation, `time` before the start, or NaN: the initial state
 * - at or after the end (or a non-positive duration once started): the end state
 * - otherwise the eased blend of the two
 */
export function stateAt(element: AnimatedElement, time: TimeSec): PropertyMap {
  const initial = element.initialState;
  const animation = element.animation;

  if (!animation || Number.isNaN(time) || time < animation.startTime) {
    return { ...initial };
  }

  const { startTime, duration, easing, endState } = animation;
  if (!(duration > 0) || !Number.isFinite(duration) || time >= startTime + duration) {
    return settledState(initial, endState);
  }

  const eased = ease(easing, (time - startTime) / duration);
  const state: PropertyMap = {};
  for (const [key, from] of Object.entries(initial)) {
    state[key] = hasOwn(endState, key) ? interpolateValue(from, endState[key], eased) : from;
  }
  return state;
}

/** Evaluate every element at `time`, keyed by element id. */
export function sampleElements(
  elements: readonly AnimatedElement[],
  time: TimeSec,
): Map<ElementId, PropertyMap> {
  const frame = new Map<ElementId, PropertyMap>();
  for (const element of elements) {
    frame.set(element.id, stateAt(element, time));
  }
  return frame;
}

/** Time at which the element stops changing; 0 for static elements. */
export function getAnimationEndTime(element: AnimatedElement): TimeSec {
  const animation = element.animation;
  if (!animation) return 0;
  return animation.startTime + Math.max(0, animation.duration);
}

export function getElementsEndTime(elements: readonly AnimatedElement[]): TimeSec {
  return elements.reduce((latest, element) => Math.max(latest, getAnimationEndTime(element)), 0);
}
