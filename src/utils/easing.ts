/**
 * Easing Library
 *
 * Maps a normalized progress value in [0, 1] to an eased value.
 * Endpoints are pinned so every curve returns exactly 0 and 1 at the ends.
 */

import { EASING_NAMES, type EasingName } from '@/types';
import { UnknownEasingWarning } from '@/core/errors';
import { createLogger } from '@/services/logger';

const logger = createLogger('Easing');

// =============================================================================
// Types
// =============================================================================

export type EasingFunction = (t: number) => number;

// =============================================================================
// Curves
// =============================================================================

/** Standard bounce-out bands */
const BOUNCE_N = 7.5625;
const BOUNCE_D = 2.75;

function bounceOut(t: number): number {
  if (t < 1 / BOUNCE_D) {
    return BOUNCE_N * t * t;
  }
  if (t < 2 / BOUNCE_D) {
    const u = t - 1.5 / BOUNCE_D;
    return BOUNCE_N * u * u + 0.75;
  }
  if (t < 2.5 / BOUNCE_D) {
    const u = t - 2.25 / BOUNCE_D;
    return BOUNCE_N * u * u + 0.9375;
  }
  const u = t - 2.625 / BOUNCE_D;
  return BOUNCE_N * u * u + 0.984375;
}

export const easingFunctions: Record<EasingName, EasingFunction> = {
  linear: (t) => t,
  'ease-in': (t) => t * t,
  'ease-out': (t) => 1 - (1 - t) * (1 - t),
  'ease-in-out': (t) => (t < 0.5 ? 2 * t * t : 1 - 2 * (1 - t) * (1 - t)),
  bounce: bounceOut,
};

// =============================================================================
// Lookup
// =============================================================================

export { EASING_NAMES };

export function isEasingName(name: string): name is EasingName {
  return EASING_NAMES.some((candidate) => candidate === name);
}

/** Names already reported, so a bad name in a 60fps loop warns once. */
const reportedUnknownNames = new Set<string>();

/**
 * Resolve an easing by name. Unknown names resolve to linear and are
 * reported once through the logger.
 */
export function resolveEasing(name: string): EasingFunction {
  if (isEasingName(name)) {
    return easingFunctions[name];
  }

  if (!reportedUnknownNames.has(name)) {
    reportedUnknownNames.add(name);
    const warning = new UnknownEasingWarning(name);
    logger.warn(warning.message, { warning: warning.toJSON() });
  }
  return easingFunctions.linear;
}

/**
 * Ease a progress value. Progress is clamped to [0, 1]; NaN counts as 0.
 */
export function ease(name: string, t: number): number {
  const fn = resolveEasing(name);
  if (!(t > 0)) return 0;
  if (t >= 1) return 1;
  return fn(t);
}

/** Forget reported names. Used by tests. */
export function resetEasingWarnings(): void {
  reportedUnknownNames.clear();
}
