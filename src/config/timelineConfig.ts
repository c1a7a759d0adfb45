/**
 * Timeline Configuration
 *
 * Typed engine settings with defaults in code and overrides from the
 * environment, for hosts that configure the engine the same way they
 * configure everything else.
 *
 * | Variable                  | Field          |
 * |---------------------------|----------------|
 * | `TIMELINE_LOG_LEVEL`      | logLevel       |
 * | `TIMELINE_TOTAL_DURATION` | totalDuration  |
 * | `TIMELINE_TICK_MS`        | tickIntervalMs |
 * | `TIMELINE_SYNC_MODE`      | syncSource     |
 * | `TIMELINE_LOOP`           | loop           |
 * | `TIMELINE_SPEED`          | speedFactor    |
 * | `TIMELINE_ZOOM`           | pixelsPerSecond|
 * | `TIMELINE_TRACKS`         | trackCount     |
 * | `TIMELINE_SNAP`           | snapEnabled    |
 *
 * @example
 * ```typescript
 * const config = loadTimelineConfigFromEnv();
 * initializeLogger({ level: resolveLogLevel(config) });
 * ```
 */

import { z } from 'zod';
import {
  DEFAULT_PIXELS_PER_SECOND,
  DEFAULT_TOTAL_DURATION_SEC,
  DEFAULT_TRACK_COUNT,
  MAX_PIXELS_PER_SECOND,
  MIN_PIXELS_PER_SECOND,
  TICK_INTERVAL_MS,
} from '@/constants/timeline';
import { LogLevel, parseLogLevel } from '@/services/logger';
import { parseOrThrow } from '@/schemas/validation';

// =============================================================================
// Schema
// =============================================================================

const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const BooleanFlagSchema = z.union([
  z.boolean(),
  z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform((value) => value === 'true' || value === '1' || value === 'yes'),
]);

export const TimelineConfigSchema = z
  .object({
    logLevel: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(z.enum(LOG_LEVEL_NAMES))
      .default('warn'),
    totalDuration: z.coerce.number().finite().positive().default(DEFAULT_TOTAL_DURATION_SEC),
    tickIntervalMs: z.coerce.number().int().positive().default(TICK_INTERVAL_MS),
    syncSource: z.enum(['internal', 'audio']).default('internal'),
    loop: BooleanFlagSchema.default(false),
    speedFactor: z.coerce.number().finite().positive().default(1),
    pixelsPerSecond: z.coerce
      .number()
      .min(MIN_PIXELS_PER_SECOND)
      .max(MAX_PIXELS_PER_SECOND)
      .default(DEFAULT_PIXELS_PER_SECOND),
    trackCount: z.coerce.number().int().min(1).default(DEFAULT_TRACK_COUNT),
    snapEnabled: BooleanFlagSchema.default(true),
  })
  .strict();

export type TimelineConfig = z.output<typeof TimelineConfigSchema>;
export type TimelineConfigInput = z.input<typeof TimelineConfigSchema>;

// =============================================================================
// Environment
// =============================================================================

const ENV_VARIABLES: Record<keyof TimelineConfig, string> = {
  logLevel: 'TIMELINE_LOG_LEVEL',
  totalDuration: 'TIMELINE_TOTAL_DURATION',
  tickIntervalMs: 'TIMELINE_TICK_MS',
  syncSource: 'TIMELINE_SYNC_MODE',
  loop: 'TIMELINE_LOOP',
  speedFactor: 'TIMELINE_SPEED',
  pixelsPerSecond: 'TIMELINE_ZOOM',
  trackCount: 'TIMELINE_TRACKS',
  snapEnabled: 'TIMELINE_SNAP',
};

// =============================================================================
// Public API
// =============================================================================

/** Validate a config object, filling defaults. Throws `TimelineValidationError`. */
export function parseTimelineConfig(input: unknown = {}): TimelineConfig {
  return parseOrThrow(TimelineConfigSchema, input, 'Invalid timeline configuration');
}

/**
 * Build the config from environment variables, then apply explicit
 * overrides. Blank variables are ignored.
 */
export function loadTimelineConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: TimelineConfigInput = {},
): TimelineConfig {
  const fromEnv: Record<string, string> = {};
  for (const [field, variable] of Object.entries(ENV_VARIABLES)) {
    const value = env[variable]?.trim();
    if (value) {
      fromEnv[field] = value;
    }
  }
  return parseTimelineConfig({ ...fromEnv, ...overrides });
}

export function resolveLogLevel(config: Pick<TimelineConfig, 'logLevel'>): LogLevel {
  return parseLogLevel(config.logLevel) ?? LogLevel.WARN;
}
