/**
 * Timeline Schemas
 *
 * Runtime validation for timeline export payloads and for the animated
 * elements produced by the description converter. Both arrive from outside
 * the engine, so nothing is trusted until it passes through here.
 */

import { z } from 'zod';
import {
  SEGMENT_KINDS,
  type AnimatedElement,
  type SegmentKind,
  type TimelineExport,
  type TimelineSegment,
} from '@/types';
import { DEFAULT_TOTAL_DURATION_SEC, HEX_COLOR_PATTERN } from '@/constants/timeline';
import { TimelineValidationError } from '@/core/errors';
import type { TimelineModelStore } from '@/stores/timelineModelStore';
import { defaultColorFor } from '@/utils/segment';
import { parseOrThrow } from './validation';
import { createLogger } from '@/services/logger';

const logger = createLogger('TimelineSchemas');

// =============================================================================
// Segment Schemas
// =============================================================================

const SegmentKindSchema = z.enum(SEGMENT_KINDS) satisfies z.ZodType<SegmentKind>;

const HexColorSchema = z.string().regex(HEX_COLOR_PATTERN, { message: 'color must be #RRGGBB' });

const SegmentExportSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    kind: SegmentKindSchema,
    startTime: z.number().finite().nonnegative(),
    endTime: z.number().finite(),
    color: HexColorSchema.optional(),
    description: z.string().default(''),
    locked: z.boolean().default(false),
    visible: z.boolean().default(true),
    trackIndex: z.number().int().nonnegative(),
  })
  .refine((segment) => segment.endTime > segment.startTime, {
    message: 'endTime must be after startTime',
    path: ['endTime'],
  });

export const TimelineExportSchema = z
  .object({
    duration: z.number().finite().positive().default(DEFAULT_TOTAL_DURATION_SEC),
    segments: z.array(SegmentExportSchema).default([]),
    audioFileRef: z.string().default(''),
  })
  .superRefine((timeline, ctx) => {
    timeline.segments.forEach((segment, index) => {
      if (segment.endTime > timeline.duration) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['segments', index, 'endTime'],
          message: `endTime exceeds duration ${timeline.duration}`,
        });
      }
    });
  });

// =============================================================================
// Animated Element Schemas
// =============================================================================

const PropertyValueSchema = z.union([z.number().finite(), z.string(), z.boolean()]);

const PropertyMapSchema = z.record(PropertyValueSchema);

const AnimationDescriptorSchema = z.object({
  startTime: z.number().finite().nonnegative(),
  duration: z.number().finite().positive(),
  easing: z.string().default('linear'),
  endState: PropertyMapSchema,
});

export const AnimatedElementSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    initialState: PropertyMapSchema,
    animation: AnimationDescriptorSchema.optional(),
  })
  .superRefine((element, ctx) => {
    if (!element.animation) return;
    for (const key of Object.keys(element.animation.endState)) {
      if (!Object.prototype.hasOwnProperty.call(element.initialState, key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['animation', 'endState', key],
          message: `"${key}" is not in initialState`,
        });
      }
    }
  });

const AnimatedElementListSchema = z.array(AnimatedElementSchema);

// =============================================================================
// Parsing
// =============================================================================

export function parseTimelineExport(input: unknown): TimelineExport {
  const parsed = parseOrThrow(TimelineExportSchema, input, 'Invalid timeline export');
  return {
    duration: parsed.duration,
    audioFileRef: parsed.audioFileRef,
    segments: parsed.segments.map(
      (segment): TimelineSegment => ({
        ...segment,
        color: segment.color ?? defaultColorFor(segment.kind),
      }),
    ),
  };
}

export function parseAnimatedElements(input: unknown): AnimatedElement[] {
  return parseOrThrow(AnimatedElementListSchema, input, 'Invalid animated elements');
}

// =============================================================================
// Export / Import
// =============================================================================

export function exportTimeline(store: TimelineModelStore): TimelineExport {
  const { segments, totalDuration, audioFileRef } = store.getState();
  return {
    duration: totalDuration,
    segments: segments.map((segment) => ({ ...segment })),
    audioFileRef,
  };
}

/** Replace the model content. Nothing changes if the payload is rejected. */
export function importTimeline(store: TimelineModelStore, input: unknown): TimelineExport {
  const timeline = parseTimelineExport(input);
  store.getState().loadSegments(timeline.segments, timeline.duration, timeline.audioFileRef);
  return timeline;
}

export function exportTimelineJson(store: TimelineModelStore): string {
  return JSON.stringify(exportTimeline(store), null, 2);
}

export function importTimelineJson(store: TimelineModelStore, text: string): TimelineExport {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    logger.warn('Timeline JSON could not be parsed', { error });
    throw new TimelineValidationError('Invalid timeline export', ['payload is not valid JSON']);
  }
  return importTimeline(store, data);
}
