/**
 * Shared zod helpers for payload validation.
 */

import type { z } from 'zod';
import { TimelineValidationError } from '@/core/errors';

/** One `path: message` string per issue. */
export function formatValidationIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Parse or throw a `TimelineValidationError` listing every issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, context: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new TimelineValidationError(context, formatValidationIssues(result.error));
  }
  return result.data;
}
