// =============================================================================
// Request Body Schemas
// =============================================================================

import { z } from 'zod';
import { RATINGS } from './types';
import { ValidationError } from './errors';

export const preferencesSchema = z.object({
  watchlist: z.array(z.string().min(1)).default([]),
  sectors: z.array(z.string().min(1)).default([]),
  duration_range: z
    .tuple([z.number().nonnegative(), z.number().nonnegative()])
    .refine(([min, max]) => min <= max, 'duration_range must be [min, max]')
    .default([0, 30]),
  min_rating: z.enum(RATINGS).default('BBB-'),
  alert_thresholds: z.record(z.number()).default({}),
});

export const alertSchema = z.object({
  alert_type: z.string().min(1),
  threshold: z.number(),
});

export const alertsRequestSchema = z.object({
  alerts: z.array(alertSchema).min(1),
});

/**
 * Parse a value against a schema, turning failures into a ValidationError
 */
export function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  what: string
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid ${what}`, issues);
  }
  return result.data;
}
