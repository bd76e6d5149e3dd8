import { z } from 'zod';
import { ScheduleValidationError } from './scheduleErrors';
import type { ScheduleDefinition } from '../types/schedule';

export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/; // HH:MM

const durationSchema = z.number().int().positive();

export const scheduleDefinitionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('fixed_time'),
    duration: durationSchema,
    specificTimes: z.array(z.string().regex(TIME_OF_DAY_PATTERN, 'Expected HH:MM')).min(1),
  }),
  z.object({
    type: z.literal('interval_based'),
    duration: durationSchema,
    intervalHours: z.number().int().positive(),
  }),
  z.object({
    type: z.literal('frequency_based'),
    duration: durationSchema,
    timesPerDay: z.number().int().positive(),
  }),
]);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

/**
 * Validates a schedule definition at creation time. Missing or non-positive policy
 * fields and malformed times are rejected here rather than at recurrence time.
 */
export function validateScheduleDefinition(value: unknown, label = 'schedule'): ScheduleDefinition {
  const result = scheduleDefinitionSchema.safeParse(value);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ScheduleValidationError(`Invalid ${label}: ${issues.join('; ')}`, issues);
  }

  return result.data;
}
