import { ScheduleValidationError } from '../services/scheduleErrors';
import { TIME_OF_DAY_PATTERN } from '../services/scheduleDefinition';
import type { StoredScheduleDefinition } from '../types/schedule';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

// frequency_based schedules spread their doses across an 8am-8pm day
export const ACTIVE_WINDOW_HOURS = 12;

function utcDayStart(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

export function isSameOrLaterUtcDay(value: Date, reference: Date): boolean {
  return utcDayStart(value) >= utcDayStart(reference);
}

export function startOfNextDay(now: Date): Date {
  return new Date(utcDayStart(now) + DAY_MS);
}

export function parseTimeOfDay(value: string): { hours: number; minutes: number } {
  const match = TIME_OF_DAY_PATTERN.exec(typeof value === 'string' ? value.trim() : '');
  if (!match) {
    throw new ScheduleValidationError(`Invalid time of day "${String(value)}", expected HH:MM`);
  }

  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

function atTimeOfDay(dayStartMs: number, time: string): Date {
  const { hours, minutes } = parseTimeOfDay(time);
  return new Date(dayStartMs + hours * HOUR_MS + minutes * 60 * 1000);
}

function positiveNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : null;
}

function nextFixedTime(specificTimes: unknown, now: Date): Date | null {
  if (!Array.isArray(specificTimes) || specificTimes.length === 0) {
    return null;
  }

  const today = utcDayStart(now);
  for (const time of specificTimes) {
    const candidate = atTimeOfDay(today, time);
    if (candidate.getTime() > now.getTime()) {
      return candidate;
    }
  }

  return atTimeOfDay(today + DAY_MS, specificTimes[0]);
}

/**
 * Next instant the schedule is owed, or null when nothing more is owed today.
 *
 * At most one decision is made per calendar day: once a completion has been
 * recorded on `now`'s date the day's run is satisfied. Stored records with a
 * missing or zero policy field yield null instead of failing; a malformed
 * fixed time throws `ScheduleValidationError`.
 */
export function calculateNextOccurrence(
  schedule: StoredScheduleDefinition,
  lastCompletion: Date | null,
  now: Date,
): Date | null {
  if (lastCompletion && isSameOrLaterUtcDay(lastCompletion, now)) {
    return null;
  }

  switch (schedule.type) {
    case 'fixed_time':
      return nextFixedTime(schedule.specificTimes, now);
    case 'interval_based': {
      const intervalHours = positiveNumber(schedule.intervalHours);
      return intervalHours === null ? null : new Date(now.getTime() + intervalHours * HOUR_MS);
    }
    case 'frequency_based': {
      const timesPerDay = positiveNumber(schedule.timesPerDay);
      if (timesPerDay === null) {
        return null;
      }
      return new Date(now.getTime() + Math.round((ACTIVE_WINDOW_HOURS * HOUR_MS) / timesPerDay));
    }
    default:
      return null;
  }
}
