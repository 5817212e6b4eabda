/**
 * Recurring Schedule Evaluator
 *
 * A ScheduleSpec is a set of calendar fields, each either an exact value or
 * absent (wildcard). `nextOccurrence` finds the earliest minute strictly
 * after a reference instant, in the spec's timezone, that matches every set
 * field. Day-of-month and weekday are combined with AND.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import {
  addLocalDays,
  assertTimezone,
  daysInMonth,
  getZonedParts,
  weekdayOf,
  zonedTimeToUtc,
  type LocalDate,
} from '../utils/timezone.js';
import type { JsonObject } from '../utils/json.js';

export const scheduleSpecSchema = z
  .object({
    minute: z.number().int().min(0).max(59).optional(),
    hour: z.number().int().min(0).max(23).optional(),
    dayOfMonth: z.number().int().min(1).max(31).optional(),
    month: z.number().int().min(1).max(12).optional(),
    weekday: z.number().int().min(0).max(6).optional(),
    timezone: z.string().min(1).optional(),
  })
  .strict();

export type ScheduleSpec = z.infer<typeof scheduleSpecSchema>;

const CALENDAR_FIELDS = ['minute', 'hour', 'dayOfMonth', 'month', 'weekday'] as const;

const MINUTE_MS = 60 * 1000;

// Every dayOfMonth × month × weekday combination that can match at all
// recurs within one 28-year leap/weekday cycle.
const SEARCH_HORIZON_DAYS = 366 * 29;

// Longest month each day-of-month can fall in, for up-front impossibility checks
const MAX_DAYS_IN_MONTH = [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

/**
 * Validate a spec, returning it typed. Throws ValidationError for
 * out-of-range fields, an all-wildcard spec, an unknown timezone, or a
 * day/month combination that never exists.
 */
export function validateScheduleSpec(input: unknown): ScheduleSpec {
  const result = scheduleSpecSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.errors[0];
    throw new ValidationError(issue?.message ?? 'invalid schedule', issue?.path.join('.') || 'schedule');
  }

  const spec = result.data;
  if (CALENDAR_FIELDS.every((field) => spec[field] === undefined)) {
    throw new ValidationError('at least one calendar field must be set', 'schedule');
  }

  if (spec.timezone !== undefined) {
    assertTimezone(spec.timezone);
  }

  if (spec.dayOfMonth !== undefined && spec.month !== undefined) {
    const longest = MAX_DAYS_IN_MONTH[spec.month - 1];
    if (spec.dayOfMonth > longest) {
      throw new ValidationError(
        `day ${spec.dayOfMonth} never occurs in month ${spec.month}`,
        'dayOfMonth'
      );
    }
  }

  return spec;
}

function dateMatches(spec: ScheduleSpec, date: LocalDate): boolean {
  if (spec.month !== undefined && date.month !== spec.month) return false;
  if (spec.dayOfMonth !== undefined) {
    if (date.day !== spec.dayOfMonth) return false;
    if (spec.dayOfMonth > daysInMonth(date.year, date.month)) return false;
  }
  if (spec.weekday !== undefined && weekdayOf(date) !== spec.weekday) return false;
  return true;
}

function range(value: number | undefined, max: number): number[] {
  if (value !== undefined) return [value];
  return Array.from({ length: max + 1 }, (_, i) => i);
}

/**
 * Earliest instant strictly after `reference` matching the spec.
 * Local times that fall into a DST gap are skipped.
 */
export function nextOccurrence(spec: ScheduleSpec, reference: Date): Date {
  const validated = validateScheduleSpec(spec);
  const timezone = validated.timezone ?? 'UTC';
  const referenceMs = reference.getTime();
  if (Number.isNaN(referenceMs)) {
    throw new ValidationError('reference must be a valid date', 'reference');
  }

  // First candidate minute is the one after the reference minute
  const floor = Math.floor(referenceMs / MINUTE_MS) * MINUTE_MS;
  const startParts = getZonedParts(floor, timezone);
  // Start a day early so that local days straddling the reference are covered
  let date = addLocalDays(startParts, -1);

  const hours = range(validated.hour, 23);
  const minutes = range(validated.minute, 59);

  for (let i = 0; i <= SEARCH_HORIZON_DAYS; i++, date = addLocalDays(date, 1)) {
    if (!dateMatches(validated, date)) continue;

    for (const hour of hours) {
      for (const minute of minutes) {
        const instant = zonedTimeToUtc(date, hour, minute, timezone);
        if (instant !== null && instant > referenceMs) {
          return new Date(instant);
        }
      }
    }
  }

  throw new ValidationError(
    `schedule has no occurrence within ${Math.floor(SEARCH_HORIZON_DAYS / 366)} years`,
    'schedule'
  );
}

/** Daily spec at a local wall-clock time. */
export function dailyAt(hour: number, minute: number, timezone: string): ScheduleSpec {
  return validateScheduleSpec({ hour, minute, timezone });
}

/** Short human-readable form for logs, e.g. `30 9 * * 1 (America/Toronto)`. */
export function describeScheduleSpec(spec: ScheduleSpec): string {
  const field = (value: number | undefined) => (value === undefined ? '*' : String(value));
  const cron = [spec.minute, spec.hour, spec.dayOfMonth, spec.month, spec.weekday].map(field).join(' ');
  return `${cron} (${spec.timezone ?? 'UTC'})`;
}

/** Plain JSON form with wildcards omitted, for persisting inside job payloads. */
export function scheduleSpecToJson(spec: ScheduleSpec): JsonObject {
  const json: JsonObject = {};
  for (const [key, value] of Object.entries(spec)) {
    if (value !== undefined) json[key] = value;
  }
  return json;
}
