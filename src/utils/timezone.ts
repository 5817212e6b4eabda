/**
 * IANA timezone helpers built on Intl.DateTimeFormat.
 *
 * All instants are epoch milliseconds (UTC). Local calendar values use
 * 1-based months, matching how schedules are written.
 */

import { ValidationError } from '../errors/index.js';

export interface LocalDate {
  year: number;
  month: number;
  day: number;
}

export interface ZonedParts extends LocalDate {
  hour: number;
  minute: number;
  second: number;
  /** 0 = Sunday */
  weekday: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timezone, formatter);
  }
  return formatter;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    formatterFor(timezone);
    return true;
  } catch {
    return false;
  }
}

export function assertTimezone(timezone: string): void {
  if (!isValidTimezone(timezone)) {
    throw new ValidationError(`unknown IANA timezone '${timezone}'`, 'timezone');
  }
}

/** Day of week (0 = Sunday) of a calendar date. */
export function weekdayOf(date: LocalDate): number {
  return new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function addLocalDays(date: LocalDate, days: number): LocalDate {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

/**
 * Wall-clock fields of an instant in the given timezone.
 */
export function getZonedParts(instantMs: number, timezone: string): ZonedParts {
  const parts = formatterFor(timezone).formatToParts(new Date(instantMs));
  const getPart = (type: Intl.DateTimeFormatPartTypes): number => {
    const value = parseInt(parts.find((p) => p.type === type)?.value ?? '', 10);
    if (Number.isNaN(value)) {
      throw new Error(`Failed to read '${type}' for ${timezone}`);
    }
    return value;
  };

  const local: LocalDate = { year: getPart('year'), month: getPart('month'), day: getPart('day') };
  return {
    ...local,
    // Some runtimes still render midnight as 24 under h23
    hour: getPart('hour') % 24,
    minute: getPart('minute'),
    second: getPart('second'),
    weekday: weekdayOf(local),
  };
}

/** Offset of the timezone from UTC at the given instant, in ms. */
function offsetAt(instantMs: number, timezone: string): number {
  const p = getZonedParts(instantMs, timezone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(instantMs / 1000) * 1000;
}

/**
 * Instant at which the given local wall-clock time occurs in the timezone.
 * Returns null for local times skipped by a DST gap. For repeated local
 * times (DST overlap) the earlier instant is returned.
 */
export function zonedTimeToUtc(
  date: LocalDate,
  hour: number,
  minute: number,
  timezone: string
): number | null {
  const guess = Date.UTC(date.year, date.month - 1, date.day, hour, minute);
  const firstOffset = offsetAt(guess, timezone);
  let candidate = guess - firstOffset;
  const secondOffset = offsetAt(candidate, timezone);
  if (secondOffset !== firstOffset) {
    candidate = guess - secondOffset;
  }

  // Prefer the earlier of two valid instants during a fall-back overlap
  const earlier = candidate - 60 * 60 * 1000;
  if (matchesLocal(earlier, date, hour, minute, timezone)) {
    return earlier;
  }

  return matchesLocal(candidate, date, hour, minute, timezone) ? candidate : null;
}

function matchesLocal(
  instantMs: number,
  date: LocalDate,
  hour: number,
  minute: number,
  timezone: string
): boolean {
  const p = getZonedParts(instantMs, timezone);
  return (
    p.year === date.year &&
    p.month === date.month &&
    p.day === date.day &&
    p.hour === hour &&
    p.minute === minute
  );
}

/** HH:MM of an instant in the timezone. */
export function formatLocalTime(instantMs: number, timezone: string): string {
  const p = getZonedParts(instantMs, timezone);
  return `${String(p.hour).padStart(2, '0')}:${String(p.minute).padStart(2, '0')}`;
}
