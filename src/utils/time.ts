import { RoadmapError } from '../core/errors';

const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parses an ISO-8601 date or date-time into a naive wall-clock value.
 *
 * The returned Date carries the wall clock in its UTC fields. Any trailing
 * `Z` or offset is dropped without conversion, so `2024-05-06T09:30:00Z`
 * and `2024-05-06T09:30:00` yield the same value. A date-only input yields
 * midnight.
 */
export function parseNaiveDateTime(value: string): Date {
  const match = value.trim().match(ISO_PATTERN);
  if (!match) {
    throw invalidTimestamp(value);
  }
  const [, year, month, day, hour, minute, second, fraction] = match;
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;
  const parsed = new Date(
    Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour ?? 0),
      Number(minute ?? 0),
      Number(second ?? 0),
      millis,
    ),
  );
  if (
    Number.isNaN(parsed.getTime()) ||
    parsed.getUTCMonth() !== Number(month) - 1 ||
    parsed.getUTCDate() !== Number(day)
  ) {
    throw invalidTimestamp(value);
  }
  return parsed;
}

/** Current local wall clock as a naive value. */
export function toNaiveLocal(value: Date): Date {
  return new Date(
    Date.UTC(
      value.getFullYear(),
      value.getMonth(),
      value.getDate(),
      value.getHours(),
      value.getMinutes(),
      value.getSeconds(),
      value.getMilliseconds(),
    ),
  );
}

/** Monday = 0 .. Sunday = 6. */
export function weekdayIndex(value: Date): number {
  return (value.getUTCDay() + 6) % 7;
}

/**
 * Week of the year with Monday as the first day of the week. Days before the
 * first Monday of a year fall in week 0, so numbers restart every January.
 */
export function weekOfYear(value: Date): number {
  const year = value.getUTCFullYear();
  const dayStart = Date.UTC(year, value.getUTCMonth(), value.getUTCDate());
  const dayOfYear = Math.round((dayStart - Date.UTC(year, 0, 1)) / DAY_MS);
  return Math.floor((dayOfYear + 7 - weekdayIndex(value)) / 7);
}

export function addDays(value: Date, days: number): Date {
  return new Date(value.getTime() + days * DAY_MS);
}

export function weekBounds(value: Date): { start: Date; end: Date } {
  const start = addDays(value, -weekdayIndex(value));
  return { start, end: addDays(start, 6) };
}

export function formatSlashDate(value: Date): string {
  const year = String(value.getUTCFullYear()).padStart(4, '0');
  const month = String(value.getUTCMonth() + 1).padStart(2, '0');
  const day = String(value.getUTCDate()).padStart(2, '0');
  return `${year}/${month}/${day}`;
}

export function formatDurationShort(durationMs: number): string {
  if (durationMs < 1000) {
    return `${durationMs}ms`;
  }
  const totalSeconds = Math.floor(durationMs / 1000);
  if (totalSeconds < 60) {
    return `${totalSeconds}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes < 60) {
    return `${minutes}m ${seconds}s`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}

export function formatDurationClock(durationMs: number): string {
  const totalSeconds = Math.floor(durationMs / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) {
    return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}:${String(
      seconds,
    ).padStart(2, '0')}`;
  }
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

function invalidTimestamp(value: string): RoadmapError {
  return new RoadmapError({
    code: 'todoist.invalid_timestamp',
    message: `Invalid ISO-8601 timestamp: ${value}`,
    userMessage: `Todoist returned an invalid timestamp: ${value}.`,
    kind: 'validation',
    details: { value },
  });
}
