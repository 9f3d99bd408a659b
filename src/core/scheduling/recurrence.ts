import { Either } from "effect";
import { configurationError, type ConfigurationError } from "@/core/types/errors";
import {
  TimeZone,
  WEEKDAYS,
  type Recurrence,
  type TimeOfDay,
  type Weekday,
} from "@/core/types/schedule";
import {
  addDays,
  calendarDateOf,
  compareCalendarDates,
  fromZoned,
  isValidTimeZone,
  pad2,
  weekdayOf,
} from "./zoned-time";

/**
 * Weekly recurrence resolution: turns (weekday, time-of-day, zone) into instants.
 */

function invalid(field: string, message: string): Either.Either<never, ConfigurationError> {
  return Either.left(configurationError([{ field, message }]));
}

/**
 * Parse a weekday name. Accepts full names and three-letter abbreviations in any case.
 */
export function parseWeekday(
  text: string,
  field = "day",
): Either.Either<Weekday, ConfigurationError> {
  const normalized = text.trim().toUpperCase();
  const index = WEEKDAYS.findIndex(
    (name) => name === normalized || (normalized.length === 3 && name.startsWith(normalized)),
  );
  const weekday = ([0, 1, 2, 3, 4, 5, 6] as const)[index];
  if (weekday === undefined) {
    return invalid(field, `"${text}" is not a weekday name (expected e.g. SATURDAY or Sat)`);
  }
  return Either.right(weekday);
}

/**
 * Parse a 24-hour "HH:MM" time of day.
 */
export function parseTimeOfDay(
  text: string,
  field = "time",
): Either.Either<TimeOfDay, ConfigurationError> {
  const match = /^(\d{2}):(\d{2})$/.exec(text.trim());
  if (!match) {
    return invalid(field, `"${text}" is not a 24-hour HH:MM time`);
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    return invalid(field, `"${text}" is outside 00:00-23:59`);
  }
  return Either.right({ hour, minute });
}

export function parseTimeZone(
  name: string,
  field = "timezone",
): Either.Either<TimeZone, ConfigurationError> {
  const trimmed = name.trim();
  if (!isValidTimeZone(trimmed)) {
    return invalid(field, `"${name}" is not a known IANA time zone`);
  }
  return Either.right(TimeZone(trimmed));
}

/**
 * Earliest instant at or after `after` whose local weekday and time match the recurrence.
 */
export function nextOccurrence(recurrence: Recurrence, timeZone: TimeZone, after: Date): Date {
  const startDate = calendarDateOf(after, timeZone);
  // A match lies within the next eight local dates; the wider bound is slack
  for (let offset = 0; offset <= 14; offset++) {
    const date = addDays(startDate, offset);
    if (weekdayOf(date) !== recurrence.weekday) continue;
    const candidate = fromZoned(date, recurrence.time, timeZone);
    if (candidate.getTime() >= after.getTime()) {
      return candidate;
    }
  }
  throw new RangeError("No weekly occurrence found within two weeks");
}

/**
 * Every matching instant with start <= instant < end, ascending.
 */
export function occurrencesInWindow(
  recurrence: Recurrence,
  timeZone: TimeZone,
  start: Date,
  end: Date,
): readonly Date[] {
  if (end.getTime() <= start.getTime()) return [];

  const lastDate = calendarDateOf(end, timeZone);
  let date = calendarDateOf(start, timeZone);
  while (weekdayOf(date) !== recurrence.weekday) {
    date = addDays(date, 1);
  }

  const instants: Date[] = [];
  for (; compareCalendarDates(date, lastDate) <= 0; date = addDays(date, 7)) {
    const candidate = fromZoned(date, recurrence.time, timeZone);
    const time = candidate.getTime();
    if (time < start.getTime() || time >= end.getTime()) continue;
    if (instants.some((existing) => existing.getTime() === time)) continue;
    instants.push(candidate);
  }
  return instants;
}

/**
 * Human-readable form, e.g. "Saturday 16:00".
 */
export function describeRecurrence(recurrence: Recurrence): string {
  const name = WEEKDAYS[recurrence.weekday];
  return `${name.charAt(0)}${name.slice(1).toLowerCase()} ${pad2(recurrence.time.hour)}:${pad2(recurrence.time.minute)}`;
}
