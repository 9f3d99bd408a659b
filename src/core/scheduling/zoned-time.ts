import { DateTime, Option } from "effect";
import type { CalendarDate, TimeOfDay, Weekday } from "@/core/types/schedule";

/**
 * Wall-clock arithmetic in named time zones on top of effect's DateTime.
 *
 * Instants are plain Dates; local dates and times are plain records. Offsets are
 * expressed as "local minus UTC" in milliseconds (America/New_York in winter is -5h).
 */

export const MINUTE_MS = 60_000;
export const DAY_MS = 24 * 60 * MINUTE_MS;

export interface ZonedDateTime extends CalendarDate, TimeOfDay {
  readonly second: number;
}

const zoneCache = new Map<string, DateTime.TimeZone.Named>();

function lookupZone(name: string): Option.Option<DateTime.TimeZone.Named> {
  const cached = zoneCache.get(name);
  if (cached) return Option.some(cached);

  const zone = DateTime.zoneMakeNamed(name);
  if (Option.isSome(zone)) zoneCache.set(name, zone.value);
  return zone;
}

function namedZone(name: string): DateTime.TimeZone.Named {
  return Option.getOrThrowWith(
    lookupZone(name),
    () => new RangeError(`Unknown time zone: ${name}`),
  );
}

function inZone(instant: Date, timeZone: string): DateTime.Zoned {
  return DateTime.setZone(DateTime.unsafeMake(instant), namedZone(timeZone));
}

/** Midnight UTC of a calendar date; used for date-only arithmetic. */
function utcDate(date: CalendarDate): DateTime.Utc {
  return DateTime.unsafeMake({ year: date.year, month: date.month, day: date.day });
}

function calendarDateFromParts(parts: DateTime.DateTime.PartsWithWeekday): CalendarDate {
  return { year: parts.year, month: parts.month, day: parts.day };
}

/**
 * Check whether the runtime knows the given IANA zone name.
 */
export function isValidTimeZone(name: string): boolean {
  return name.trim().length > 0 && Option.isSome(lookupZone(name));
}

/**
 * Local calendar date and wall-clock time of an instant in a zone.
 */
export function toZoned(instant: Date, timeZone: string): ZonedDateTime {
  const parts = DateTime.toParts(inZone(instant, timeZone));
  return {
    ...calendarDateFromParts(parts),
    hour: parts.hours,
    minute: parts.minutes,
    second: parts.seconds,
  };
}

/**
 * Offset of the zone at the given instant, in milliseconds (local - UTC).
 */
export function offsetAt(instant: Date, timeZone: string): number {
  return DateTime.zonedOffset(inZone(instant, timeZone));
}

/**
 * Convert a local date and wall-clock time to an instant.
 *
 * A time that falls in a spring-forward gap resolves to the first instant whose local
 * time is at or after it, which is the moment the clocks jump. A time that occurs twice
 * in a fall-back overlap resolves to its first (earlier) occurrence.
 */
export function fromZoned(date: CalendarDate, time: TimeOfDay, timeZone: string): Date {
  const wall = DateTime.toEpochMillis(
    DateTime.unsafeMake({
      year: date.year,
      month: date.month,
      day: date.day,
      hours: time.hour,
      minutes: time.minute,
    }),
  );
  const localAt = (candidate: number) => candidate + offsetAt(new Date(candidate), timeZone);
  const offsetBefore = offsetAt(new Date(wall - DAY_MS), timeZone);
  const offsetAfter = offsetAt(new Date(wall + DAY_MS), timeZone);

  const valid = [...new Set([offsetBefore, offsetAfter])]
    .map((offset) => wall - offset)
    .filter((candidate) => localAt(candidate) === wall);

  if (valid.length > 0) {
    return new Date(Math.min(...valid));
  }

  if (offsetAfter <= offsetBefore) {
    return new Date(wall - offsetBefore);
  }

  // Gap: local time at `low` is before the wall time, at `high` it is past it
  let low = wall - offsetAfter;
  let high = wall - offsetBefore;
  while (high - low > MINUTE_MS) {
    const mid = low + Math.floor((high - low) / 2 / MINUTE_MS) * MINUTE_MS;
    if (localAt(mid) >= wall) {
      high = mid;
    } else {
      low = mid;
    }
  }
  return new Date(high);
}

export function calendarDateOf(instant: Date, timeZone: string): CalendarDate {
  return calendarDateFromParts(DateTime.toParts(inZone(instant, timeZone)));
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return calendarDateFromParts(DateTime.toPartsUtc(DateTime.add(utcDate(date), { days })));
}

const WEEKDAY_INDEXES: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];

export function weekdayOf(date: CalendarDate): Weekday {
  return WEEKDAY_INDEXES[DateTime.getPartUtc(utcDate(date), "weekDay")] ?? 0;
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/**
 * Parse a strict YYYY-MM-DD calendar date. Returns undefined for malformed or
 * impossible dates (e.g. 2025-02-30).
 */
export function parseCalendarDate(text: string): CalendarDate | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text.trim());
  if (!match) return undefined;

  const requested = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  // Out-of-range days and months roll over, so a date that changes was impossible
  return Option.match(DateTime.make(requested), {
    onNone: () => undefined,
    onSome: (parsed) => {
      const date = calendarDateFromParts(DateTime.toPartsUtc(parsed));
      return compareCalendarDates(date, requested) === 0 ? date : undefined;
    },
  });
}

export function formatCalendarDate(date: CalendarDate): string {
  return `${date.year}-${pad2(date.month)}-${pad2(date.day)}`;
}

export function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}
