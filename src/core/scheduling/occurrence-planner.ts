import { Either } from "effect";
import { configurationError, type ConfigurationError } from "@/core/types/errors";
import {
  PlanningWindow,
  type Occurrence,
  type PlanResult,
  type PlanningDiagnostic,
  type Service,
  type TimeZone,
} from "@/core/types/schedule";
import { formatBroadcastTitle } from "./broadcast-title";
import { nextOccurrence, occurrencesInWindow } from "./recurrence";
import type { ServiceCatalog } from "./service-catalog";
import { DAY_MS, MINUTE_MS, addDays, compareCalendarDates, fromZoned } from "./zoned-time";

interface WindowBounds {
  readonly start: Date;
  readonly end: Date;
}

/**
 * Identity of a broadcast: service id plus start instant at minute granularity.
 */
export function occurrenceKey(serviceId: string, startInstant: Date): string {
  return `${serviceId}@${Math.floor(startInstant.getTime() / MINUTE_MS)}`;
}

/**
 * Ascending by start instant, ties by service id.
 */
export function compareOccurrences(
  a: { readonly startInstant: Date; readonly serviceId: string | undefined },
  b: { readonly startInstant: Date; readonly serviceId: string | undefined },
): number {
  const byInstant = a.startInstant.getTime() - b.startInstant.getTime();
  if (byInstant !== 0) return byInstant;
  const left = a.serviceId ?? "";
  const right = b.serviceId ?? "";
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Absolute bounds of a window, or undefined for NextOccurrence.
 */
function windowBounds(
  window: PlanningWindow,
  timeZone: TimeZone,
  now: Date,
): Either.Either<WindowBounds | undefined, ConfigurationError> {
  return PlanningWindow.$match(window, {
    NextOccurrence: () => Either.right(undefined),
    WeeksAhead: ({ weeks }) =>
      Number.isInteger(weeks) && weeks > 0
        ? Either.right({ start: now, end: new Date(now.getTime() + weeks * 7 * DAY_MS) })
        : Either.left(
            configurationError([
              { field: "weeks", message: `weeks must be a positive integer, got ${weeks}` },
            ]),
          ),
    DateRange: ({ start, end }) =>
      compareCalendarDates(start, end) > 0
        ? Either.left(
            configurationError([
              { field: "range", message: "the start date must not be after the end date" },
            ]),
          )
        : Either.right({
            start: fromZoned(start, { hour: 0, minute: 0 }, timeZone),
            end: fromZoned(addDays(end, 1), { hour: 0, minute: 0 }, timeZone),
          }),
  });
}

function toOccurrence(catalog: ServiceCatalog, service: Service, startInstant: Date): Occurrence {
  return {
    ...catalog.settings,
    serviceId: service.id,
    startInstant,
    title: formatBroadcastTitle(catalog.campusName, startInstant, catalog.timeZone),
    description: service.description,
    streamRef: service.streamRef,
  };
}

/**
 * Desired occurrences for the enabled services of a catalog within a window.
 * Pure: the result depends only on the arguments.
 */
export function planOccurrences(
  catalog: ServiceCatalog,
  window: PlanningWindow,
  now: Date,
): Either.Either<PlanResult, ConfigurationError> {
  return Either.map(windowBounds(window, catalog.timeZone, now), (bounds) => {
    const diagnostics: PlanningDiagnostic[] = [];
    const byKey = new Map<string, Occurrence>();

    for (const service of catalog.enabledServices()) {
      const { recurrence } = service;
      if (!recurrence) {
        diagnostics.push({
          serviceId: service.id,
          message: "has no weekly schedule and is not planned automatically",
        });
        continue;
      }

      const instants = bounds
        ? occurrencesInWindow(recurrence, catalog.timeZone, bounds.start, bounds.end)
        : [nextOccurrence(recurrence, catalog.timeZone, now)];

      for (const instant of instants) {
        const key = occurrenceKey(service.id, instant);
        if (!byKey.has(key)) {
          byKey.set(key, toOccurrence(catalog, service, instant));
        }
      }
    }

    return {
      occurrences: [...byKey.values()].sort(compareOccurrences),
      diagnostics,
    };
  });
}
