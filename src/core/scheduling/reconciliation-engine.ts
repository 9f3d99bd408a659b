import { Clock, Effect, Either } from "effect";
import {
  BroadcastDirectoryTag,
  type BroadcastDirectory,
} from "@/core/interfaces/broadcast-directory";
import { LoggerServiceTag, type LoggerService } from "@/core/interfaces/logger";
import type { ConfigurationError, DirectoryError } from "@/core/types/errors";
import type {
  ObservedOccurrence,
  PlanningWindow,
  ReconciliationReport,
  ReconciliationStatus,
  RemoteId,
  ReportEntry,
  ReportSummary,
} from "@/core/types/schedule";
import { compareOccurrences, occurrenceKey, planOccurrences } from "./occurrence-planner";
import type { ServiceCatalog } from "./service-catalog";

export function summarize(entries: readonly ReportEntry[]): ReportSummary {
  const summary: Record<ReconciliationStatus, number> = {
    matched: 0,
    created: 0,
    removed: 0,
    failed: 0,
    reported: 0,
  };
  for (const entry of entries) {
    summary[entry.status] += 1;
  }
  return summary;
}

export function hasFailures(report: ReconciliationReport): boolean {
  return report.summary.failed > 0;
}

/**
 * Remote broadcasts keyed the same way as desired occurrences. Broadcasts bound to a
 * stream that no enabled service uses are left out and can never match.
 */
function indexObserved(
  catalog: ServiceCatalog,
  observed: readonly ObservedOccurrence[],
): ReadonlyMap<string, RemoteId> {
  const index = new Map<string, RemoteId>();
  for (const broadcast of observed) {
    if (broadcast.boundStreamId === undefined) continue;
    const serviceId = catalog.serviceIdForStream(broadcast.boundStreamId);
    if (serviceId === undefined) continue;
    const key = occurrenceKey(serviceId, broadcast.startInstant);
    if (!index.has(key)) index.set(key, broadcast.remoteId);
  }
  return index;
}

/**
 * Plan the window and bring the remote directory up to date with it.
 *
 * Occurrences already present remotely are matched, missing ones are created one at a
 * time in plan order. A failed create is recorded and the run moves on. Under dry-run
 * nothing is created.
 */
export function runDefault(
  catalog: ServiceCatalog,
  window: PlanningWindow,
  dryRun: boolean,
): Effect.Effect<
  ReconciliationReport,
  ConfigurationError | DirectoryError,
  BroadcastDirectory | LoggerService
> {
  return Effect.gen(function* () {
    const directory = yield* BroadcastDirectoryTag;
    const logger = yield* LoggerServiceTag;

    const now = new Date(yield* Clock.currentTimeMillis);
    const plan = yield* planOccurrences(catalog, window, now);
    yield* logger.info(`Planned ${plan.occurrences.length} occurrence(s)`, {
      window: window._tag,
      now: now.toISOString(),
      dryRun,
    });

    const observed = yield* directory.listUpcoming();
    const remote = indexObserved(catalog, observed);

    const entries = yield* Effect.forEach(plan.occurrences, (occurrence) =>
      Effect.gen(function* () {
        const base = {
          serviceId: occurrence.serviceId,
          startInstant: occurrence.startInstant,
          title: occurrence.title,
        };

        const existing = remote.get(occurrenceKey(occurrence.serviceId, occurrence.startInstant));
        if (existing !== undefined) {
          yield* logger.debug(`Already scheduled: ${occurrence.title}`, { remoteId: existing });
          return { ...base, action: "none", status: "matched", remoteId: existing } as const;
        }

        if (dryRun) {
          yield* logger.info(`[dry-run] Would create: ${occurrence.title}`, {
            serviceId: occurrence.serviceId,
            streamId: occurrence.streamRef.streamId,
          });
          return { ...base, action: "create", status: "reported" } as const;
        }

        const created = yield* Effect.either(directory.create(occurrence));
        if (Either.isLeft(created)) {
          yield* logger.error(`Failed to create: ${occurrence.title}`, {
            operation: created.left.operation,
            error: created.left.message,
          });
          return { ...base, action: "create", status: "failed", error: created.left } as const;
        }

        yield* logger.info(`Created: ${occurrence.title}`, { remoteId: created.right });
        return { ...base, action: "create", status: "created", remoteId: created.right } as const;
      }),
    );

    return {
      mode: "schedule",
      dryRun,
      entries,
      summary: summarize(entries),
      diagnostics: plan.diagnostics,
      warnings: catalog.warnings,
    } satisfies ReconciliationReport;
  });
}

/**
 * Delete every upcoming broadcast, or report what would be deleted under dry-run.
 * When a catalog is given, broadcasts are attributed to the service owning their stream.
 */
export function runRemove(
  dryRun: boolean,
  catalog?: ServiceCatalog,
): Effect.Effect<ReconciliationReport, DirectoryError, BroadcastDirectory | LoggerService> {
  return Effect.gen(function* () {
    const directory = yield* BroadcastDirectoryTag;
    const logger = yield* LoggerServiceTag;

    const observed = yield* directory.listUpcoming();
    const targets = observed
      .map((broadcast) => ({
        broadcast,
        serviceId:
          broadcast.boundStreamId !== undefined
            ? catalog?.serviceIdForStream(broadcast.boundStreamId)
            : undefined,
        startInstant: broadcast.startInstant,
      }))
      .sort(
        (a, b) =>
          compareOccurrences(a, b) ||
          (a.broadcast.remoteId < b.broadcast.remoteId
            ? -1
            : a.broadcast.remoteId > b.broadcast.remoteId
              ? 1
              : 0),
      );

    yield* logger.info(`Found ${targets.length} upcoming broadcast(s) to remove`, { dryRun });

    const entries = yield* Effect.forEach(targets, ({ broadcast, serviceId }) =>
      Effect.gen(function* () {
        const base = {
          action: "remove",
          serviceId,
          startInstant: broadcast.startInstant,
          title: broadcast.title,
          remoteId: broadcast.remoteId,
        } as const;

        if (dryRun) {
          yield* logger.info(`[dry-run] Would delete: ${broadcast.title}`, {
            remoteId: broadcast.remoteId,
          });
          return { ...base, status: "reported" } as const;
        }

        const deleted = yield* Effect.either(directory.delete(broadcast.remoteId));
        if (Either.isLeft(deleted)) {
          yield* logger.error(`Failed to delete: ${broadcast.title}`, {
            remoteId: broadcast.remoteId,
            error: deleted.left.message,
          });
          return { ...base, status: "failed", error: deleted.left } as const;
        }

        yield* logger.info(`Deleted: ${broadcast.title}`, { remoteId: broadcast.remoteId });
        return { ...base, status: "removed" } as const;
      }),
    );

    return {
      mode: "remove",
      dryRun,
      entries,
      summary: summarize(entries),
      diagnostics: [],
      warnings: [],
    } satisfies ReconciliationReport;
  });
}
