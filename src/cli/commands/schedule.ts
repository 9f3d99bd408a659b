import { Effect, Either, Option } from "effect";
import { AppConfigServiceTag, type AppConfigService } from "../../core/interfaces/app-config";
import type { BroadcastDirectory } from "../../core/interfaces/broadcast-directory";
import { LoggerServiceTag, type LoggerService } from "../../core/interfaces/logger";
import type { StreamRegistry } from "../../core/interfaces/stream-registry";
import type { TerminalService } from "../../core/interfaces/terminal";
import { runDefault, runRemove } from "../../core/scheduling/reconciliation-engine";
import { parseTimeZone } from "../../core/scheduling/recurrence";
import {
  ServiceCatalog,
  catalogInputFromConfig,
} from "../../core/scheduling/service-catalog";
import { parseCalendarDate } from "../../core/scheduling/zoned-time";
import {
  ValidationError,
  type ConfigurationError,
  type DirectoryError,
} from "../../core/types/errors";
import { PlanningWindow, type ReconciliationReport } from "../../core/types/schedule";
import { presentReport } from "../presentation/report-formatter";

/**
 * CLI commands that reconcile the remote broadcast list
 */

export interface ScheduleOptions {
  readonly weeks?: string | undefined;
  readonly from?: string | undefined;
  readonly to?: string | undefined;
  readonly dryRun?: boolean | undefined;
}

export interface RemoveOptions {
  readonly dryRun?: boolean | undefined;
}

/**
 * Turn the window flags into a planning window. No flag means the next occurrence of
 * each service.
 */
export function resolvePlanningWindow(
  options: ScheduleOptions,
): Either.Either<PlanningWindow, ValidationError> {
  const hasRange = options.from !== undefined || options.to !== undefined;

  if (options.weeks !== undefined && hasRange) {
    return Either.left(
      new ValidationError({
        field: "weeks",
        message: "--weeks cannot be combined with --from/--to",
        suggestion: "Use either --weeks <n> or --from <date> --to <date>",
      }),
    );
  }

  if (options.weeks !== undefined) {
    const weeks = /^\d+$/.test(options.weeks.trim()) ? Number(options.weeks.trim()) : Number.NaN;
    if (!Number.isInteger(weeks) || weeks < 1) {
      return Either.left(
        new ValidationError({
          field: "weeks",
          message: "must be a positive integer",
          value: options.weeks,
        }),
      );
    }
    return Either.right(PlanningWindow.WeeksAhead({ weeks }));
  }

  if (hasRange) {
    if (options.from === undefined || options.to === undefined) {
      return Either.left(
        new ValidationError({
          field: "range",
          message: "--from and --to must be given together",
        }),
      );
    }
    const start = parseCalendarDate(options.from);
    if (start === undefined) {
      return Either.left(
        new ValidationError({ field: "from", message: "expected YYYY-MM-DD", value: options.from }),
      );
    }
    const end = parseCalendarDate(options.to);
    if (end === undefined) {
      return Either.left(
        new ValidationError({ field: "to", message: "expected YYYY-MM-DD", value: options.to }),
      );
    }
    return Either.right(PlanningWindow.DateRange({ start, end }));
  }

  return Either.right(PlanningWindow.NextOccurrence());
}

/**
 * Create the broadcasts missing from the planning window.
 */
export function scheduleCommand(
  options: ScheduleOptions,
): Effect.Effect<
  ReconciliationReport,
  ValidationError | ConfigurationError | DirectoryError,
  AppConfigService | BroadcastDirectory | StreamRegistry | LoggerService | TerminalService
> {
  return Effect.gen(function* () {
    const window = yield* resolvePlanningWindow(options);
    const logger = yield* LoggerServiceTag;
    const config = yield* (yield* AppConfigServiceTag).appConfig;
    const dryRun = options.dryRun === true || config.schedule.dryRun;

    yield* logger.info("Starting schedule run", { window: window._tag, dryRun });
    const catalog = yield* ServiceCatalog.build(catalogInputFromConfig(config));
    const report = yield* runDefault(catalog, window, dryRun);

    yield* presentReport(report, catalog.timeZone);
    return report;
  });
}

/**
 * Delete every upcoming broadcast on the channel.
 */
export function removeCommand(
  options: RemoveOptions,
): Effect.Effect<
  ReconciliationReport,
  DirectoryError,
  AppConfigService | BroadcastDirectory | LoggerService | TerminalService
> {
  return Effect.gen(function* () {
    const logger = yield* LoggerServiceTag;
    const config = yield* (yield* AppConfigServiceTag).appConfig;
    const dryRun = options.dryRun === true || config.schedule.dryRun;

    yield* logger.info("Starting remove run", { dryRun });
    const report = yield* runRemove(dryRun);

    const timeZone = Option.getOrElse(
      Either.getRight(parseTimeZone(config.schedule.timezone)),
      () => "UTC",
    );
    yield* presentReport(report, timeZone);
    return report;
  });
}
