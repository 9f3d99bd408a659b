import { Effect } from "effect";
import { TerminalServiceTag, type TerminalService } from "../../core/interfaces/terminal";
import { pad2, toZoned } from "../../core/scheduling/zoned-time";
import type {
  ReconciliationReport,
  ReconciliationStatus,
  ReportEntry,
} from "../../core/types/schedule";

/**
 * Rendering of reconciliation reports for the terminal
 */

export interface FormattedReport {
  readonly heading: string;
  readonly notices: readonly string[];
  readonly entries: readonly string[];
  readonly summary: string;
}

const SUMMARY_ORDER: readonly ReconciliationStatus[] = [
  "created",
  "removed",
  "matched",
  "reported",
  "failed",
];

export function formatLocalDateTime(instant: Date, timeZone: string): string {
  const local = toZoned(instant, timeZone);
  return `${local.year}-${pad2(local.month)}-${pad2(local.day)} ${pad2(local.hour)}:${pad2(local.minute)}`;
}

function statusLabel(report: ReconciliationReport, status: ReconciliationStatus): string {
  switch (status) {
    case "matched":
      return "exists";
    case "created":
      return "created";
    case "removed":
      return "deleted";
    case "failed":
      return "failed";
    case "reported":
      return report.mode === "schedule" ? "would create" : "would delete";
  }
}

function formatEntry(report: ReconciliationReport, entry: ReportEntry, timeZone: string): string {
  const label = statusLabel(report, entry.status).padEnd(12);
  const when = formatLocalDateTime(entry.startInstant, timeZone);
  const remote = entry.remoteId !== undefined ? ` (${entry.remoteId})` : "";
  const failure = entry.error !== undefined ? `: ${entry.error.message}` : "";
  return `${label} ${when}  ${entry.serviceId ?? "-"}  ${entry.title}${remote}${failure}`;
}

export function formatReport(report: ReconciliationReport, timeZone: string): FormattedReport {
  const heading =
    (report.mode === "schedule" ? "Scheduled broadcasts" : "Removed broadcasts") +
    (report.dryRun ? " (dry run)" : "");

  const notices = [
    ...report.warnings.map(
      (warning) =>
        `Service ${warning.serviceId} skipped: no stream titled "${warning.expectedStreamTitle}"`,
    ),
    ...report.diagnostics.map(
      (diagnostic) => `Service ${diagnostic.serviceId} ${diagnostic.message}`,
    ),
  ];

  const counts = SUMMARY_ORDER.filter((status) => report.summary[status] > 0).map(
    (status) => `${report.summary[status]} ${statusLabel(report, status)}`,
  );

  return {
    heading,
    notices,
    entries: report.entries.map((entry) => formatEntry(report, entry, timeZone)),
    summary: counts.length > 0 ? counts.join(", ") : "Nothing to do",
  };
}

export function presentReport(
  report: ReconciliationReport,
  timeZone: string,
): Effect.Effect<void, never, TerminalService> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const formatted = formatReport(report, timeZone);

    yield* terminal.heading(formatted.heading);
    for (const notice of formatted.notices) {
      yield* terminal.warn(notice);
    }
    for (const line of formatted.entries) {
      yield* terminal.log(line);
    }
    yield* terminal.log("");

    if (report.summary.failed > 0) {
      yield* terminal.error(formatted.summary);
    } else {
      yield* terminal.success(formatted.summary);
    }
  });
}
