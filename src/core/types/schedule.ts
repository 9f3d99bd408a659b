import { Brand, Data } from "effect";
import type { DirectoryError, ResolutionWarning } from "./errors";

/**
 * Scheduling domain types
 */

export const WEEKDAYS = [
  "SUNDAY",
  "MONDAY",
  "TUESDAY",
  "WEDNESDAY",
  "THURSDAY",
  "FRIDAY",
  "SATURDAY",
] as const;

/** Index into WEEKDAYS: 0 = Sunday … 6 = Saturday, same numbering as Date#getUTCDay. */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
}

export interface CalendarDate {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
}

/** An IANA time zone name known to the runtime. */
export type TimeZone = string & Brand.Brand<"TimeZone">;
export const TimeZone = Brand.nominal<TimeZone>();

export interface Recurrence {
  readonly weekday: Weekday;
  readonly time: TimeOfDay;
}

export type PrivacyStatus = "public" | "unlisted" | "private";

/** Settings copied onto every created broadcast. */
export interface BroadcastSettings {
  readonly privacy: PrivacyStatus;
  readonly madeForKids: boolean;
  readonly autoStart: boolean;
  readonly autoStop: boolean;
  readonly dvrEnabled: boolean;
  readonly is360: boolean;
}

/** Opaque handle to a stream key on the remote platform. */
export interface StreamRef {
  readonly streamId: string;
  readonly title: string;
}

export type RemoteId = string;

/** A configured service after validation, before its stream is resolved. */
export interface ServiceDefinition {
  readonly id: string;
  readonly displayName: string;
  readonly description: string;
  readonly recurrence?: Recurrence;
}

export interface Service extends ServiceDefinition {
  readonly streamRef: StreamRef;
}

/** A broadcast that should exist. */
export interface Occurrence extends BroadcastSettings {
  readonly serviceId: string;
  readonly startInstant: Date;
  readonly title: string;
  readonly description: string;
  readonly streamRef: StreamRef;
}

/** A broadcast that exists on the remote platform. */
export interface ObservedOccurrence {
  readonly remoteId: RemoteId;
  readonly title: string;
  readonly startInstant: Date;
  readonly privacy?: PrivacyStatus;
  readonly boundStreamId?: string;
}

export type PlanningWindow = Data.TaggedEnum<{
  NextOccurrence: {};
  WeeksAhead: { readonly weeks: number };
  DateRange: { readonly start: CalendarDate; readonly end: CalendarDate };
}>;
export const PlanningWindow = Data.taggedEnum<PlanningWindow>();

export interface PlanningDiagnostic {
  readonly serviceId: string;
  readonly message: string;
}

export interface PlanResult {
  readonly occurrences: readonly Occurrence[];
  readonly diagnostics: readonly PlanningDiagnostic[];
}

export type ReconciliationAction = "none" | "create" | "remove";

export type ReconciliationStatus = "matched" | "created" | "removed" | "failed" | "reported";

export interface ReportEntry {
  readonly action: ReconciliationAction;
  readonly status: ReconciliationStatus;
  readonly serviceId: string | undefined;
  readonly startInstant: Date;
  readonly title: string;
  readonly remoteId?: RemoteId;
  readonly error?: DirectoryError;
}

export type ReportSummary = Readonly<Record<ReconciliationStatus, number>>;

export interface ReconciliationReport {
  readonly mode: "schedule" | "remove";
  readonly dryRun: boolean;
  readonly entries: readonly ReportEntry[];
  readonly summary: ReportSummary;
  readonly diagnostics: readonly PlanningDiagnostic[];
  readonly warnings: readonly ResolutionWarning[];
}
