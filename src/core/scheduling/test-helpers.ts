import { Effect, Layer } from "effect";
import {
  BroadcastDirectoryTag,
  type BroadcastDirectory,
} from "@/core/interfaces/broadcast-directory";
import { LoggerServiceTag, type LoggerService } from "@/core/interfaces/logger";
import {
  StreamRegistryTag,
  matchStream,
  type StreamRegistry,
} from "@/core/interfaces/stream-registry";
import type { LogLevel } from "@/core/types/config";
import { DirectoryError } from "@/core/types/errors";
import type {
  BroadcastSettings,
  ObservedOccurrence,
  Occurrence,
  RemoteId,
  StreamRef,
} from "@/core/types/schedule";
import type { CatalogInput } from "./service-catalog";

/**
 * In-process stand-ins for the remote collaborators, shared by the tests.
 */

export interface InMemoryDirectory extends BroadcastDirectory {
  /** Current remote state. */
  readonly broadcasts: ObservedOccurrence[];
  readonly createCalls: Occurrence[];
  readonly deleteCalls: RemoteId[];
  readonly listCalls: () => number;
}

export interface InMemoryDirectoryOptions {
  readonly initial?: readonly ObservedOccurrence[];
  readonly failList?: boolean;
  readonly failCreate?: (occurrence: Occurrence) => boolean;
  readonly failDelete?: (remoteId: RemoteId) => boolean;
}

export function makeInMemoryDirectory(options: InMemoryDirectoryOptions = {}): InMemoryDirectory {
  const broadcasts: ObservedOccurrence[] = [...(options.initial ?? [])];
  const createCalls: Occurrence[] = [];
  const deleteCalls: RemoteId[] = [];
  let lists = 0;
  let nextId = 1;

  return {
    broadcasts,
    createCalls,
    deleteCalls,
    listCalls: () => lists,

    listUpcoming: () =>
      Effect.suspend(() => {
        lists += 1;
        return options.failList
          ? Effect.fail(
              new DirectoryError({ operation: "listUpcoming", message: "listing unavailable" }),
            )
          : Effect.succeed([...broadcasts]);
      }),

    create: (occurrence) =>
      Effect.suspend(() => {
        createCalls.push(occurrence);
        if (options.failCreate?.(occurrence)) {
          return Effect.fail(
            new DirectoryError({ operation: "create", message: "quota exceeded", status: 403 }),
          );
        }
        const remoteId = `broadcast-${nextId++}`;
        broadcasts.push({
          remoteId,
          title: occurrence.title,
          startInstant: occurrence.startInstant,
          privacy: occurrence.privacy,
          boundStreamId: occurrence.streamRef.streamId,
        });
        return Effect.succeed(remoteId);
      }),

    delete: (remoteId) =>
      Effect.suspend(() => {
        deleteCalls.push(remoteId);
        if (options.failDelete?.(remoteId)) {
          return Effect.fail(
            new DirectoryError({ operation: "delete", message: "not found", status: 404 }),
          );
        }
        const index = broadcasts.findIndex((broadcast) => broadcast.remoteId === remoteId);
        if (index >= 0) broadcasts.splice(index, 1);
        return Effect.void;
      }),
  };
}

export function makeInMemoryStreamRegistry(
  streams: readonly StreamRef[],
  options: { readonly fail?: boolean } = {},
): StreamRegistry {
  const listStreams = (): Effect.Effect<readonly StreamRef[], DirectoryError> =>
    options.fail
      ? Effect.fail(new DirectoryError({ operation: "listStreams", message: "registry offline" }))
      : Effect.succeed(streams);

  return {
    listStreams,
    resolve: (serviceId, campusName) =>
      Effect.map(listStreams(), (all) => matchStream(all, serviceId, campusName)),
  };
}

export interface RecordedLog {
  readonly level: LogLevel;
  readonly message: string;
  readonly meta?: Record<string, unknown>;
}

export function makeRecordingLogger(): { logger: LoggerService; logs: RecordedLog[] } {
  const logs: RecordedLog[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, meta?: Record<string, unknown>): Effect.Effect<void> =>
      Effect.sync(() => {
        logs.push({ level, message, ...(meta !== undefined && { meta }) });
      });

  return {
    logs,
    logger: {
      debug: record("debug"),
      info: record("info"),
      warn: record("warn"),
      error: record("error"),
    },
  };
}

export function collaboratorsLayer(
  directory: BroadcastDirectory,
  registry: StreamRegistry,
  logger: LoggerService = makeRecordingLogger().logger,
): Layer.Layer<BroadcastDirectory | StreamRegistry | LoggerService> {
  return Layer.mergeAll(
    Layer.succeed(BroadcastDirectoryTag, directory),
    Layer.succeed(StreamRegistryTag, registry),
    Layer.succeed(LoggerServiceTag, logger),
  );
}

export const sampleSettings: BroadcastSettings = {
  privacy: "unlisted",
  madeForKids: false,
  autoStart: true,
  autoStop: true,
  dvrEnabled: true,
  is360: false,
};

/** Fishers campus with a Saturday 16:00 service A and a Sunday 09:30 service B. */
export function sampleCatalogInput(overrides: Partial<CatalogInput> = {}): CatalogInput {
  return {
    campusName: "Fishers",
    timezone: "America/Indianapolis",
    enabledServices: ["A", "B"],
    services: {
      A: { name: "Saturday Evening", day: "Saturday", time: "16:00", description: "Weekend service" },
      B: { name: "Sunday Morning", day: "Sunday", time: "09:30" },
    },
    settings: sampleSettings,
    ...overrides,
  };
}

export const sampleStreams: readonly StreamRef[] = [
  { streamId: "stream-A", title: "Fishers Stream A" },
  { streamId: "stream-B", title: "Fishers Stream B" },
  { streamId: "stream-N", title: "Noblesville Stream A" },
];
