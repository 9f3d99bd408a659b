import { Effect, TestClock, TestContext, type Layer } from "effect";
import { describe, expect, it } from "vitest";
import type { BroadcastDirectory } from "@/core/interfaces/broadcast-directory";
import type { LoggerService } from "@/core/interfaces/logger";
import type { StreamRegistry } from "@/core/interfaces/stream-registry";
import { PlanningWindow, type ObservedOccurrence } from "@/core/types/schedule";
import { hasFailures, runDefault, runRemove } from "./reconciliation-engine";
import { ServiceCatalog } from "./service-catalog";
import {
  collaboratorsLayer,
  makeInMemoryDirectory,
  makeInMemoryStreamRegistry,
  makeRecordingLogger,
  sampleCatalogInput,
  sampleStreams,
  type InMemoryDirectory,
} from "./test-helpers";

const NOW = "2025-01-01T05:00:00.000Z";
const JAN_4 = new Date("2025-01-04T21:00:00.000Z");
const JAN_5 = new Date("2025-01-05T14:30:00.000Z");
const JAN_11 = new Date("2025-01-11T21:00:00.000Z");

function run<A, E>(
  effect: Effect.Effect<A, E, BroadcastDirectory | StreamRegistry | LoggerService>,
  layer: Layer.Layer<BroadcastDirectory | StreamRegistry | LoggerService>,
): Promise<A> {
  return Effect.runPromise(
    Effect.gen(function* () {
      yield* TestClock.setTime(new Date(NOW).getTime());
      return yield* effect;
    }).pipe(Effect.provide(layer), Effect.provide(TestContext.TestContext)),
  );
}

function setup(directory: InMemoryDirectory, enabledServices: readonly string[] = ["A"]) {
  const layer = collaboratorsLayer(directory, makeInMemoryStreamRegistry(sampleStreams));
  const catalog = ServiceCatalog.build(sampleCatalogInput({ enabledServices }));
  return { layer, catalog };
}

function remote(remoteId: string, startInstant: Date, boundStreamId?: string): ObservedOccurrence {
  return {
    remoteId,
    title: `remote ${remoteId}`,
    startInstant,
    ...(boundStreamId !== undefined && { boundStreamId }),
  };
}

describe("runDefault", () => {
  it("should match an occurrence that already exists remotely and create nothing", async () => {
    const directory = makeInMemoryDirectory({ initial: [remote("existing-1", JAN_4, "stream-A")] });
    const { layer, catalog } = setup(directory);

    const report = await run(
      Effect.flatMap(catalog, (c) => runDefault(c, PlanningWindow.NextOccurrence(), false)),
      layer,
    );

    expect(directory.createCalls).toHaveLength(0);
    expect(report.entries).toEqual([
      {
        action: "none",
        status: "matched",
        serviceId: "A",
        startInstant: JAN_4,
        title: "Fishers // 01-04-2025 // 04:00 PM",
        remoteId: "existing-1",
      },
    ]);
    expect(report.summary).toEqual({ matched: 1, created: 0, removed: 0, failed: 0, reported: 0 });
  });

  it("should create missing occurrences in plan order", async () => {
    const directory = makeInMemoryDirectory();
    const { layer, catalog } = setup(directory, ["A", "B"]);

    const report = await run(
      Effect.flatMap(catalog, (c) => runDefault(c, PlanningWindow.WeeksAhead({ weeks: 1 }), false)),
      layer,
    );

    expect(directory.createCalls.map((occurrence) => occurrence.startInstant)).toEqual([
      JAN_4,
      JAN_5,
    ]);
    expect(directory.createCalls[0]?.streamRef.streamId).toBe("stream-A");
    expect(directory.createCalls[1]?.streamRef.streamId).toBe("stream-B");
    expect(report.entries.map((entry) => [entry.status, entry.remoteId])).toEqual([
      ["created", "broadcast-1"],
      ["created", "broadcast-2"],
    ]);
    expect(report.summary.created).toBe(2);
  });

  it("should be idempotent across runs", async () => {
    const directory = makeInMemoryDirectory();
    const { layer, catalog } = setup(directory);
    const window = PlanningWindow.WeeksAhead({ weeks: 2 });

    const first = await run(Effect.flatMap(catalog, (c) => runDefault(c, window, false)), layer);
    const second = await run(Effect.flatMap(catalog, (c) => runDefault(c, window, false)), layer);

    expect(first.summary.created).toBe(2);
    expect(second.summary).toEqual({ matched: 2, created: 0, removed: 0, failed: 0, reported: 0 });
    expect(directory.createCalls).toHaveLength(2);
  });

  it("should record a failed create and continue with the rest", async () => {
    const directory = makeInMemoryDirectory({
      failCreate: (occurrence) => occurrence.startInstant.getTime() === JAN_4.getTime(),
    });
    const { layer, catalog } = setup(directory);

    const report = await run(
      Effect.flatMap(catalog, (c) => runDefault(c, PlanningWindow.WeeksAhead({ weeks: 2 }), false)),
      layer,
    );

    expect(report.entries.map((entry) => entry.status)).toEqual(["failed", "created"]);
    expect(report.entries[0]?.error?._tag).toBe("DirectoryError");
    expect(report.entries[0]?.error?.status).toBe(403);
    expect(report.entries[1]?.startInstant).toEqual(JAN_11);
    expect(hasFailures(report)).toBe(true);
  });

  it("should make no mutating call under dry-run", async () => {
    const directory = makeInMemoryDirectory({ initial: [remote("existing-1", JAN_4, "stream-A")] });
    const { layer, catalog } = setup(directory);

    const report = await run(
      Effect.flatMap(catalog, (c) => runDefault(c, PlanningWindow.WeeksAhead({ weeks: 2 }), true)),
      layer,
    );

    expect(directory.createCalls).toHaveLength(0);
    expect(directory.deleteCalls).toHaveLength(0);
    expect(report.dryRun).toBe(true);
    expect(report.entries.map((entry) => [entry.action, entry.status])).toEqual([
      ["none", "matched"],
      ["create", "reported"],
    ]);
  });

  it("should not match a remote broadcast bound to another stream", async () => {
    const directory = makeInMemoryDirectory({
      initial: [remote("other-campus", JAN_4, "stream-N"), remote("unbound", JAN_4)],
    });
    const { layer, catalog } = setup(directory);

    const report = await run(
      Effect.flatMap(catalog, (c) => runDefault(c, PlanningWindow.NextOccurrence(), false)),
      layer,
    );

    expect(report.entries.map((entry) => entry.status)).toEqual(["created"]);
  });

  it("should abort when upcoming broadcasts cannot be listed", async () => {
    const directory = makeInMemoryDirectory({ failList: true });
    const { layer, catalog } = setup(directory);

    const error = await run(
      Effect.flip(
        Effect.flatMap(catalog, (c) => runDefault(c, PlanningWindow.NextOccurrence(), false)),
      ),
      layer,
    );

    expect(error._tag).toBe("DirectoryError");
    expect(directory.createCalls).toHaveLength(0);
  });

  it("should reject an invalid window before contacting the directory", async () => {
    const directory = makeInMemoryDirectory();
    const { layer, catalog } = setup(directory);

    const error = await run(
      Effect.flip(
        Effect.flatMap(catalog, (c) => runDefault(c, PlanningWindow.WeeksAhead({ weeks: 0 }), false)),
      ),
      layer,
    );

    expect(error._tag).toBe("ConfigurationError");
    expect(directory.listCalls()).toBe(0);
  });

  it("should carry diagnostics and resolution warnings into the report", async () => {
    const registry = makeInMemoryStreamRegistry([
      ...sampleStreams,
      { streamId: "stream-S", title: "Fishers Stream S" },
    ]);
    const layer = collaboratorsLayer(makeInMemoryDirectory(), registry);
    const catalog = ServiceCatalog.build(
      sampleCatalogInput({
        enabledServices: ["A", "B", "S", "Z"],
        services: {
          ...sampleCatalogInput().services,
          S: { name: "Special" },
          Z: { name: "No stream", day: "Monday", time: "19:00" },
        },
      }),
    );

    const report = await run(
      Effect.flatMap(catalog, (c) => runDefault(c, PlanningWindow.NextOccurrence(), true)),
      layer,
    );

    expect(report.diagnostics.map((diagnostic) => diagnostic.serviceId)).toEqual(["S"]);
    expect(report.warnings.map((warning) => warning.expectedStreamTitle)).toEqual([
      "Fishers Stream Z",
    ]);
    expect(report.entries.map((entry) => entry.serviceId)).toEqual(["A", "B"]);
  });
});

describe("runRemove", () => {
  const upcoming = [
    remote("r-3", JAN_11, "stream-A"),
    remote("r-2", JAN_4, "stream-B"),
    remote("r-1", JAN_4, "stream-A"),
  ];

  it("should delete every upcoming broadcast in start order", async () => {
    const directory = makeInMemoryDirectory({ initial: upcoming });
    const { logger } = makeRecordingLogger();
    const layer = collaboratorsLayer(directory, makeInMemoryStreamRegistry(sampleStreams), logger);

    const report = await run(runRemove(false), layer);

    expect(directory.deleteCalls).toEqual(["r-1", "r-2", "r-3"]);
    expect(directory.broadcasts).toEqual([]);
    expect(report.mode).toBe("remove");
    expect(report.summary.removed).toBe(3);
  });

  it("should attribute broadcasts to services when a catalog is given", async () => {
    const directory = makeInMemoryDirectory({ initial: upcoming });
    const { layer, catalog } = setup(directory, ["A", "B"]);

    const report = await run(
      Effect.flatMap(catalog, (c) => runRemove(false, c)),
      layer,
    );

    expect(report.entries.map((entry) => [entry.serviceId, entry.remoteId])).toEqual([
      ["A", "r-1"],
      ["B", "r-2"],
      ["A", "r-3"],
    ]);
  });

  it("should only report under dry-run", async () => {
    const directory = makeInMemoryDirectory({ initial: upcoming });
    const { layer } = setup(directory);

    const report = await run(runRemove(true), layer);

    expect(directory.deleteCalls).toEqual([]);
    expect(directory.broadcasts).toHaveLength(3);
    expect(report.summary).toEqual({ matched: 0, created: 0, removed: 0, failed: 0, reported: 3 });
  });

  it("should keep deleting after a failure", async () => {
    const directory = makeInMemoryDirectory({
      initial: upcoming,
      failDelete: (remoteId) => remoteId === "r-2",
    });
    const { layer } = setup(directory);

    const report = await run(runRemove(false), layer);

    expect(directory.deleteCalls).toEqual(["r-1", "r-2", "r-3"]);
    expect(report.entries.map((entry) => entry.status)).toEqual(["removed", "failed", "removed"]);
    expect(report.summary.failed).toBe(1);
  });
});
