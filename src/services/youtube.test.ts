import { Effect, Layer, Option, TestClock, TestContext } from "effect";
import type { youtube_v3 } from "googleapis";
import { describe, expect, it, vi } from "vitest";
import { BroadcastDirectoryTag } from "../core/interfaces/broadcast-directory";
import { LoggerServiceTag } from "../core/interfaces/logger";
import { StreamRegistryTag } from "../core/interfaces/stream-registry";
import { runDefault } from "../core/scheduling/reconciliation-engine";
import { ServiceCatalog } from "../core/scheduling/service-catalog";
import { makeRecordingLogger, sampleCatalogInput } from "../core/scheduling/test-helpers";
import type { YouTubeConfig } from "../core/types/config";
import { PlanningWindow, type Occurrence } from "../core/types/schedule";
import { YouTubeServiceResource, buildBroadcastRequestBody, type YouTubeApi } from "./youtube";

const youtubeConfig: YouTubeConfig = {
  privacyStatus: "unlisted",
  madeForKids: false,
  autoStart: true,
  autoStop: true,
  dvrEnabled: true,
  is360: false,
};

const occurrence: Occurrence = {
  serviceId: "A",
  startInstant: new Date("2025-01-04T21:00:00.000Z"),
  title: "Fishers // 01-04-2025 // 04:00 PM",
  description: "Weekend service",
  streamRef: { streamId: "stream-A", title: "Fishers Stream A" },
  privacy: "unlisted",
  madeForKids: false,
  autoStart: true,
  autoStop: false,
  dvrEnabled: true,
  is360: true,
};

function makeApi(overrides: Partial<YouTubeApi> = {}) {
  const api = {
    listBroadcasts: vi.fn(
      (_pageToken: string | undefined): Promise<youtube_v3.Schema$LiveBroadcastListResponse> =>
        Promise.resolve({ items: [] }),
    ),
    insertBroadcast: vi.fn(
      (_body: youtube_v3.Schema$LiveBroadcast): Promise<youtube_v3.Schema$LiveBroadcast> =>
        Promise.resolve({ id: "broadcast-1" }),
    ),
    bindBroadcast: vi.fn((_id: string, _streamId: string) => Promise.resolve()),
    deleteBroadcast: vi.fn((_id: string) => Promise.resolve()),
    addToPlaylist: vi.fn((_playlistId: string, _videoId: string) => Promise.resolve()),
    listStreams: vi.fn(
      (_pageToken: string | undefined): Promise<youtube_v3.Schema$LiveStreamListResponse> =>
        Promise.resolve({ items: [] }),
    ),
  };
  return { ...api, ...overrides };
}

function makeResource(api: YouTubeApi, config: YouTubeConfig = youtubeConfig) {
  const { logger, logs } = makeRecordingLogger();
  return { resource: new YouTubeServiceResource(api, config, logger), logs };
}

describe("YouTubeServiceResource", () => {
  describe("buildBroadcastRequestBody", () => {
    it("should copy the occurrence settings onto the broadcast", () => {
      expect(buildBroadcastRequestBody(occurrence, "channel-1")).toEqual({
        snippet: {
          title: "Fishers // 01-04-2025 // 04:00 PM",
          description: "Weekend service",
          scheduledStartTime: "2025-01-04T21:00:00.000Z",
          channelId: "channel-1",
        },
        status: { privacyStatus: "unlisted", selfDeclaredMadeForKids: false },
        contentDetails: {
          enableAutoStart: true,
          enableAutoStop: false,
          enableDvr: true,
          projection: "360",
        },
      });
    });

    it("should leave out the channel when none is configured", () => {
      const body = buildBroadcastRequestBody(occurrence, undefined);
      expect(body.snippet).not.toHaveProperty("channelId");
    });
  });

  describe("listUpcoming", () => {
    it("should follow page tokens and map broadcasts", async () => {
      const listBroadcasts = vi.fn(
        (pageToken: string | undefined): Promise<youtube_v3.Schema$LiveBroadcastListResponse> =>
          Promise.resolve(
            pageToken === undefined
              ? {
                  items: [
                    {
                      id: "remote-1",
                      snippet: {
                        title: "Fishers // 01-04-2025 // 04:00 PM",
                        scheduledStartTime: "2025-01-04T21:00:00Z",
                      },
                      status: { privacyStatus: "unlisted" },
                      contentDetails: { boundStreamId: "stream-A" },
                    },
                  ],
                  nextPageToken: "page-2",
                }
              : {
                  items: [
                    {
                      id: "remote-2",
                      snippet: { title: "Manual", scheduledStartTime: "2025-01-05T14:30:00Z" },
                    },
                  ],
                },
          ),
      );
      const { resource } = makeResource(makeApi({ listBroadcasts }));

      const observed = await Effect.runPromise(resource.listUpcoming());

      expect(listBroadcasts.mock.calls.map((call) => call[0])).toEqual([undefined, "page-2"]);
      expect(observed).toEqual([
        {
          remoteId: "remote-1",
          title: "Fishers // 01-04-2025 // 04:00 PM",
          startInstant: new Date("2025-01-04T21:00:00.000Z"),
          privacy: "unlisted",
          boundStreamId: "stream-A",
        },
        {
          remoteId: "remote-2",
          title: "Manual",
          startInstant: new Date("2025-01-05T14:30:00.000Z"),
        },
      ]);
    });

    it("should skip broadcasts without a usable start time", async () => {
      const listBroadcasts = vi.fn(() =>
        Promise.resolve({
          items: [
            { id: "remote-1", snippet: { title: "No start" } },
            { id: "remote-2", snippet: { title: "Bad start", scheduledStartTime: "soon" } },
          ],
        }),
      );
      const { resource, logs } = makeResource(makeApi({ listBroadcasts }));

      const observed = await Effect.runPromise(resource.listUpcoming());

      expect(observed).toEqual([]);
      expect(logs.filter((log) => log.level === "warn").map((log) => log.meta?.["remoteId"])).toEqual(
        ["remote-1", "remote-2"],
      );
    });

    it("should fail with a directory error when the API rejects", async () => {
      const listBroadcasts = vi.fn(() => Promise.reject(new Error("backend error")));
      const { resource } = makeResource(makeApi({ listBroadcasts }));

      const error = await Effect.runPromise(Effect.flip(resource.listUpcoming()));

      expect(error.operation).toBe("listUpcoming");
      expect(error.message).toBe("Failed to list upcoming broadcasts: backend error");
    });
  });

  describe("create", () => {
    it("should insert, bind and add the broadcast to the playlist", async () => {
      const api = makeApi();
      const { resource } = makeResource(api, { ...youtubeConfig, playlistId: "PL-test" });

      const remoteId = await Effect.runPromise(resource.create(occurrence));

      expect(remoteId).toBe("broadcast-1");
      expect(api.insertBroadcast).toHaveBeenCalledTimes(1);
      expect(api.bindBroadcast).toHaveBeenCalledWith("broadcast-1", "stream-A");
      expect(api.addToPlaylist).toHaveBeenCalledWith("PL-test", "broadcast-1");
    });

    it("should skip the playlist step when no playlist is configured", async () => {
      const api = makeApi();
      const { resource } = makeResource(api);

      await Effect.runPromise(resource.create(occurrence));

      expect(api.addToPlaylist).not.toHaveBeenCalled();
    });

    it("should name the step that failed", async () => {
      const api = makeApi({
        bindBroadcast: vi.fn(() => Promise.reject(new Error("stream not found"))),
      });
      const { resource } = makeResource(api, { ...youtubeConfig, playlistId: "PL-test" });

      const error = await Effect.runPromise(Effect.flip(resource.create(occurrence)));

      expect(error.operation).toBe("bind");
      expect(error.message).toBe(
        "Failed to bind broadcast broadcast-1 to stream stream-A: stream not found",
      );
      expect(api.addToPlaylist).not.toHaveBeenCalled();
    });

    it("should delete the inserted broadcast when binding fails", async () => {
      const api = makeApi({
        bindBroadcast: vi.fn(() => Promise.reject(new Error("stream not found"))),
      });
      const { resource, logs } = makeResource(api);

      const error = await Effect.runPromise(Effect.flip(resource.create(occurrence)));

      expect(error.operation).toBe("bind");
      expect(api.deleteBroadcast).toHaveBeenCalledWith("broadcast-1");
      expect(logs.filter((log) => log.level === "warn")).toEqual([
        {
          level: "warn",
          message: "Deleted partially created broadcast",
          meta: { remoteId: "broadcast-1", failedStep: "bind" },
        },
      ]);
    });

    it("should delete the inserted broadcast when the playlist step fails", async () => {
      const api = makeApi({
        addToPlaylist: vi.fn(() => Promise.reject(new Error("playlist not found"))),
      });
      const { resource } = makeResource(api, { ...youtubeConfig, playlistId: "PL-test" });

      const error = await Effect.runPromise(Effect.flip(resource.create(occurrence)));

      expect(error.operation).toBe("addToPlaylist");
      expect(error.message).toBe(
        "Failed to add broadcast broadcast-1 to playlist PL-test: playlist not found",
      );
      expect(api.deleteBroadcast).toHaveBeenCalledWith("broadcast-1");
    });

    it("should keep the original failure and log the leftover when the rollback fails", async () => {
      const api = makeApi({
        bindBroadcast: vi.fn(() => Promise.reject(new Error("stream not found"))),
        deleteBroadcast: vi.fn(() => Promise.reject(new Error("backend error"))),
      });
      const { resource, logs } = makeResource(api);

      const error = await Effect.runPromise(Effect.flip(resource.create(occurrence)));

      expect(error.operation).toBe("bind");
      expect(logs.filter((log) => log.level === "error")).toEqual([
        {
          level: "error",
          message: "Failed to delete partially created broadcast; remove it by hand",
          meta: {
            remoteId: "broadcast-1",
            failedStep: "bind",
            error: "Failed to delete broadcast broadcast-1: backend error",
          },
        },
      ]);
    });

    it("should not delete anything after a complete create", async () => {
      const api = makeApi();
      const { resource } = makeResource(api, { ...youtubeConfig, playlistId: "PL-test" });

      await Effect.runPromise(resource.create(occurrence));

      expect(api.deleteBroadcast).not.toHaveBeenCalled();
    });

    it("should fail when the insert returns no id", async () => {
      const api = makeApi({ insertBroadcast: vi.fn(() => Promise.resolve({})) });
      const { resource } = makeResource(api);

      const error = await Effect.runPromise(Effect.flip(resource.create(occurrence)));

      expect(error.operation).toBe("create");
      expect(api.bindBroadcast).not.toHaveBeenCalled();
    });
  });

  describe("delete", () => {
    it("should delete the broadcast by id", async () => {
      const api = makeApi();
      const { resource } = makeResource(api);

      await Effect.runPromise(resource.delete("remote-1"));

      expect(api.deleteBroadcast).toHaveBeenCalledWith("remote-1");
    });
  });

  describe("streams", () => {
    const listStreams = () =>
      vi.fn(
        (pageToken: string | undefined): Promise<youtube_v3.Schema$LiveStreamListResponse> =>
          Promise.resolve(
            pageToken === undefined
              ? {
                  items: [
                    { id: "stream-A", snippet: { title: "Fishers Stream A" } },
                    { id: "stream-x" },
                  ],
                  nextPageToken: "page-2",
                }
              : { items: [{ id: "stream-B", snippet: { title: "Fishers Stream b " } }] },
          ),
      );

    it("should list every titled stream once per run", async () => {
      const api = makeApi({ listStreams: listStreams() });
      const { resource } = makeResource(api);

      const first = await Effect.runPromise(resource.listStreams());
      const second = await Effect.runPromise(resource.listStreams());

      expect(first).toEqual([
        { streamId: "stream-A", title: "Fishers Stream A" },
        { streamId: "stream-B", title: "Fishers Stream b " },
      ]);
      expect(second).toBe(first);
      expect(api.listStreams).toHaveBeenCalledTimes(2);
    });

    it("should resolve a service to its stream by title", async () => {
      const { resource } = makeResource(makeApi({ listStreams: listStreams() }));

      const found = await Effect.runPromise(resource.resolve("B", "Fishers"));
      const missing = await Effect.runPromise(resource.resolve("C", "Fishers"));

      expect(found).toEqual(Option.some({ streamId: "stream-B", title: "Fishers Stream b " }));
      expect(Option.isNone(missing)).toBe(true);
    });
  });

  describe("repeated scheduling runs", () => {
    interface ChannelFailures {
      bind?: number;
      playlist?: number;
    }

    /** A stateful channel behind the API seam; each step fails the given number of times. */
    function makeChannel(failures: ChannelFailures) {
      const broadcasts = new Map<string, youtube_v3.Schema$LiveBroadcast>();
      let nextId = 1;
      let bindFailures = failures.bind ?? 0;
      let playlistFailures = failures.playlist ?? 0;

      const api = makeApi({
        listBroadcasts: vi.fn(() => Promise.resolve({ items: [...broadcasts.values()] })),
        insertBroadcast: vi.fn((body: youtube_v3.Schema$LiveBroadcast) => {
          const inserted = { ...body, id: `broadcast-${nextId++}` };
          broadcasts.set(inserted.id, inserted);
          return Promise.resolve(inserted);
        }),
        bindBroadcast: vi.fn((id: string, streamId: string) => {
          if (bindFailures > 0) {
            bindFailures -= 1;
            return Promise.reject(new Error("backend error"));
          }
          const broadcast = broadcasts.get(id);
          if (broadcast) {
            broadcasts.set(id, { ...broadcast, contentDetails: { boundStreamId: streamId } });
          }
          return Promise.resolve();
        }),
        deleteBroadcast: vi.fn((id: string) => {
          broadcasts.delete(id);
          return Promise.resolve();
        }),
        addToPlaylist: vi.fn((_playlistId: string, _videoId: string) => {
          if (playlistFailures > 0) {
            playlistFailures -= 1;
            return Promise.reject(new Error("backend error"));
          }
          return Promise.resolve();
        }),
        listStreams: vi.fn(() =>
          Promise.resolve({ items: [{ id: "stream-A", snippet: { title: "Fishers Stream A" } }] }),
        ),
      });
      return { api, broadcasts };
    }

    function scheduleRun(api: YouTubeApi, config: YouTubeConfig) {
      const { resource } = makeResource(api, config);
      const layer = Layer.mergeAll(
        Layer.succeed(BroadcastDirectoryTag, resource),
        Layer.succeed(StreamRegistryTag, resource),
        Layer.succeed(LoggerServiceTag, makeRecordingLogger().logger),
      );
      return Effect.runPromise(
        Effect.gen(function* () {
          yield* TestClock.setTime(new Date("2025-01-01T05:00:00.000Z").getTime());
          const catalog = yield* ServiceCatalog.build(sampleCatalogInput({ enabledServices: ["A"] }));
          return yield* runDefault(catalog, PlanningWindow.NextOccurrence(), false);
        }).pipe(Effect.provide(layer), Effect.provide(TestContext.TestContext)),
      );
    }

    it("should leave a single broadcast after a bind failure and a rerun", async () => {
      const { api, broadcasts } = makeChannel({ bind: 1 });

      const first = await scheduleRun(api, youtubeConfig);
      const second = await scheduleRun(api, youtubeConfig);
      const third = await scheduleRun(api, youtubeConfig);

      expect(first.entries.map((entry) => entry.status)).toEqual(["failed"]);
      expect(first.entries[0]?.error?.operation).toBe("bind");
      expect(second.entries.map((entry) => [entry.status, entry.remoteId])).toEqual([
        ["created", "broadcast-2"],
      ]);
      expect(third.entries.map((entry) => [entry.status, entry.remoteId])).toEqual([
        ["matched", "broadcast-2"],
      ]);
      expect([...broadcasts.keys()]).toEqual(["broadcast-2"]);
      expect(api.insertBroadcast).toHaveBeenCalledTimes(2);
    });

    it("should add the broadcast to the playlist on the rerun after a playlist failure", async () => {
      const { api, broadcasts } = makeChannel({ playlist: 1 });
      const config: YouTubeConfig = { ...youtubeConfig, playlistId: "PL-test" };

      const first = await scheduleRun(api, config);
      const second = await scheduleRun(api, config);

      expect(first.entries.map((entry) => entry.status)).toEqual(["failed"]);
      expect(second.entries.map((entry) => entry.status)).toEqual(["created"]);
      expect(api.addToPlaylist).toHaveBeenLastCalledWith("PL-test", "broadcast-2");
      expect([...broadcasts.keys()]).toEqual(["broadcast-2"]);
    });
  });
});
