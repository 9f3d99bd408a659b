import { Context, Effect, Layer, Option } from "effect";
import { google, type youtube_v3 } from "googleapis";
import { AppConfigServiceTag, type AppConfigService } from "../core/interfaces/app-config";
import {
  BroadcastDirectoryTag,
  type BroadcastDirectory,
} from "../core/interfaces/broadcast-directory";
import { GoogleAuthServiceTag, type GoogleAuthService } from "../core/interfaces/google-auth";
import { LoggerServiceTag, type LoggerService } from "../core/interfaces/logger";
import {
  StreamRegistryTag,
  matchStream,
  type StreamRegistry,
} from "../core/interfaces/stream-registry";
import type { YouTubeConfig } from "../core/types/config";
import { DirectoryError, type GoogleAuthenticationError } from "../core/types/errors";
import type {
  ObservedOccurrence,
  Occurrence,
  PrivacyStatus,
  RemoteId,
  StreamRef,
} from "../core/types/schedule";
import { getErrorMessage, getHttpStatusFromError } from "../core/utils/http-utils";

/**
 * YouTube Live implementation of the Broadcast Directory and Stream Registry
 */

export const PAGE_SIZE = 50;

/**
 * The subset of the YouTube Data API the scheduler calls.
 */
export interface YouTubeApi {
  readonly listBroadcasts: (
    pageToken: string | undefined,
  ) => Promise<youtube_v3.Schema$LiveBroadcastListResponse>;
  readonly insertBroadcast: (
    body: youtube_v3.Schema$LiveBroadcast,
  ) => Promise<youtube_v3.Schema$LiveBroadcast>;
  readonly bindBroadcast: (broadcastId: string, streamId: string) => Promise<void>;
  readonly deleteBroadcast: (broadcastId: string) => Promise<void>;
  readonly addToPlaylist: (playlistId: string, videoId: string) => Promise<void>;
  readonly listStreams: (
    pageToken: string | undefined,
  ) => Promise<youtube_v3.Schema$LiveStreamListResponse>;
}

export function googleYouTubeApi(youtube: youtube_v3.Youtube): YouTubeApi {
  return {
    listBroadcasts: async (pageToken) => {
      const response = await youtube.liveBroadcasts.list({
        part: ["id", "snippet", "status", "contentDetails"],
        broadcastStatus: "upcoming",
        broadcastType: "all",
        maxResults: PAGE_SIZE,
        ...(pageToken !== undefined && { pageToken }),
      });
      return response.data;
    },
    insertBroadcast: async (requestBody) => {
      const response = await youtube.liveBroadcasts.insert({
        part: ["id", "snippet", "status", "contentDetails"],
        requestBody,
      });
      return response.data;
    },
    bindBroadcast: async (id, streamId) => {
      await youtube.liveBroadcasts.bind({ id, part: ["id", "contentDetails"], streamId });
    },
    deleteBroadcast: async (id) => {
      await youtube.liveBroadcasts.delete({ id });
    },
    addToPlaylist: async (playlistId, videoId) => {
      await youtube.playlistItems.insert({
        part: ["snippet"],
        requestBody: {
          snippet: { playlistId, position: 0, resourceId: { kind: "youtube#video", videoId } },
        },
      });
    },
    listStreams: async (pageToken) => {
      const response = await youtube.liveStreams.list({
        part: ["id", "snippet"],
        mine: true,
        maxResults: PAGE_SIZE,
        ...(pageToken !== undefined && { pageToken }),
      });
      return response.data;
    },
  };
}

function toPrivacyStatus(value: string | null | undefined): PrivacyStatus | undefined {
  return value === "public" || value === "unlisted" || value === "private" ? value : undefined;
}

export function buildBroadcastRequestBody(
  occurrence: Occurrence,
  channelId: string | undefined,
): youtube_v3.Schema$LiveBroadcast {
  return {
    snippet: {
      title: occurrence.title,
      description: occurrence.description,
      scheduledStartTime: occurrence.startInstant.toISOString(),
      ...(channelId ? { channelId } : {}),
    },
    status: {
      privacyStatus: occurrence.privacy,
      selfDeclaredMadeForKids: occurrence.madeForKids,
    },
    contentDetails: {
      enableAutoStart: occurrence.autoStart,
      enableAutoStop: occurrence.autoStop,
      enableDvr: occurrence.dvrEnabled,
      projection: occurrence.is360 ? "360" : "rectangular",
    },
  };
}

export class YouTubeServiceResource implements BroadcastDirectory, StreamRegistry {
  private streamsCache: readonly StreamRef[] | undefined;

  constructor(
    private readonly api: YouTubeApi,
    private readonly youtubeConfig: YouTubeConfig,
    private readonly logger: LoggerService,
  ) {}

  listUpcoming(): Effect.Effect<readonly ObservedOccurrence[], DirectoryError> {
    return Effect.gen(
      function* (this: YouTubeServiceResource) {
        const observed: ObservedOccurrence[] = [];
        let pageToken: string | undefined;
        do {
          const token = pageToken;
          const page = yield* this.wrapYouTubeCall(
            () => this.api.listBroadcasts(token),
            "listUpcoming",
            "Failed to list upcoming broadcasts",
          );
          for (const item of page.items ?? []) {
            const parsed = this.parseBroadcast(item);
            if (Option.isSome(parsed)) {
              observed.push(parsed.value);
            } else {
              yield* this.logger.warn("Skipping broadcast without a usable start time", {
                remoteId: item.id ?? undefined,
                title: item.snippet?.title ?? undefined,
              });
            }
          }
          pageToken = page.nextPageToken ?? undefined;
        } while (pageToken);

        yield* this.logger.debug("Listed upcoming broadcasts", { count: observed.length });
        return observed;
      }.bind(this),
    );
  }

  create(occurrence: Occurrence): Effect.Effect<RemoteId, DirectoryError> {
    return Effect.gen(
      function* (this: YouTubeServiceResource) {
        const requestBody = buildBroadcastRequestBody(occurrence, this.youtubeConfig.channelId);
        const inserted = yield* this.wrapYouTubeCall(
          () => this.api.insertBroadcast(requestBody),
          "create",
          "Failed to insert broadcast",
        );
        const broadcastId = inserted.id;
        if (!broadcastId) {
          return yield* Effect.fail(
            new DirectoryError({
              operation: "create",
              message: "Failed to insert broadcast: the response carried no broadcast id",
            }),
          );
        }

        yield* this.attachBroadcast(broadcastId, occurrence).pipe(
          Effect.tapError((error) => this.rollbackCreate(broadcastId, error)),
        );

        return broadcastId;
      }.bind(this),
    );
  }

  /**
   * Bind the inserted broadcast to its stream and file it in the playlist, if any.
   */
  private attachBroadcast(
    broadcastId: RemoteId,
    occurrence: Occurrence,
  ): Effect.Effect<void, DirectoryError> {
    return Effect.gen(
      function* (this: YouTubeServiceResource) {
        yield* this.wrapYouTubeCall(
          () => this.api.bindBroadcast(broadcastId, occurrence.streamRef.streamId),
          "bind",
          `Failed to bind broadcast ${broadcastId} to stream ${occurrence.streamRef.streamId}`,
        );

        const playlistId = this.youtubeConfig.playlistId;
        if (playlistId) {
          yield* this.wrapYouTubeCall(
            () => this.api.addToPlaylist(playlistId, broadcastId),
            "addToPlaylist",
            `Failed to add broadcast ${broadcastId} to playlist ${playlistId}`,
          );
        }
      }.bind(this),
    );
  }

  /**
   * Delete a broadcast whose create did not complete, so the next run creates it afresh.
   * An unbound broadcast is invisible to matching, so leaving it would duplicate it.
   */
  private rollbackCreate(broadcastId: RemoteId, cause: DirectoryError): Effect.Effect<void> {
    return this.delete(broadcastId).pipe(
      Effect.zipRight(
        this.logger.warn("Deleted partially created broadcast", {
          remoteId: broadcastId,
          failedStep: cause.operation,
        }),
      ),
      Effect.catchAll((rollbackError) =>
        this.logger.error("Failed to delete partially created broadcast; remove it by hand", {
          remoteId: broadcastId,
          failedStep: cause.operation,
          error: rollbackError.message,
        }),
      ),
    );
  }

  delete(remoteId: RemoteId): Effect.Effect<void, DirectoryError> {
    return this.wrapYouTubeCall(
      () => this.api.deleteBroadcast(remoteId),
      "delete",
      `Failed to delete broadcast ${remoteId}`,
    );
  }

  listStreams(): Effect.Effect<readonly StreamRef[], DirectoryError> {
    return Effect.gen(
      function* (this: YouTubeServiceResource) {
        if (this.streamsCache !== undefined) return this.streamsCache;

        const streams: StreamRef[] = [];
        let pageToken: string | undefined;
        do {
          const token = pageToken;
          const page = yield* this.wrapYouTubeCall(
            () => this.api.listStreams(token),
            "listStreams",
            "Failed to list live streams",
          );
          for (const item of page.items ?? []) {
            if (item.id && item.snippet?.title) {
              streams.push({ streamId: item.id, title: item.snippet.title });
            }
          }
          pageToken = page.nextPageToken ?? undefined;
        } while (pageToken);

        this.streamsCache = streams;
        return streams;
      }.bind(this),
    );
  }

  resolve(
    serviceId: string,
    campusName: string,
  ): Effect.Effect<Option.Option<StreamRef>, DirectoryError> {
    return Effect.map(this.listStreams(), (streams) => matchStream(streams, serviceId, campusName));
  }

  private parseBroadcast(item: youtube_v3.Schema$LiveBroadcast): Option.Option<ObservedOccurrence> {
    const scheduled = item.snippet?.scheduledStartTime;
    if (!item.id || !scheduled) return Option.none();
    const startInstant = new Date(scheduled);
    if (Number.isNaN(startInstant.getTime())) return Option.none();

    const privacy = toPrivacyStatus(item.status?.privacyStatus);
    const boundStreamId = item.contentDetails?.boundStreamId;
    return Option.some({
      remoteId: item.id,
      title: item.snippet?.title ?? "",
      startInstant,
      ...(privacy !== undefined && { privacy }),
      ...(boundStreamId ? { boundStreamId } : {}),
    });
  }

  private wrapYouTubeCall<A>(
    operation: () => Promise<A>,
    step: string,
    failureMessage: string,
  ): Effect.Effect<A, DirectoryError> {
    return Effect.tryPromise({
      try: operation,
      catch: (err) => {
        const status = getHttpStatusFromError(err);
        return new DirectoryError({
          operation: step,
          message: `${failureMessage}: ${getErrorMessage(err)}`,
          ...(status !== undefined && { status }),
          ...(status === 403 && {
            suggestion: "Check the YouTube API quota and that live streaming is enabled",
          }),
        });
      },
    });
  }
}

/**
 * Both collaborators backed by one YouTube client. Building the layer authenticates.
 */
export function createYouTubeLayer(): Layer.Layer<
  BroadcastDirectory | StreamRegistry,
  GoogleAuthenticationError,
  GoogleAuthService | AppConfigService | LoggerService
> {
  return Layer.effectContext(
    Effect.gen(function* () {
      const auth = yield* GoogleAuthServiceTag;
      const logger = yield* LoggerServiceTag;
      const appConfig = yield* (yield* AppConfigServiceTag).appConfig;

      const client = yield* auth.authorizedClient();
      const youtube = google.youtube({ version: "v3", auth: client });
      const resource = new YouTubeServiceResource(
        googleYouTubeApi(youtube),
        appConfig.youtube,
        logger,
      );

      return Context.make(BroadcastDirectoryTag, resource).pipe(
        Context.add(StreamRegistryTag, resource),
      );
    }),
  );
}
