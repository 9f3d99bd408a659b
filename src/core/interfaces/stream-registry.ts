import { Context, Effect, Option } from "effect";
import type { DirectoryError } from "@/core/types/errors";
import type { StreamRef } from "@/core/types/schedule";

/**
 * Maps services to the stream keys configured on the remote platform
 */
export interface StreamRegistry {
  /**
   * Finds the stream named "{campusName} Stream {serviceId}".
   * Fails only when the streams cannot be listed at all.
   */
  readonly resolve: (
    serviceId: string,
    campusName: string,
  ) => Effect.Effect<Option.Option<StreamRef>, DirectoryError>;

  /** Lists every stream available to the authenticated channel. */
  readonly listStreams: () => Effect.Effect<readonly StreamRef[], DirectoryError>;
}

export const StreamRegistryTag = Context.GenericTag<StreamRegistry>("StreamRegistry");

/**
 * Title a stream must carry to be picked up for a service.
 */
export function expectedStreamTitle(campusName: string, serviceId: string): string {
  return `${campusName} Stream ${serviceId}`;
}

/**
 * Picks the stream whose title is "{campusName} Stream {serviceId}". The service id is
 * compared case-insensitively and surrounding whitespace is ignored.
 */
export function matchStream(
  streams: readonly StreamRef[],
  serviceId: string,
  campusName: string,
): Option.Option<StreamRef> {
  const prefix = `${campusName} Stream `;
  const wanted = serviceId.trim().toUpperCase();
  return Option.fromNullable(
    streams.find(
      (stream) =>
        stream.title.startsWith(prefix) &&
        stream.title.slice(prefix.length).trim().toUpperCase() === wanted,
    ),
  );
}
