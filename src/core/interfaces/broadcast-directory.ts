import { Context, Effect } from "effect";
import type { DirectoryError } from "@/core/types/errors";
import type { ObservedOccurrence, Occurrence, RemoteId } from "@/core/types/schedule";

/**
 * The remote platform's list of scheduled broadcasts
 */
export interface BroadcastDirectory {
  /** Lists broadcasts that have not started yet. */
  readonly listUpcoming: () => Effect.Effect<readonly ObservedOccurrence[], DirectoryError>;

  /** Creates a broadcast for the occurrence, bound to its stream. */
  readonly create: (occurrence: Occurrence) => Effect.Effect<RemoteId, DirectoryError>;

  /** Deletes a broadcast. */
  readonly delete: (remoteId: RemoteId) => Effect.Effect<void, DirectoryError>;
}

export const BroadcastDirectoryTag = Context.GenericTag<BroadcastDirectory>("BroadcastDirectory");
