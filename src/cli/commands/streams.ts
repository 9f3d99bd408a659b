import { Effect, Option } from "effect";
import { AppConfigServiceTag, type AppConfigService } from "../../core/interfaces/app-config";
import {
  StreamRegistryTag,
  expectedStreamTitle,
  matchStream,
  type StreamRegistry,
} from "../../core/interfaces/stream-registry";
import { TerminalServiceTag, type TerminalService } from "../../core/interfaces/terminal";
import { normalizeServiceId } from "../../core/scheduling/service-catalog";
import type { DirectoryError } from "../../core/types/errors";
import type { StreamRef } from "../../core/types/schedule";

/**
 * Lines describing which stream each enabled service resolves to.
 */
export function describeStreamMapping(
  streams: readonly StreamRef[],
  campusName: string,
  enabledServices: readonly string[],
): { readonly mapped: readonly string[]; readonly missing: readonly string[] } {
  const mapped: string[] = [];
  const missing: string[] = [];
  for (const id of enabledServices.map(normalizeServiceId).filter((id) => id !== "")) {
    const stream = matchStream(streams, id, campusName);
    if (Option.isSome(stream)) {
      mapped.push(`${id} → ${stream.value.title} (${stream.value.streamId})`);
    } else {
      missing.push(`${id}: no stream titled "${expectedStreamTitle(campusName, id)}"`);
    }
  }
  return { mapped, missing };
}

/**
 * List the channel's stream keys and the service each one serves
 */
export function streamsCommand(): Effect.Effect<
  void,
  DirectoryError,
  AppConfigService | StreamRegistry | TerminalService
> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const registry = yield* StreamRegistryTag;
    const { schedule } = yield* (yield* AppConfigServiceTag).appConfig;

    const streams = yield* registry.listStreams();
    yield* terminal.heading(`Stream keys (${streams.length})`);
    if (streams.length === 0) {
      yield* terminal.info("No live streams found on this channel");
    } else {
      yield* terminal.list(streams.map((stream) => `${stream.title} (${stream.streamId})`));
    }

    const campusName = schedule.campusName.trim();
    if (campusName === "") {
      yield* terminal.warn("schedule.campusName is not set, services cannot be matched to streams");
      return;
    }

    const { mapped, missing } = describeStreamMapping(
      streams,
      campusName,
      schedule.enabledServices,
    );
    yield* terminal.heading("Enabled services");
    yield* terminal.list(mapped);
    for (const line of missing) {
      yield* terminal.warn(line);
    }
  });
}
