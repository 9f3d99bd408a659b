import { Effect, Either, Option } from "effect";
import { LoggerServiceTag, type LoggerService } from "@/core/interfaces/logger";
import {
  StreamRegistryTag,
  expectedStreamTitle,
  type StreamRegistry,
} from "@/core/interfaces/stream-registry";
import type { AppConfig, ServiceDefinitionConfig } from "@/core/types/config";
import {
  ResolutionWarning,
  configurationError,
  type ConfigurationError,
  type ConfigurationViolation,
  type DirectoryError,
} from "@/core/types/errors";
import type {
  BroadcastSettings,
  Recurrence,
  Service,
  ServiceDefinition,
  StreamRef,
  TimeZone,
} from "@/core/types/schedule";
import { parseTimeOfDay, parseTimeZone, parseWeekday } from "./recurrence";

/**
 * Raw catalog input, as it comes out of the configuration file.
 */
export interface CatalogInput {
  readonly campusName: string;
  readonly timezone: string;
  readonly enabledServices: readonly string[];
  readonly services: Readonly<Record<string, ServiceDefinitionConfig>>;
  readonly settings: BroadcastSettings;
}

export interface ValidatedCatalog {
  readonly campusName: string;
  readonly timeZone: TimeZone;
  /** Definitions in declaration order, keyed by normalised id. */
  readonly definitions: ReadonlyMap<string, ServiceDefinition>;
  /** Enabled ids, normalised, duplicates collapsed to their first position. */
  readonly enabledIds: readonly string[];
  readonly settings: BroadcastSettings;
}

export function catalogInputFromConfig(config: AppConfig): CatalogInput {
  const { schedule, youtube } = config;
  return {
    campusName: schedule.campusName,
    timezone: schedule.timezone,
    enabledServices: schedule.enabledServices,
    services: schedule.services,
    settings: {
      privacy: youtube.privacyStatus,
      madeForKids: youtube.madeForKids,
      autoStart: youtube.autoStart,
      autoStop: youtube.autoStop,
      dvrEnabled: youtube.dvrEnabled,
      is360: youtube.is360,
    },
  };
}

export function normalizeServiceId(id: string): string {
  return id.trim().toUpperCase();
}

function violationsOf<A>(result: Either.Either<A, ConfigurationError>): ConfigurationViolation[] {
  return Either.isLeft(result) ? [...result.left.violations] : [];
}

function validateRecurrence(
  key: string,
  definition: ServiceDefinitionConfig,
  violations: ConfigurationViolation[],
): Recurrence | undefined {
  const day = definition.day?.trim() ?? "";
  const time = definition.time?.trim() ?? "";
  const field = `schedule.services.${key}`;

  if (day === "" && time === "") return undefined;
  if (day === "" || time === "") {
    violations.push({
      field: `${field}.${day === "" ? "day" : "time"}`,
      message: "day and time must be given together",
    });
    return undefined;
  }

  const weekday = parseWeekday(day, `${field}.day`);
  const timeOfDay = parseTimeOfDay(time, `${field}.time`);
  if (Either.isRight(weekday) && Either.isRight(timeOfDay)) {
    return { weekday: weekday.right, time: timeOfDay.right };
  }
  violations.push(...violationsOf(weekday), ...violationsOf(timeOfDay));
  return undefined;
}

/**
 * The validated, immutable set of configured services and the enabled subset
 */
export class ServiceCatalog {
  private readonly servicesById: ReadonlyMap<string, Service>;

  private constructor(
    readonly campusName: string,
    readonly timeZone: TimeZone,
    readonly settings: BroadcastSettings,
    readonly enabledIds: readonly string[],
    services: readonly Service[],
    readonly warnings: readonly ResolutionWarning[],
  ) {
    this.servicesById = new Map(services.map((service) => [service.id, service]));
  }

  /**
   * Validate catalog input without touching the network. Every violation is collected.
   */
  static validate(input: CatalogInput): Either.Either<ValidatedCatalog, ConfigurationError> {
    const violations: ConfigurationViolation[] = [];

    const campusName = input.campusName.trim();
    if (campusName === "") {
      violations.push({ field: "schedule.campusName", message: "campus name is required" });
    }

    const timeZone = parseTimeZone(input.timezone, "schedule.timezone");
    violations.push(...violationsOf(timeZone));

    const definitions = new Map<string, ServiceDefinition>();
    for (const [key, definition] of Object.entries(input.services)) {
      const id = normalizeServiceId(key);
      if (id === "" || /\s/.test(id)) {
        violations.push({
          field: `schedule.services.${key}`,
          message: "service id must be non-empty and contain no whitespace",
        });
        continue;
      }
      if (definitions.has(id)) {
        violations.push({
          field: `schedule.services.${key}`,
          message: `service "${id}" is defined more than once`,
        });
        continue;
      }

      const displayName = definition.name?.trim() ?? "";
      if (displayName === "") {
        violations.push({ field: `schedule.services.${key}.name`, message: "name is required" });
      }
      const recurrence = validateRecurrence(key, definition, violations);

      definitions.set(id, {
        id,
        displayName,
        description: definition.description?.trim() ?? "",
        ...(recurrence !== undefined && { recurrence }),
      });
    }

    const enabledIds = [...new Set(input.enabledServices.map(normalizeServiceId))].filter(
      (id) => id !== "",
    );
    if (enabledIds.length === 0) {
      violations.push({
        field: "schedule.enabledServices",
        message: "at least one service must be enabled",
      });
    }
    for (const id of enabledIds) {
      if (!definitions.has(id)) {
        violations.push({
          field: "schedule.enabledServices",
          message: `service "${id}" is enabled but has no definition under schedule.services`,
        });
      }
    }

    if (violations.length > 0 || Either.isLeft(timeZone)) {
      return Either.left(
        configurationError(
          violations,
          "Fix the listed fields with 'broadcast-scheduler config set' or edit the config file",
        ),
      );
    }

    return Either.right({
      campusName,
      timeZone: timeZone.right,
      definitions,
      enabledIds,
      settings: input.settings,
    });
  }

  /**
   * Validate the input and resolve the stream of every enabled service.
   * Services without a stream are dropped with a ResolutionWarning.
   */
  static build(
    input: CatalogInput,
  ): Effect.Effect<
    ServiceCatalog,
    ConfigurationError | DirectoryError,
    StreamRegistry | LoggerService
  > {
    return Effect.gen(function* () {
      const validated = yield* ServiceCatalog.validate(input);
      const registry = yield* StreamRegistryTag;
      const logger = yield* LoggerServiceTag;

      const services: Service[] = [];
      const warnings: ResolutionWarning[] = [];

      for (const id of validated.enabledIds) {
        const definition = validated.definitions.get(id);
        if (!definition) continue;

        const streamRef = yield* registry.resolve(id, validated.campusName);
        if (Option.isNone(streamRef)) {
          const expected = expectedStreamTitle(validated.campusName, id);
          warnings.push(new ResolutionWarning({ serviceId: id, expectedStreamTitle: expected }));
          yield* logger.warn(`No stream found for service ${id}, skipping it`, {
            expectedStreamTitle: expected,
          });
          continue;
        }

        yield* logger.debug(`Resolved stream for service ${id}`, {
          streamId: streamRef.value.streamId,
          streamTitle: streamRef.value.title,
        });
        services.push({ ...definition, streamRef: streamRef.value });
      }

      return ServiceCatalog.fromResolved(validated, services, warnings);
    });
  }

  static fromResolved(
    validated: ValidatedCatalog,
    services: readonly Service[],
    warnings: readonly ResolutionWarning[] = [],
  ): ServiceCatalog {
    return new ServiceCatalog(
      validated.campusName,
      validated.timeZone,
      validated.settings,
      validated.enabledIds,
      services,
      warnings,
    );
  }

  /**
   * Enabled services whose stream was resolved, in enabled order.
   */
  enabledServices(): readonly Service[] {
    return this.enabledIds.flatMap((id) => {
      const service = this.servicesById.get(id);
      return service ? [service] : [];
    });
  }

  service(id: string): Option.Option<Service> {
    return Option.fromNullable(this.servicesById.get(normalizeServiceId(id)));
  }

  /**
   * Id of the enabled service whose stream has the given id.
   */
  serviceIdForStream(streamId: string): string | undefined {
    for (const service of this.servicesById.values()) {
      if (service.streamRef.streamId === streamId) return service.id;
    }
    return undefined;
  }

  streamRefs(): readonly StreamRef[] {
    return this.enabledServices().map((service) => service.streamRef);
  }
}
