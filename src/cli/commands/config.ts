import { FileSystem } from "@effect/platform";
import { Effect, Either, Option } from "effect";
import path from "node:path";
import { AppConfigServiceTag, type AppConfigService } from "../../core/interfaces/app-config";
import { TerminalServiceTag, type TerminalService } from "../../core/interfaces/terminal";
import { parseTimeOfDay, parseTimeZone, parseWeekday } from "../../core/scheduling/recurrence";
import { normalizeServiceId } from "../../core/scheduling/service-catalog";
import { DEFAULT_TIMEZONE, type AppConfig } from "../../core/types/config";
import type { PrivacyStatus } from "../../core/types/schedule";
import {
  FileSystemError,
  ValidationError,
  type ConfigurationError,
} from "../../core/types/errors";
import { safeParseJson } from "../../core/utils/json";
import { LOCAL_CONFIG_FILE_NAME, deepGet, deepSet, validateConfig } from "../../services/config";

/**
 * CLI commands for configuration management
 */

const SECRET_MASK = "********";

/**
 * Configuration as printed by `config show`, with the client secret masked.
 */
export function redactConfig(config: AppConfig): unknown {
  return config.google.clientSecret
    ? deepSet(config, "google.clientSecret", SECRET_MASK)
    : config;
}

/**
 * Interpret a command-line value: booleans, numbers and JSON arrays or objects are
 * parsed, anything else stays a string.
 */
export function coerceConfigValue(raw: string): unknown {
  const trimmed = raw.trim();
  if (trimmed === "true") return true;
  if (trimmed === "false") return false;
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);
  if (trimmed.startsWith("[") || trimmed.startsWith("{")) {
    return Option.getOrElse(safeParseJson(trimmed), () => raw);
  }
  return raw;
}

/**
 * Show all configuration values
 */
export function showConfigCommand(): Effect.Effect<void, never, AppConfigService | TerminalService> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const configService = yield* AppConfigServiceTag;
    const config = yield* configService.appConfig;
    const configPath = yield* configService.configPath;

    yield* terminal.heading("Current Configuration");
    yield* terminal.log(`Source: ${configPath ?? "defaults (no configuration file found)"}`);
    yield* terminal.log(JSON.stringify(redactConfig(config), null, 2));
  });
}

/**
 * Get a configuration value
 * Supports nested keys (e.g., "schedule.services.A.time")
 */
export function getConfigCommand(
  key: string,
): Effect.Effect<void, never, AppConfigService | TerminalService> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const configService = yield* AppConfigServiceTag;
    const config = yield* configService.appConfig;

    const value = deepGet(redactConfig(config), key);
    if (value === undefined) {
      yield* terminal.warn(`No value for ${key}`);
      return;
    }
    yield* terminal.log(JSON.stringify(value, null, 2));
  });
}

/**
 * Set a configuration value
 * Supports nested keys (e.g., "youtube.playlistId")
 */
export function setConfigCommand(
  key: string,
  value: string,
): Effect.Effect<
  void,
  ValidationError | ConfigurationError | FileSystemError,
  AppConfigService | TerminalService
> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const configService = yield* AppConfigServiceTag;

    // Refuse to replace a whole section with a scalar
    const currentValue = yield* configService.get(key);
    const newValue = coerceConfigValue(value);
    if (
      currentValue !== null &&
      typeof currentValue === "object" &&
      !Array.isArray(currentValue) &&
      (newValue === null || typeof newValue !== "object")
    ) {
      return yield* Effect.fail(
        new ValidationError({
          field: key,
          message: `'${key}' is a configuration section, not a single value`,
          value,
          suggestion: `Set one of its fields instead (e.g. '${key}.<field>')`,
        }),
      );
    }

    yield* configService.set(key, newValue);
    const configPath = yield* configService.configPath;
    yield* terminal.success(`Config set: ${key} = ${JSON.stringify(newValue)}`);
    if (configPath !== undefined) {
      yield* terminal.log(`Saved to ${configPath}`);
    }
  });
}

export interface InitServiceAnswers {
  readonly id: string;
  readonly name: string;
  readonly day: string;
  readonly time: string;
}

export interface InitAnswers {
  readonly campusName: string;
  readonly timezone: string;
  readonly services: readonly InitServiceAnswers[];
  readonly privacyStatus: PrivacyStatus;
  readonly playlistId: string;
  readonly clientId: string;
  readonly clientSecret: string;
}

/**
 * Raw configuration file content for the wizard's answers. Empty optional answers are
 * left out so the schema defaults apply.
 */
export function buildInitialConfig(answers: InitAnswers): Record<string, unknown> {
  const services: Record<string, { name: string; day: string; time: string }> = {};
  for (const service of answers.services) {
    services[normalizeServiceId(service.id)] = {
      name: service.name.trim(),
      day: service.day.trim(),
      time: service.time.trim(),
    };
  }

  const playlistId = answers.playlistId.trim();
  const clientId = answers.clientId.trim();
  const clientSecret = answers.clientSecret.trim();

  return {
    schedule: {
      campusName: answers.campusName.trim(),
      timezone: answers.timezone.trim(),
      enabledServices: Object.keys(services),
      services,
    },
    youtube: {
      privacyStatus: answers.privacyStatus,
      ...(playlistId !== "" && { playlistId }),
    },
    ...(clientId !== "" &&
      clientSecret !== "" && {
        google: { clientId, clientSecret },
      }),
  };
}

function toPrivacyStatus(input: string): PrivacyStatus {
  const value = input.trim();
  return value === "public" || value === "private" ? value : "unlisted";
}

function validateWith<A>(
  parse: (text: string) => Either.Either<A, ConfigurationError>,
): (input: string) => boolean | string {
  return (input) =>
    Either.match(parse(input), {
      onLeft: (error) => error.violations[0]?.message ?? error.message,
      onRight: () => true,
    });
}

function askService(
  terminal: TerminalService,
  id: string,
): Effect.Effect<InitServiceAnswers, never> {
  return Effect.gen(function* () {
    yield* terminal.log("");
    yield* terminal.info(`Service ${id}`);
    const name = yield* terminal.ask("Display name:", {
      validate: (input) => input.trim() !== "" || "Name is required",
    });
    const day = yield* terminal.ask("Day of the week:", {
      defaultValue: "Sunday",
      validate: validateWith(parseWeekday),
    });
    const time = yield* terminal.ask("Start time (HH:MM, 24h):", {
      defaultValue: "09:00",
      validate: validateWith(parseTimeOfDay),
    });
    return { id, name, day, time };
  });
}

/**
 * Interactive wizard that writes a configuration file in the current directory
 */
export function initConfigCommand(): Effect.Effect<
  void,
  ConfigurationError | FileSystemError,
  FileSystem.FileSystem | TerminalService
> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const fs = yield* FileSystem.FileSystem;
    const target = path.resolve(LOCAL_CONFIG_FILE_NAME);

    const exists = yield* fs.exists(target).pipe(Effect.catchAll(() => Effect.succeed(false)));
    if (exists) {
      const overwrite = yield* terminal.confirm(`${target} already exists. Overwrite it?`, false);
      if (!overwrite) {
        yield* terminal.info("Nothing written");
        return;
      }
    }

    yield* terminal.heading("Broadcast scheduler setup");
    const campusName = yield* terminal.ask("Campus name:", {
      validate: (input) => input.trim() !== "" || "Campus name is required",
    });
    const timezone = yield* terminal.ask("Time zone (IANA name):", {
      defaultValue: DEFAULT_TIMEZONE,
      validate: validateWith(parseTimeZone),
    });
    const serviceIds = yield* terminal.ask("Service ids, comma separated:", {
      defaultValue: "A,B",
      validate: (input) =>
        input.split(",").some((id) => id.trim() !== "") || "At least one service is required",
    });

    const services: InitServiceAnswers[] = [];
    const ids = [
      ...new Set(serviceIds.split(",").map(normalizeServiceId).filter((id) => id !== "")),
    ];
    for (const id of ids) {
      services.push(yield* askService(terminal, id));
    }

    yield* terminal.log("");
    const privacy = yield* terminal.ask("Privacy (public, unlisted, private):", {
      defaultValue: "unlisted",
      validate: (input) =>
        ["public", "unlisted", "private"].includes(input.trim()) ||
        "Choose public, unlisted or private",
    });
    const privacyStatus = toPrivacyStatus(privacy);
    const playlistId = yield* terminal.ask("Playlist id (optional):", { defaultValue: "" });
    const clientId = yield* terminal.ask("Google OAuth client id (optional):", {
      defaultValue: "",
    });
    const clientSecret =
      clientId.trim() === "" ? "" : yield* terminal.password("Google OAuth client secret:");

    const raw = buildInitialConfig({
      campusName,
      timezone,
      services,
      privacyStatus,
      playlistId,
      clientId,
      clientSecret,
    });
    yield* validateConfig(raw);

    yield* fs.writeFileString(target, `${JSON.stringify(raw, null, 2)}\n`).pipe(
      Effect.mapError(
        (error) =>
          new FileSystemError({ path: target, operation: "write", reason: error.message }),
      ),
    );
    yield* terminal.success(`Configuration written to ${target}`);
    yield* terminal.log(
      "Next: run `broadcast-scheduler auth login`, then `broadcast-scheduler --dry-run`.",
    );
  });
}
