import { FileSystem } from "@effect/platform";
import { Effect, Either, Layer, Option } from "effect";
import os from "node:os";
import path from "node:path";
import { AppConfigServiceTag, type AppConfigService } from "../core/interfaces/app-config";
import { AppConfigSchema, type AppConfig } from "../core/types/config";
import {
  ConfigurationNotFoundError,
  FileSystemError,
  configurationError,
  type ConfigurationError,
} from "../core/types/errors";
import { safeParseJson } from "../core/utils/json";
import { APP_DIRECTORY_NAME } from "../core/utils/runtime-detection";

/**
 * Configuration service backed by a JSON file validated with zod
 */

export const CONFIG_PATH_ENV = "BROADCAST_SCHEDULER_CONFIG_PATH";
export const LOCAL_CONFIG_FILE_NAME = "broadcast-scheduler.config.json";

export class AppConfigServiceImpl implements AppConfigService {
  private currentConfig: AppConfig;
  private currentPath: string | undefined;
  private fs: FileSystem.FileSystem;

  constructor(initialConfig: AppConfig, configPath: string | undefined, fs: FileSystem.FileSystem) {
    this.currentConfig = initialConfig;
    this.currentPath = configPath;
    this.fs = fs;
  }

  get(key: string): Effect.Effect<unknown, never> {
    return Effect.sync(() => deepGet(this.currentConfig, key));
  }

  has(key: string): Effect.Effect<boolean, never> {
    return Effect.sync(() => deepGet(this.currentConfig, key) !== undefined);
  }

  set(key: string, value: unknown): Effect.Effect<void, ConfigurationError | FileSystemError> {
    return Effect.gen(
      function* (this: AppConfigServiceImpl) {
        const updated = yield* validateConfig(deepSet(this.currentConfig, key, value));
        const target = this.currentPath ?? path.join(expandHome("~"), APP_DIRECTORY_NAME, "config.json");

        yield* this.fs.makeDirectory(path.dirname(target), { recursive: true }).pipe(
          Effect.mapError(
            (error) =>
              new FileSystemError({
                path: path.dirname(target),
                operation: "mkdir",
                reason: error.message,
              }),
          ),
        );
        yield* this.fs.writeFileString(target, `${JSON.stringify(updated, null, 2)}\n`).pipe(
          Effect.mapError(
            (error) =>
              new FileSystemError({
                path: target,
                operation: "write",
                reason: error.message,
                suggestion: "Check that the configuration file is writable",
              }),
          ),
        );

        this.currentConfig = updated;
        this.currentPath = target;
      }.bind(this),
    );
  }

  get appConfig(): Effect.Effect<AppConfig, never> {
    return Effect.sync(() => this.currentConfig);
  }

  get configPath(): Effect.Effect<string | undefined, never> {
    return Effect.sync(() => this.currentPath);
  }
}

export interface ConfigLayerOptions {
  readonly debug?: boolean;
  readonly configPath?: string;
}

export function createConfigLayer(
  options: ConfigLayerOptions = {},
): Layer.Layer<
  AppConfigService,
  ConfigurationError | ConfigurationNotFoundError,
  FileSystem.FileSystem
> {
  return Layer.effect(
    AppConfigServiceTag,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const loaded = yield* loadConfigFile(fs, options.configPath);
      const config = yield* validateConfig(loaded.fileConfig ?? {});

      // Override logging level to debug if --debug flag is set
      const finalConfig: AppConfig = options.debug
        ? { ...config, logging: { ...config.logging, level: "debug" } }
        : config;

      return new AppConfigServiceImpl(finalConfig, loaded.configPath, fs);
    }),
  );
}

/**
 * Parse raw configuration with the schema, turning every zod issue into a violation.
 */
export function validateConfig(raw: unknown): Either.Either<AppConfig, ConfigurationError> {
  const result = AppConfigSchema.safeParse(raw);
  if (result.success) {
    return Either.right(result.data);
  }
  return Either.left(
    configurationError(
      result.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
        message: issue.message,
      })),
      "Run 'broadcast-scheduler config show' to review the configuration",
    ),
  );
}

// -----------------
// Internal helpers
// -----------------

export function expandHome(p: string): string {
  if (p.startsWith("~")) {
    const home = os.homedir();
    return home ? p.replace(/^~/, home) : p;
  }
  return p;
}

/**
 * Candidate configuration files, in lookup order.
 */
export function configFileCandidates(): readonly string[] {
  const envConfigPath = process.env[CONFIG_PATH_ENV];
  return [
    envConfigPath ? expandHome(envConfigPath) : "",
    path.join(process.cwd(), APP_DIRECTORY_NAME, "config.json"),
    path.join(process.cwd(), LOCAL_CONFIG_FILE_NAME),
    path.join(expandHome("~"), APP_DIRECTORY_NAME, "config.json"),
  ].filter(Boolean);
}

function readConfigFile(
  fs: FileSystem.FileSystem,
  filePath: string,
): Effect.Effect<unknown, ConfigurationError> {
  return Effect.gen(function* () {
    const content = yield* fs.readFileString(filePath).pipe(
      Effect.mapError((error) =>
        configurationError(
          [{ field: filePath, message: `cannot read file: ${error.message}` }],
          "Check the file permissions",
        ),
      ),
    );
    if (content.trim() === "") return {};

    const parsed = safeParseJson(content);
    if (Option.isNone(parsed)) {
      return yield* Effect.fail(
        configurationError(
          [{ field: filePath, message: "file does not contain valid JSON" }],
          "Fix the JSON syntax or recreate the file with 'broadcast-scheduler config init'",
        ),
      );
    }
    return parsed.value;
  });
}

export function loadConfigFile(
  fs: FileSystem.FileSystem,
  customConfigPath?: string,
): Effect.Effect<
  { configPath?: string; fileConfig?: unknown },
  ConfigurationError | ConfigurationNotFoundError
> {
  return Effect.gen(function* () {
    // A custom config path is used exclusively and must exist
    if (customConfigPath) {
      const expandedPath = path.resolve(expandHome(customConfigPath));
      const exists = yield* fs
        .exists(expandedPath)
        .pipe(Effect.catchAll(() => Effect.succeed(false)));

      if (!exists) {
        return yield* Effect.fail(
          new ConfigurationNotFoundError({
            path: expandedPath,
            suggestion: "Ensure the file exists and the path is correct",
          }),
        );
      }

      const fileConfig = yield* readConfigFile(fs, expandedPath);
      return { configPath: expandedPath, fileConfig };
    }

    for (const candidate of configFileCandidates()) {
      const exists = yield* fs.exists(candidate).pipe(Effect.catchAll(() => Effect.succeed(false)));
      if (!exists) continue;
      const fileConfig = yield* readConfigFile(fs, candidate);
      return { configPath: candidate, fileConfig };
    }

    return {};
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep object property access using dot notation paths.
 *
 * - "schedule.campusName" -> obj.schedule.campusName
 * - "schedule.services.A.time" -> obj.schedule.services.A.time
 */
export function deepGet(obj: unknown, keyPath: string): unknown {
  const parts = keyPath.split(".").filter(Boolean);
  let cur: unknown = obj;
  for (const part of parts) {
    if (isRecord(cur) && part in cur) {
      cur = cur[part];
    } else {
      return undefined;
    }
  }
  return cur;
}

/**
 * Returns a copy of obj with the value at the dot notation path replaced, creating
 * intermediate objects as needed.
 */
export function deepSet(obj: unknown, keyPath: string, value: unknown): unknown {
  const [head, ...rest] = keyPath.split(".").filter(Boolean);
  if (head === undefined) return value;

  const base = isRecord(obj) ? obj : {};
  return {
    ...base,
    [head]: rest.length === 0 ? value : deepSet(base[head], rest.join("."), value),
  };
}
