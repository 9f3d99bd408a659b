import { Context, Effect } from "effect";
import type { AppConfig } from "../types/config";
import type { ConfigurationError, FileSystemError } from "../types/errors";

export interface AppConfigService {
  /** Gets a config value by dot-notation key, or undefined when absent. */
  readonly get: (key: string) => Effect.Effect<unknown, never>;
  /** Checks if a config key exists. */
  readonly has: (key: string) => Effect.Effect<boolean, never>;
  /** Sets a config value, re-validates the configuration and persists it. */
  readonly set: (
    key: string,
    value: unknown,
  ) => Effect.Effect<void, ConfigurationError | FileSystemError>;
  /** Gets the complete, validated application configuration. */
  readonly appConfig: Effect.Effect<AppConfig, never>;
  /** Path of the file the configuration was read from, if any. */
  readonly configPath: Effect.Effect<string | undefined, never>;
}

export const AppConfigServiceTag = Context.GenericTag<AppConfigService>("AppConfigService");
