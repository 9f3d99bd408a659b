import { Clock, Effect, Layer } from "effect";
import { appendFile, mkdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { LoggerServiceTag, type LoggerService } from "../core/interfaces/logger";
import type { LoggingConfig, LogLevel } from "../core/types/config";
import { getErrorMessage } from "../core/utils/http-utils";
import { APP_DIRECTORY_NAME, isInstalledGlobally } from "../core/utils/runtime-detection";

export const LOG_FILE_NAME = "broadcast-scheduler.log";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Where formatted lines end up. Replaced in tests.
 */
export interface LogSink {
  readonly append: (filePath: string, line: string) => Promise<void>;
  readonly console: (line: string) => void;
  readonly stderr: (line: string) => void;
}

const nodeSink: LogSink = {
  append: async (filePath, line) => {
    await mkdir(path.dirname(filePath), { recursive: true });
    await appendFile(filePath, line, { encoding: "utf8" });
  },
  console: (line) => {
    process.stderr.write(line);
  },
  stderr: (line) => {
    process.stderr.write(line);
  },
};

/**
 * Custom replacer for JSON.stringify to handle BigInt values
 */
function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function formatLogLineAsPlain(
  level: LogLevel,
  message: string,
  meta: Record<string, unknown> | undefined,
  now: Date,
): string {
  const metaText =
    meta && Object.keys(meta).length > 0 ? " " + JSON.stringify(meta, jsonReplacer) : "";
  return `${now.toLocaleDateString()} ${now.toLocaleTimeString()} [${level.toUpperCase()}] ${message}${metaText}\n`;
}

/**
 * One JSON object per line, meta fields spread at the top level.
 */
export function formatLogLineAsJson(
  level: LogLevel,
  message: string,
  meta: Record<string, unknown> | undefined,
  now: Date,
): string {
  const entry = {
    ...meta,
    timestamp: now.toISOString(),
    level: level.toUpperCase(),
    message,
  };
  return `${JSON.stringify(entry, jsonReplacer)}\n`;
}

export class LoggerServiceImpl implements LoggerService {
  constructor(
    private readonly config: LoggingConfig,
    private readonly logFilePath: string,
    private readonly sink: LogSink = nodeSink,
  ) {}

  debug(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.log("error", message, meta);
  }

  private log(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
  ): Effect.Effect<void, never> {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.config.level]) {
      return Effect.void;
    }

    return Effect.gen(
      function* (this: LoggerServiceImpl) {
        const now = new Date(yield* Clock.currentTimeMillis);
        const line =
          this.config.format === "json"
            ? formatLogLineAsJson(level, message, meta, now)
            : formatLogLineAsPlain(level, message, meta, now);

        if (this.config.output !== "file") {
          this.sink.console(line);
        }
        if (this.config.output !== "console") {
          yield* this.writeToFile(line);
        }
      }.bind(this),
    );
  }

  private writeToFile(line: string): Effect.Effect<void, never> {
    return Effect.tryPromise({
      try: () => this.sink.append(this.logFilePath, line),
      catch: (error: unknown) =>
        new Error(`Failed to write to log file ${this.logFilePath}: ${getErrorMessage(error)}`),
    }).pipe(
      Effect.catchAll((error) => Effect.sync(() => this.sink.stderr(`${error.message}\n`))),
    );
  }
}

/**
 * Create the logger layer
 */
export function createLoggerLayer(
  config: LoggingConfig,
  options: { logsDirectory?: string; sink?: LogSink } = {},
): Layer.Layer<LoggerService, never, never> {
  const logFilePath = path.join(options.logsDirectory ?? getLogsDirectory(), LOG_FILE_NAME);
  return Layer.succeed(LoggerServiceTag, new LoggerServiceImpl(config, logFilePath, options.sink));
}

let logsDirectoryCache: string | undefined;

/**
 * Get the logs directory path
 * Uses caching for performance
 */
export function getLogsDirectory(): string {
  if (!logsDirectoryCache) {
    logsDirectoryCache = resolveLogsDirectory();
  }

  return logsDirectoryCache;
}

/**
 * Resolve the logs directory path
 * 1. Check BROADCAST_SCHEDULER_LOG_DIR environment variable
 * 2. Check if installed globally (~/.broadcast-scheduler/logs)
 * 3. Default to cwd/logs
 */
function resolveLogsDirectory(): string {
  const override = process.env["BROADCAST_SCHEDULER_LOG_DIR"];
  if (override && override.trim().length > 0) {
    return path.resolve(override);
  }

  if (isInstalledGlobally()) {
    const homeDir = os.homedir();
    if (homeDir && homeDir.trim().length > 0) {
      return path.join(homeDir, APP_DIRECTORY_NAME, "logs");
    }
  }

  return path.resolve(process.cwd(), "logs");
}
