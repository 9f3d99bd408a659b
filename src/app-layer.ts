import { FileSystem } from "@effect/platform";
import { NodeFileSystem } from "@effect/platform-node";
import { Cause, Effect, Exit, Fiber, Layer, Option } from "effect";
import { AppConfigServiceTag, type AppConfigService } from "./core/interfaces/app-config";
import type { BroadcastDirectory } from "./core/interfaces/broadcast-directory";
import type { GoogleAuthService } from "./core/interfaces/google-auth";
import type { LoggerService } from "./core/interfaces/logger";
import type { StreamRegistry } from "./core/interfaces/stream-registry";
import { TerminalServiceTag, type TerminalService } from "./core/interfaces/terminal";
import { hasFailures } from "./core/scheduling/reconciliation-engine";
import type { SchedulerError } from "./core/types/errors";
import type { ReconciliationReport } from "./core/types/schedule";
import { handleError } from "./core/utils/error-handler";
import { createConfigLayer } from "./services/config";
import { createGoogleAuthLayer } from "./services/google/auth";
import { createLoggerLayer } from "./services/logger";
import { TerminalServiceImpl, createTerminalServiceLayer } from "./services/terminal";
import { createYouTubeLayer } from "./services/youtube";

/**
 * Configuration options for creating the application layer
 */
export interface AppLayerConfig {
  /**
   * Enable debug logging
   */
  debug?: boolean | undefined;

  /**
   * Optional path to configuration file
   */
  configPath?: string | undefined;
}

export type AppServices =
  | FileSystem.FileSystem
  | AppConfigService
  | LoggerService
  | TerminalService
  | GoogleAuthService;

export type YouTubeAppServices = AppServices | BroadcastDirectory | StreamRegistry;

/** What a command hands back: nothing, or the report of a reconciliation run. */
export type CommandResult = void | ReconciliationReport;

/**
 * Create the application layer with the local services
 *
 * Composes the file system, configuration, logging, terminal and Google session layers.
 * Nothing here talks to YouTube.
 *
 * @example
 * ```typescript
 * const appLayer = createAppLayer({ debug: true, configPath: "./config.json" });
 * yield* someCommand().pipe(Effect.provide(appLayer));
 * ```
 */
export function createAppLayer(config: AppLayerConfig = {}) {
  const { debug, configPath } = config;
  const fileSystemLayer = NodeFileSystem.layer;
  const configLayer = createConfigLayer({
    ...(debug !== undefined && { debug }),
    ...(configPath !== undefined && { configPath }),
  }).pipe(Layer.provide(fileSystemLayer));

  // Logging settings come from the loaded configuration
  const loggerLayer = Layer.unwrapEffect(
    Effect.gen(function* () {
      const { logging } = yield* (yield* AppConfigServiceTag).appConfig;
      return createLoggerLayer(logging);
    }),
  ).pipe(Layer.provide(configLayer));

  const terminalLayer = createTerminalServiceLayer();

  const googleAuthLayer = createGoogleAuthLayer().pipe(
    Layer.provide(fileSystemLayer),
    Layer.provide(configLayer),
    Layer.provide(terminalLayer),
    Layer.provide(loggerLayer),
  );

  return Layer.mergeAll(fileSystemLayer, configLayer, loggerLayer, terminalLayer, googleAuthLayer);
}

/**
 * The application layer plus the YouTube collaborators. Building it signs in to Google.
 */
export function createYouTubeAppLayer(config: AppLayerConfig = {}) {
  const appLayer = createAppLayer(config);
  return Layer.merge(appLayer, createYouTubeLayer().pipe(Layer.provide(appLayer)));
}

function isReport(result: CommandResult): result is ReconciliationReport {
  return result !== undefined;
}

/**
 * Process exit code for the outcome of a command. A reconciliation report with a failed
 * entry counts as a failure.
 */
export function exitCodeFor<E>(exit: Exit.Exit<CommandResult, E>): number {
  if (Exit.isSuccess(exit)) {
    return isReport(exit.value) && hasFailures(exit.value) ? 1 : 0;
  }
  return Exit.isInterrupted(exit) ? 130 : 1;
}

/**
 * Run a CLI effect with graceful shutdown handling for termination signals.
 *
 * This ensures Ctrl+C / SIGTERM interruptions trigger fiber interruption so that
 * Effect finalizers run before the process exits.
 */
function runWithLayer<E extends SchedulerError | Error, R, LE extends SchedulerError | Error>(
  effect: Effect.Effect<CommandResult, E, R>,
  layer: Layer.Layer<R, LE>,
): void {
  const managedEffect = Effect.scoped(
    Effect.gen(function* () {
      const fiber = yield* Effect.fork(effect.pipe(Effect.provide(layer)));
      let signalCount = 0;
      type SignalName = "SIGINT" | "SIGTERM";

      function handler(signal: SignalName): void {
        signalCount += 1;
        const label = signal === "SIGINT" ? "Ctrl+C" : signal;

        if (signalCount === 1) {
          process.stderr.write(`\nReceived ${label}. Gracefully shutting down...\n`);
          Effect.runFork(Fiber.interrupt(fiber));
        } else {
          process.stderr.write("\nForce exiting immediately. Some cleanup may be skipped.\n");
          process.exit(1);
        }
      }

      yield* Effect.acquireRelease(
        Effect.sync(() => {
          process.on("SIGINT", handler);
          process.on("SIGTERM", handler);
        }),
        () =>
          Effect.sync(() => {
            process.off("SIGINT", handler);
            process.off("SIGTERM", handler);
          }),
      );

      const exit = yield* Fiber.await(fiber);
      const exitCode = exitCodeFor(exit);
      yield* Effect.sync(() => {
        process.exitCode = exitCode;
      });

      if (Exit.isFailure(exit) && !Exit.isInterrupted(exit)) {
        const maybeError = Cause.failureOption(exit.cause);
        if (Option.isSome(maybeError)) {
          yield* handleError(maybeError.value);
          return;
        }

        yield* handleError(new Error(Cause.pretty(exit.cause)));
      }
    }),
  ).pipe(Effect.provideService(TerminalServiceTag, new TerminalServiceImpl()));

  Effect.runFork(managedEffect);
}

/**
 * Run a command that only needs the local services.
 */
export function runCliEffect<E extends SchedulerError | Error>(
  effect: Effect.Effect<CommandResult, E, AppServices>,
  config: AppLayerConfig = {},
): void {
  runWithLayer<E, AppServices, SchedulerError>(effect, createAppLayer(config));
}

/**
 * Run a command that talks to YouTube.
 */
export function runYouTubeCliEffect<E extends SchedulerError | Error>(
  effect: Effect.Effect<CommandResult, E, YouTubeAppServices>,
  config: AppLayerConfig = {},
): void {
  runWithLayer<E, YouTubeAppServices, SchedulerError>(effect, createYouTubeAppLayer(config));
}
