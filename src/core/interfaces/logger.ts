import { Context, Effect } from "effect";

export interface LoggerService {
  /** Logs a debug message with optional metadata. */
  readonly debug: (message: string, meta?: Record<string, unknown>) => Effect.Effect<void, never>;
  /** Logs an info message with optional metadata. */
  readonly info: (message: string, meta?: Record<string, unknown>) => Effect.Effect<void, never>;
  /** Logs a warning message with optional metadata. */
  readonly warn: (message: string, meta?: Record<string, unknown>) => Effect.Effect<void, never>;
  /** Logs an error message with optional metadata. */
  readonly error: (message: string, meta?: Record<string, unknown>) => Effect.Effect<void, never>;
}

export const LoggerServiceTag = Context.GenericTag<LoggerService>("LoggerService");
