import { Effect, Option } from "effect";

/**
 * Utility functions for safe JSON parsing. Callers validate the parsed value.
 */

/**
 * Safely parse a JSON string, returning Option.none() on a parse error.
 */
export function safeParseJson(text: string): Option.Option<unknown> {
  try {
    const parsed: unknown = JSON.parse(text);
    return Option.some(parsed);
  } catch {
    return Option.none();
  }
}

/**
 * Parse a JSON string as an Effect, failing with a descriptive error on parse failure.
 *
 * @example
 * ```ts
 * const raw = yield* parseJson(content);
 * const config = AppConfigSchema.parse(raw);
 * ```
 */
export function parseJson(text: string): Effect.Effect<unknown, Error> {
  return Effect.try({
    try: (): unknown => JSON.parse(text),
    catch: (error) => {
      const message =
        error instanceof Error
          ? error.message
          : typeof error === "string"
            ? error
            : "Unknown parse error";
      return new Error(`Failed to parse JSON: ${message}`);
    },
  });
}
