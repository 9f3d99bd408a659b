import { Context, Effect } from "effect";

/**
 * Terminal service interface for consistent CLI output and user interaction
 *
 * Provides a unified interface for terminal output with automatic
 * emoji prefixes, color coding, and formatting. Also includes methods
 * for interactive user prompts.
 */
export interface TerminalService {
  /**
   * Display an informational message
   */
  readonly info: (message: string) => Effect.Effect<void, never>;

  /**
   * Display a success message
   */
  readonly success: (message: string) => Effect.Effect<void, never>;

  /**
   * Display an error message
   */
  readonly error: (message: string) => Effect.Effect<void, never>;

  /**
   * Display a warning message
   */
  readonly warn: (message: string) => Effect.Effect<void, never>;

  /**
   * Display a plain message without styling
   */
  readonly log: (message: string) => Effect.Effect<void, never>;

  /**
   * Display a section heading
   */
  readonly heading: (message: string) => Effect.Effect<void, never>;

  /**
   * Display a formatted list
   */
  readonly list: (items: readonly string[]) => Effect.Effect<void, never>;

  /**
   * Prompt the user for text input
   */
  readonly ask: (
    message: string,
    options?: {
      defaultValue?: string;
      validate?: (input: string) => boolean | string;
    },
  ) => Effect.Effect<string, never>;

  /**
   * Prompt the user for a secret (input is masked)
   */
  readonly password: (message: string) => Effect.Effect<string, never>;

  /**
   * Ask a yes/no question
   */
  readonly confirm: (message: string, defaultValue?: boolean) => Effect.Effect<boolean, never>;
}

export const TerminalServiceTag = Context.GenericTag<TerminalService>("TerminalService");
