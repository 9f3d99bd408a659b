import { Effect } from "effect";
import { TerminalServiceTag, type TerminalService } from "../interfaces/terminal";
import type { ConfigurationViolation, SchedulerError } from "../types/errors";

/**
 * Enhanced error handling utilities with actionable suggestions
 */

export interface ErrorDisplay {
  readonly title: string;
  readonly message: string;
  readonly details?: readonly string[];
  readonly suggestion?: string;
  readonly recovery?: readonly string[];
  readonly relatedCommands?: readonly string[];
}

const CLI = "broadcast-scheduler";

function describeViolation(violation: ConfigurationViolation): string {
  return `${violation.field}: ${violation.message}`;
}

/**
 * Generate actionable suggestions for different error types
 *
 * @internal
 */
function generateSuggestions(error: SchedulerError): ErrorDisplay {
  switch (error._tag) {
    case "ConfigurationError": {
      return {
        title: "Configuration Error",
        message: error.message,
        details: error.violations.map(describeViolation),
        suggestion: error.suggestion || "Fix the listed fields in your configuration file",
        recovery: [
          `Show the current configuration: \`${CLI} config show\``,
          `Update a value: \`${CLI} config set <key> <value>\``,
          `Start over with the wizard: \`${CLI} config init\``,
        ],
        relatedCommands: [`${CLI} config show`, `${CLI} config set`],
      };
    }

    case "ConfigurationNotFoundError": {
      return {
        title: "Configuration Not Found",
        message: `No configuration file at ${error.path}`,
        suggestion: error.suggestion || "Check the path passed to --config",
        recovery: [
          "Check the file path and its permissions",
          `Create a configuration: \`${CLI} config init\``,
        ],
        relatedCommands: [`${CLI} config init`],
      };
    }

    case "ValidationError": {
      return {
        title: "Validation Error",
        message: `Field "${error.field}" validation failed: ${error.message}`,
        suggestion: error.suggestion || `Check the value given for ${error.field}`,
        recovery: [`Show the available options: \`${CLI} --help\``],
        relatedCommands: [`${CLI} --help`, `${CLI} schedule --help`],
      };
    }

    case "DirectoryError": {
      return {
        title: "YouTube Request Failed",
        message: `${error.operation} failed${error.status !== undefined ? ` (HTTP ${error.status})` : ""}: ${error.message}`,
        suggestion:
          error.suggestion ||
          (error.status === 401
            ? "The stored token was rejected. Sign in again"
            : "Check your connection and the YouTube API quota, then try again"),
        recovery: [
          `Check the session: \`${CLI} auth status\``,
          `Sign in again: \`${CLI} auth login\``,
          `Try the run without changes: \`${CLI} schedule --dry-run\``,
        ],
        relatedCommands: [`${CLI} auth status`, `${CLI} streams`],
      };
    }

    case "GoogleAuthenticationError": {
      return {
        title: "Google Authentication Failed",
        message: error.message,
        suggestion: error.suggestion || "Sign in to Google again",
        recovery: [
          "Set google.clientId and google.clientSecret, or google.credentialsFile",
          `Sign in: \`${CLI} auth login\``,
          `Remove a stale token: \`${CLI} auth logout\``,
        ],
        relatedCommands: [`${CLI} auth login`, `${CLI} auth status`],
      };
    }

    case "FileSystemError": {
      return {
        title: "File System Error",
        message: `Failed to ${error.operation} ${error.path}: ${error.reason}`,
        suggestion: error.suggestion || `Check file permissions with 'ls -la ${error.path}'`,
        recovery: [
          "Check that the directory exists and is writable",
          "Set storage.path to a writable directory",
        ],
        relatedCommands: [`${CLI} config get storage.path`],
      };
    }
  }
}

/**
 * Format error for display with actionable suggestions
 *
 * Takes a scheduler error and formats it into a user-friendly string with:
 * - Clear error title and message
 * - Actionable suggestions
 * - Step-by-step recovery instructions
 * - Related CLI commands
 *
 * @example
 * ```typescript
 * const error = new GoogleAuthenticationError({ message: "Token expired" });
 * console.error(formatError(error));
 * // Output: "❌ Google Authentication Failed\n   Token expired\n..."
 * ```
 */
export function formatError(error: SchedulerError): string {
  const display = generateSuggestions(error);

  let output = `❌ ${display.title}\n`;
  output += `   ${display.message}\n`;

  if (display.details && display.details.length > 0) {
    for (const detail of display.details) {
      output += `   - ${detail}\n`;
    }
  }

  if (display.suggestion) {
    output += `\n💡 Suggestion: ${display.suggestion}\n`;
  }

  if (display.recovery && display.recovery.length > 0) {
    output += `\n🔧 Recovery Steps:\n`;
    display.recovery.forEach((step, index) => {
      output += `   ${index + 1}. ${step}\n`;
    });
  }

  if (display.relatedCommands && display.relatedCommands.length > 0) {
    output += `\n📚 Related Commands:\n`;
    display.relatedCommands.forEach((cmd) => {
      output += `   • ${cmd}\n`;
    });
  }

  return output;
}

function isSchedulerError(error: SchedulerError | Error): error is SchedulerError {
  return "_tag" in error && typeof error._tag === "string";
}

/**
 * Prints an error on stderr. Tagged errors get suggestions and recovery steps; anything
 * else gets its message and general guidance.
 */
export function handleError(
  error: SchedulerError | Error,
  writeError: (text: string) => void = (text) => console.error(text),
): Effect.Effect<void, never, TerminalService> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;

    // Ctrl+C during an @inquirer prompt
    if (error.name === "ExitPromptError") {
      yield* terminal.log("\n👋 Goodbye!");
      return;
    }

    if (isSchedulerError(error)) {
      writeError(formatError(error));
    } else {
      writeError(
        `❌ Error\n   ${error.message}\n\n💡 Suggestion: Check the error details and try again\n\n📚 Related Commands:\n   • ${CLI} --help`,
      );
    }
  });
}
