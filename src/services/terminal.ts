import {
  confirm as confirmPrompt,
  input,
  password as passwordPrompt,
} from "@inquirer/prompts";
import chalk, { type ChalkInstance } from "chalk";
import { Effect, Layer } from "effect";
import { TerminalServiceTag, type TerminalService } from "../core/interfaces/terminal";

/**
 * Terminal output service implementation for consistent CLI styling
 *
 * Provides a unified interface for terminal output with automatic
 * emoji prefixes, color coding, and formatting.
 */
export class TerminalServiceImpl implements TerminalService {
  constructor(
    private readonly write: (line: string) => void = (line) => console.log(line),
    private readonly style: ChalkInstance = chalk,
  ) {}

  info(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      this.write(this.style.cyan("🔍") + "  " + message);
    });
  }

  success(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      this.write(this.style.green("✅") + "  " + message);
    });
  }

  error(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      this.write(this.style.red("❌") + "  " + message);
    });
  }

  warn(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      this.write(this.style.yellow("⚠️") + "  " + message);
    });
  }

  log(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      this.write(message);
    });
  }

  heading(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      this.write("");
      this.write(this.style.bold.cyan(message));
      this.write("");
    });
  }

  list(items: readonly string[]): Effect.Effect<void, never> {
    return Effect.sync(() => {
      for (const item of items) {
        this.write("   • " + item);
      }
    });
  }

  ask(
    message: string,
    options?: {
      defaultValue?: string;
      validate?: (input: string) => boolean | string;
    },
  ): Effect.Effect<string, never> {
    return Effect.promise(async () => {
      const answer = await input({
        message,
        ...(options?.defaultValue !== undefined ? { default: options.defaultValue } : {}),
        ...(options?.validate !== undefined ? { validate: options.validate } : {}),
      });
      return answer;
    });
  }

  password(message: string): Effect.Effect<string, never> {
    return Effect.promise(async () => {
      const answer = await passwordPrompt({
        message,
        mask: "*",
      });
      return answer;
    });
  }

  confirm(message: string, defaultValue: boolean = false): Effect.Effect<boolean, never> {
    return Effect.promise(async () => {
      const answer = await confirmPrompt({
        message,
        default: defaultValue,
      });
      return answer;
    });
  }
}

/**
 * Create the terminal service layer
 */
export function createTerminalServiceLayer(): Layer.Layer<TerminalService, never, never> {
  return Layer.succeed(TerminalServiceTag, new TerminalServiceImpl());
}
