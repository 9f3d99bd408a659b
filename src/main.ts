#!/usr/bin/env node

import { Command } from "commander";
import { Effect, Option } from "effect";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { runCliEffect, runYouTubeCliEffect, type AppLayerConfig } from "./app-layer";
import { googleLoginCommand, googleLogoutCommand, googleStatusCommand } from "./cli/commands/auth";
import {
  getConfigCommand,
  initConfigCommand,
  setConfigCommand,
  showConfigCommand,
} from "./cli/commands/config";
import {
  removeCommand,
  scheduleCommand,
  type RemoveOptions,
  type ScheduleOptions,
} from "./cli/commands/schedule";
import { streamsCommand } from "./cli/commands/streams";
import { safeParseJson } from "./core/utils/json";

/**
 * Main entry point for the broadcast scheduler CLI
 */

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const packageJsonPath = fileURLToPath(new URL("../package.json", import.meta.url));
  const parsed = safeParseJson(readFileSync(packageJsonPath, "utf8"));
  return Option.match(parsed, {
    onNone: () => "0.0.0",
    onSome: (raw) => {
      const result = PackageJsonSchema.safeParse(raw);
      return result.success ? result.data.version : "0.0.0";
    },
  });
}

function layerConfig(program: Command): AppLayerConfig {
  const opts = program.opts();
  const configPath: unknown = opts["config"];
  return {
    debug: Boolean(opts["debug"]),
    configPath: typeof configPath === "string" ? configPath : undefined,
  };
}

/**
 * Main CLI application entry point
 *
 * Sets up the Commander.js CLI program with all available commands including:
 * - Scheduling (schedule, remove, streams)
 * - Configuration management (show, get, set, init)
 * - Authentication (login, logout, status)
 *
 * Each command is wrapped with proper error handling using the enhanced error handler
 * that provides actionable suggestions and recovery steps.
 */
function main(): Effect.Effect<void, never> {
  return Effect.sync(() => {
    const program = new Command();

    program
      .name("broadcast-scheduler")
      .description("Schedule YouTube live broadcasts for recurring weekly services")
      .version(readVersion());

    // Global options
    program
      .option("--debug", "Enable debug level logging")
      .option("--config <path>", "Path to configuration file");

    program
      .command("schedule", { isDefault: true })
      .description("Create the broadcasts missing from the planning window")
      .option("-w, --weeks <n>", "Plan every occurrence in the next n weeks")
      .option("--from <date>", "First day of a date range (YYYY-MM-DD)")
      .option("--to <date>", "Last day of a date range (YYYY-MM-DD)")
      .option("--dry-run", "Report what would be created without creating anything")
      .action((options: ScheduleOptions) => {
        runYouTubeCliEffect(scheduleCommand(options), layerConfig(program));
      });

    program
      .command("remove")
      .alias("rm")
      .description("Delete every upcoming broadcast on the channel")
      .option("--dry-run", "Report what would be deleted without deleting anything")
      .action((options: RemoveOptions) => {
        runYouTubeCliEffect(removeCommand(options), layerConfig(program));
      });

    program
      .command("streams")
      .description("List stream keys and the services they serve")
      .action(() => {
        runYouTubeCliEffect(streamsCommand(), layerConfig(program));
      });

    // Auth commands
    const authCommand = program.command("auth").description("Manage Google authentication");

    authCommand
      .command("login")
      .description("Authorize access to your YouTube channel")
      .action(() => {
        runCliEffect(googleLoginCommand(), layerConfig(program));
      });

    authCommand
      .command("logout")
      .description("Remove the stored Google token")
      .action(() => {
        runCliEffect(googleLogoutCommand(), layerConfig(program));
      });

    authCommand
      .command("status")
      .description("Check Google authentication status")
      .action(() => {
        runCliEffect(googleStatusCommand(), layerConfig(program));
      });

    // Config commands
    const configCommand = program.command("config").description("Manage configuration");

    configCommand
      .command("show")
      .description("Show all configuration values")
      .action(() => {
        runCliEffect(showConfigCommand(), layerConfig(program));
      });

    configCommand
      .command("get <key>")
      .description("Get a configuration value")
      .action((key: string) => {
        runCliEffect(getConfigCommand(key), layerConfig(program));
      });

    configCommand
      .command("set <key> <value>")
      .description("Set a configuration value")
      .action((key: string, value: string) => {
        runCliEffect(setConfigCommand(key, value), layerConfig(program));
      });

    configCommand
      .command("init")
      .description("Create a configuration file interactively")
      .action(() => {
        runCliEffect(initConfigCommand(), layerConfig(program));
      });

    program.parse();
  });
}

Effect.runPromise(main()).catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
