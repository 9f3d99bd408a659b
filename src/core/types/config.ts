/**
 * Application configuration types
 */

import { z } from "zod";

export const DEFAULT_TIMEZONE = "America/Indianapolis";
export const DEFAULT_GOOGLE_OAUTH_PORT = 53682;

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const ServiceDefinitionConfigSchema = z
  .object({
    name: z.string().optional(),
    day: z.string().optional(),
    time: z.string().optional(),
    description: z.string().optional(),
  })
  .strict();

// Accepts ["A", "B"] or the comma separated form "A,B"
const EnabledServicesSchema = z
  .union([
    z.array(z.string()),
    z.string().transform((value) =>
      value
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0),
    ),
  ])
  .default([]);

export const AppConfigSchema = z.object({
  storage: z
    .object({
      path: z.string().default(""),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default("info"),
      format: z.enum(["plain", "json"]).default("plain"),
      output: z.enum(["console", "file", "both"]).default("file"),
    })
    .default({}),
  google: z
    .object({
      clientId: z.string().default(""),
      clientSecret: z.string().default(""),
      credentialsFile: z.string().optional(),
      redirectPort: z.number().int().min(1).max(65535).default(DEFAULT_GOOGLE_OAUTH_PORT),
    })
    .default({}),
  youtube: z
    .object({
      channelId: z.string().optional(),
      playlistId: z.string().optional(),
      privacyStatus: z.enum(["public", "unlisted", "private"]).default("unlisted"),
      madeForKids: z.boolean().default(false),
      autoStart: z.boolean().default(true),
      autoStop: z.boolean().default(true),
      dvrEnabled: z.boolean().default(true),
      is360: z.boolean().default(false),
    })
    .default({}),
  schedule: z
    .object({
      campusName: z.string().default(""),
      timezone: z.string().default(DEFAULT_TIMEZONE),
      enabledServices: EnabledServicesSchema,
      services: z.record(z.string(), ServiceDefinitionConfigSchema).default({}),
      dryRun: z.boolean().default(false),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type StorageConfig = AppConfig["storage"];
export type LoggingConfig = AppConfig["logging"];
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type GoogleConfig = AppConfig["google"];
export type YouTubeConfig = AppConfig["youtube"];
export type ScheduleConfig = AppConfig["schedule"];
export type ServiceDefinitionConfig = z.infer<typeof ServiceDefinitionConfigSchema>;
