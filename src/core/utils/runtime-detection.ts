import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Runtime detection utilities for determining execution context
 */

export const APP_DIRECTORY_NAME = ".broadcast-scheduler";

/**
 * Check if a normalized path indicates a global package manager installation
 *
 * @param normalizedPath - A normalized path (lowercase, forward slashes)
 * @returns The package manager name ("pnpm", "npm") or null if not detected
 */
export function detectPackageManagerFromPath(normalizedPath: string): "pnpm" | "npm" | null {
  // pnpm: ~/.local/share/pnpm/global/5/node_modules/.bin/broadcast-scheduler
  if (normalizedPath.includes("/pnpm/") || normalizedPath.includes("/.pnpm")) {
    return "pnpm";
  }

  // npm: /usr/local/lib/node_modules, ~/.npm-global, node_modules/.bin, AppData/Roaming/npm
  if (
    normalizedPath.includes("/npm/") ||
    normalizedPath.includes("/.npm") ||
    normalizedPath.includes("/node_modules/.bin/") ||
    normalizedPath.includes("/lib/node_modules/") ||
    normalizedPath.includes("appdata/roaming/npm")
  ) {
    return "npm";
  }

  if (
    (normalizedPath.includes("/usr/local/bin/") ||
      normalizedPath.includes("/usr/bin/") ||
      normalizedPath.includes("/.local/bin/")) &&
    !normalizedPath.includes("/pnpm/")
  ) {
    return "npm";
  }

  return null;
}

function normalizePath(candidate: string): string {
  let resolved = candidate;
  try {
    if (fs.lstatSync(candidate).isSymbolicLink()) {
      resolved = fs.realpathSync(candidate);
    }
  } catch {
    // Unreadable path: classify it as written
    resolved = candidate;
  }
  return resolved.toLowerCase().replace(/\\/g, "/");
}

/**
 * Detect if the CLI is running from a global npm/pnpm installation
 *
 * Checks the executable path (process.argv[1]) first, then the directory of this module.
 */
export function isInstalledGlobally(): boolean {
  const executable = process.argv[1];
  if (executable && detectPackageManagerFromPath(normalizePath(executable)) !== null) {
    return true;
  }

  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const normalizedModuleDir = moduleDir.toLowerCase().replace(/\\/g, "/");
  return (
    normalizedModuleDir.includes("/node_modules/") && !moduleDir.startsWith(process.cwd())
  );
}

/**
 * Resolve the default directory where user data (tokens) is persisted
 * Falls back to the current working directory when not installed globally
 */
export function getDefaultDataDirectory(): string {
  if (isInstalledGlobally()) {
    const homeDir = os.homedir();
    if (homeDir && homeDir.trim().length > 0) {
      return path.join(homeDir, APP_DIRECTORY_NAME);
    }
  }

  return path.resolve(process.cwd(), APP_DIRECTORY_NAME);
}
