import path from "node:path";
import type { StorageConfig } from "../types";
import { getDefaultDataDirectory } from "./runtime-detection";

/**
 * Resolve the directory that holds persisted data (OAuth tokens).
 * Falls back to the default data directory when the configured path is empty.
 */
export function resolveStorageDirectory(storage: StorageConfig): string {
  const trimmed = storage.path.trim();
  if (trimmed.length > 0) {
    return path.resolve(trimmed);
  }

  return getDefaultDataDirectory();
}
