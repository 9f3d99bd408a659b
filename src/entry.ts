/**
 * Process bootstrap. Loaded before the command tree so process-wide flags are set
 * before googleapis and its transitive dependencies are imported.
 */

// googleapis pulls in modules that trigger Node's `punycode` deprecation warning
process.noDeprecation = true;

import("./main").catch((error: unknown) => {
  console.error("Failed to start broadcast-scheduler:", error);
  process.exitCode = 1;
});
