import { Data } from "effect";

/**
 * Tagged error types for the broadcast scheduler
 * Using Effect's Data.TaggedError for proper error handling
 */

/**
 * A single problem found while validating configuration.
 * `field` is the dot-notation path of the offending value (e.g. "schedule.services.A.time").
 */
export interface ConfigurationViolation {
  readonly field: string;
  readonly message: string;
}

// Configuration Errors
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly message: string;
  readonly violations: readonly ConfigurationViolation[];
  readonly suggestion?: string;
}> {}

export class ConfigurationNotFoundError extends Data.TaggedError("ConfigurationNotFoundError")<{
  readonly path: string;
  readonly suggestion?: string;
}> {}

// CLI Errors
export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly field: string;
  readonly message: string;
  readonly value?: unknown;
  readonly suggestion?: string;
}> {}

// Remote platform Errors
export class DirectoryError extends Data.TaggedError("DirectoryError")<{
  readonly operation: string;
  readonly message: string;
  readonly status?: number;
  readonly suggestion?: string;
}> {}

export class GoogleAuthenticationError extends Data.TaggedError("GoogleAuthenticationError")<{
  readonly message: string;
  readonly suggestion?: string;
}> {}

// File System Errors
export class FileSystemError extends Data.TaggedError("FileSystemError")<{
  readonly path: string;
  readonly operation: string;
  readonly reason: string;
  readonly suggestion?: string;
}> {}

/**
 * A service whose stream key could not be found on the channel.
 * Not an error: the service is left out of planning and the run continues.
 */
export class ResolutionWarning extends Data.TaggedClass("ResolutionWarning")<{
  readonly serviceId: string;
  readonly expectedStreamTitle: string;
}> {}

export type SchedulerError =
  | ConfigurationError
  | ConfigurationNotFoundError
  | ValidationError
  | DirectoryError
  | GoogleAuthenticationError
  | FileSystemError;

/**
 * Build a ConfigurationError from a list of violations, with a summary message.
 */
export function configurationError(
  violations: readonly ConfigurationViolation[],
  suggestion?: string,
): ConfigurationError {
  const count = violations.length;
  return new ConfigurationError({
    message: `${count} configuration problem${count === 1 ? "" : "s"} found`,
    violations,
    ...(suggestion !== undefined && { suggestion }),
  });
}
