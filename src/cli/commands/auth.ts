import { Clock, Effect } from "effect";
import { GoogleAuthServiceTag, type GoogleAuthService } from "../../core/interfaces/google-auth";
import { LoggerServiceTag, type LoggerService } from "../../core/interfaces/logger";
import { TerminalServiceTag, type TerminalService } from "../../core/interfaces/terminal";
import type { GoogleAuthenticationError } from "../../core/types/errors";

/**
 * CLI commands for authentication management
 */

/**
 * Google login command - initiates the OAuth flow for YouTube
 */
export function googleLoginCommand(): Effect.Effect<
  void,
  GoogleAuthenticationError,
  GoogleAuthService | LoggerService | TerminalService
> {
  return Effect.gen(function* () {
    const logger = yield* LoggerServiceTag;
    const auth = yield* GoogleAuthServiceTag;
    const terminal = yield* TerminalServiceTag;

    const status = yield* auth.status();
    if (status.authenticated) {
      yield* terminal.info("Already authenticated with YouTube");
      yield* terminal.log("Run `broadcast-scheduler auth logout` first to switch accounts.");
      return;
    }

    yield* logger.info("Starting Google authentication...");
    yield* terminal.info("Starting Google authentication...");
    yield* auth.authenticate();
    yield* logger.info("Google authentication completed successfully");
    yield* terminal.success("Google authentication successful!");
    yield* terminal.log("You can now schedule broadcasts on your channel.");
  });
}

/**
 * Google logout command - removes the stored token
 */
export function googleLogoutCommand(): Effect.Effect<
  void,
  GoogleAuthenticationError,
  GoogleAuthService | TerminalService
> {
  return Effect.gen(function* () {
    const auth = yield* GoogleAuthServiceTag;
    const terminal = yield* TerminalServiceTag;

    yield* terminal.info("Logging out of Google...");
    const removed = yield* auth.logout();
    if (removed) {
      yield* terminal.success("Successfully logged out of Google");
      yield* terminal.log("Your authentication tokens have been removed.");
    } else {
      yield* terminal.info("No Google authentication found");
      yield* terminal.log("You were not logged in to Google.");
    }
  });
}

/**
 * Google status command - reports the stored token
 */
export function googleStatusCommand(): Effect.Effect<
  void,
  never,
  GoogleAuthService | TerminalService
> {
  return Effect.gen(function* () {
    const auth = yield* GoogleAuthServiceTag;
    const terminal = yield* TerminalServiceTag;
    const status = yield* auth.status();

    if (status.authenticated) {
      yield* terminal.success("Authenticated with YouTube");
    } else {
      yield* terminal.warn("Not authenticated with YouTube");
      yield* terminal.log("Run `broadcast-scheduler auth login` to sign in.");
    }

    const details = [`Token file: ${status.tokenFilePath}`];
    if (status.scopes.length > 0) {
      details.push(`Scopes: ${status.scopes.join(", ")}`);
    }
    if (status.expiresAt !== undefined) {
      const now = yield* Clock.currentTimeMillis;
      const expired = status.expiresAt.getTime() <= now;
      details.push(
        `Access token ${expired ? "expired" : "expires"}: ${status.expiresAt.toISOString()}`,
      );
    }
    details.push(`Refresh token: ${status.hasRefreshToken ? "present" : "missing"}`);
    yield* terminal.list(details);
  });
}
