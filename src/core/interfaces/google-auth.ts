import { Context, Effect } from "effect";
import type { google } from "googleapis";
import type { GoogleAuthenticationError } from "@/core/types/errors";

export type GoogleOAuthClient = InstanceType<typeof google.auth.OAuth2>;

export interface GoogleAuthStatus {
  readonly authenticated: boolean;
  readonly tokenFilePath: string;
  readonly scopes: readonly string[];
  readonly expiresAt?: Date;
  readonly hasRefreshToken: boolean;
}

/**
 * Google OAuth session used by the YouTube collaborators
 */
export interface GoogleAuthService {
  /** Loads a stored token or runs the browser consent flow. */
  readonly authenticate: () => Effect.Effect<void, GoogleAuthenticationError>;
  /** Authenticates if needed and returns the client carrying the credentials. */
  readonly authorizedClient: () => Effect.Effect<GoogleOAuthClient, GoogleAuthenticationError>;
  /** Reports what is stored on disk without contacting Google. */
  readonly status: () => Effect.Effect<GoogleAuthStatus, never>;
  /** Removes the stored token. Returns false when there was nothing to remove. */
  readonly logout: () => Effect.Effect<boolean, GoogleAuthenticationError>;
}

export const GoogleAuthServiceTag = Context.GenericTag<GoogleAuthService>("GoogleAuthService");
