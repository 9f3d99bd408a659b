import { FileSystem } from "@effect/platform";
import { Deferred, Effect, Either, Layer, Option } from "effect";
import { google } from "googleapis";
import http from "node:http";
import path from "node:path";
import open from "open";
import { z } from "zod";
import { AppConfigServiceTag, type AppConfigService } from "../../core/interfaces/app-config";
import {
  GoogleAuthServiceTag,
  type GoogleAuthService,
  type GoogleAuthStatus,
  type GoogleOAuthClient,
} from "../../core/interfaces/google-auth";
import { LoggerServiceTag, type LoggerService } from "../../core/interfaces/logger";
import { TerminalServiceTag, type TerminalService } from "../../core/interfaces/terminal";
import type { GoogleConfig } from "../../core/types/config";
import { GoogleAuthenticationError } from "../../core/types/errors";
import { getErrorMessage } from "../../core/utils/http-utils";
import { safeParseJson } from "../../core/utils/json";
import { resolveStorageDirectory } from "../../core/utils/storage-utils";

/**
 * Google OAuth 2.0 installed-app flow for the YouTube Data API
 */

export const YOUTUBE_SCOPE = "https://www.googleapis.com/auth/youtube.force-ssl";
export const YOUTUBE_REQUIRED_SCOPES = [YOUTUBE_SCOPE] as const;

const GoogleOAuthTokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  scope: z.string().nullish(),
  token_type: z.string().nullish(),
  expiry_date: z.number().nullish(),
});

export type GoogleOAuthToken = z.infer<typeof GoogleOAuthTokenSchema>;
type OAuthCredentials = GoogleOAuthClient["credentials"];

const ClientSecretsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

// OAuth client JSON downloaded from the Google Cloud console
const CredentialsFileSchema = z.union([
  z.object({ installed: ClientSecretsSchema }),
  z.object({ web: ClientSecretsSchema }),
]);

export interface ClientCredentials {
  readonly clientId: string;
  readonly clientSecret: string;
}

export function getGoogleOAuthRedirectUri(port: number): string {
  return `http://localhost:${port}/oauth2callback`;
}

export function getGoogleTokenFilePath(dataDir: string): string {
  return path.join(dataDir, "google", "youtube-token.json");
}

export function parseToken(content: string): Option.Option<GoogleOAuthToken> {
  return Option.flatMap(safeParseJson(content), (raw) => {
    const result = GoogleOAuthTokenSchema.safeParse(raw);
    return result.success ? Option.some(result.data) : Option.none();
  });
}

export function tokenScopes(token: GoogleOAuthToken): readonly string[] {
  return token.scope ? token.scope.split(" ").filter(Boolean) : [];
}

/**
 * Check if a token has the required scopes
 */
export function hasRequiredScopes(
  token: GoogleOAuthToken,
  requiredScopes: readonly string[],
): boolean {
  const scopes = tokenScopes(token);
  return requiredScopes.every((scope) => scopes.includes(scope));
}

export function parseClientCredentialsFile(content: string): Option.Option<ClientCredentials> {
  return Option.flatMap(safeParseJson(content), (raw) => {
    const result = CredentialsFileSchema.safeParse(raw);
    if (!result.success) return Option.none();
    const secrets = "installed" in result.data ? result.data.installed : result.data.web;
    return Option.some({ clientId: secrets.client_id, clientSecret: secrets.client_secret });
  });
}

function toCredentials(token: GoogleOAuthToken): OAuthCredentials {
  return {
    ...(token.access_token != null && { access_token: token.access_token }),
    ...(token.refresh_token != null && { refresh_token: token.refresh_token }),
    ...(token.scope != null && { scope: token.scope }),
    ...(token.token_type != null && { token_type: token.token_type }),
    ...(token.expiry_date != null && { expiry_date: token.expiry_date }),
  };
}

/**
 * Client id and secret from the config, falling back to the downloaded credentials file.
 */
export function resolveClientCredentials(
  fs: FileSystem.FileSystem,
  config: GoogleConfig,
): Effect.Effect<ClientCredentials, GoogleAuthenticationError> {
  return Effect.gen(function* () {
    if (config.clientId && config.clientSecret) {
      return { clientId: config.clientId, clientSecret: config.clientSecret };
    }

    const credentialsFile = config.credentialsFile;
    if (!credentialsFile) {
      return yield* Effect.fail(
        new GoogleAuthenticationError({
          message:
            "Missing Google OAuth credentials. Set google.clientId and google.clientSecret, or google.credentialsFile.",
          suggestion: "Create an OAuth client of type 'Desktop app' in the Google Cloud console",
        }),
      );
    }

    const content = yield* fs.readFileString(credentialsFile).pipe(
      Effect.mapError(
        (error) =>
          new GoogleAuthenticationError({
            message: `Cannot read credentials file ${credentialsFile}: ${error.message}`,
            suggestion: "Check google.credentialsFile in the configuration",
          }),
      ),
    );

    const parsed = parseClientCredentialsFile(content);
    if (Option.isNone(parsed)) {
      return yield* Effect.fail(
        new GoogleAuthenticationError({
          message: `Credentials file ${credentialsFile} has no installed or web client`,
          suggestion: "Download the OAuth client JSON again from the Google Cloud console",
        }),
      );
    }
    return parsed.value;
  });
}

/**
 * Local HTTP server that receives the OAuth redirect. The outcome of the first
 * callback completes `result`.
 */
function startCallbackServer(
  port: number,
  result: Deferred.Deferred<string, GoogleAuthenticationError>,
): Effect.Effect<http.Server, GoogleAuthenticationError> {
  return Effect.async<http.Server, GoogleAuthenticationError>((resume) => {
    const server = http.createServer((req, res) => {
      const url = new URL(req.url ?? "/", `http://localhost:${port}`);
      if (url.pathname !== "/oauth2callback") {
        res.writeHead(404);
        res.end("Not found");
        return;
      }

      const code = url.searchParams.get("code");
      const denied = url.searchParams.get("error");
      if (code) {
        res.writeHead(200, { "Content-Type": "text/html" });
        res.end(
          "<html><body><h1>Authentication successful</h1>You can close this window.</body></html>",
        );
        Deferred.unsafeDone(result, Effect.succeed(code));
      } else {
        res.writeHead(400);
        res.end("Missing code");
        Deferred.unsafeDone(
          result,
          Effect.fail(
            new GoogleAuthenticationError({
              message: `Google did not return an authorization code${denied ? ` (${denied})` : ""}`,
            }),
          ),
        );
      }
    });

    server.once("error", (error) => {
      resume(
        Effect.fail(
          new GoogleAuthenticationError({
            message: `Cannot listen on port ${port} for the OAuth callback: ${error.message}`,
            suggestion: "Free the port or set google.redirectPort to another value",
          }),
        ),
      );
    });
    server.listen(port, () => resume(Effect.succeed(server)));

    return Effect.sync(() => {
      server.close();
    });
  });
}

export class GoogleAuthServiceImpl implements GoogleAuthService {
  private loaded = false;

  constructor(
    private readonly fs: FileSystem.FileSystem,
    private readonly tokenFilePath: string,
    private readonly oauthClient: GoogleOAuthClient,
    private readonly port: number,
    private readonly requireCredentials: () => Effect.Effect<void, GoogleAuthenticationError>,
    private readonly terminal: TerminalService,
    private readonly logger: LoggerService,
  ) {
    // Persist tokens refreshed by the client so the next run starts with them
    this.oauthClient.on("tokens", (tokens) => {
      const merged = { ...this.oauthClient.credentials, ...tokens };
      Effect.runFork(
        this.persistToken(merged).pipe(
          Effect.catchAll((error) =>
            this.logger.warn("Failed to persist refreshed Google token", { error: error.message }),
          ),
        ),
      );
    });
  }

  authenticate(): Effect.Effect<void, GoogleAuthenticationError> {
    return Effect.gen(
      function* (this: GoogleAuthServiceImpl) {
        yield* this.requireCredentials();
        const tokenLoaded = yield* this.readTokenIfExists();
        if (!tokenLoaded) {
          yield* this.performOAuthFlow();
        }
        this.loaded = true;
      }.bind(this),
    );
  }

  authorizedClient(): Effect.Effect<GoogleOAuthClient, GoogleAuthenticationError> {
    return Effect.gen(
      function* (this: GoogleAuthServiceImpl) {
        if (!this.loaded) {
          yield* this.authenticate();
        }
        return this.oauthClient;
      }.bind(this),
    );
  }

  status(): Effect.Effect<GoogleAuthStatus, never> {
    return Effect.gen(
      function* (this: GoogleAuthServiceImpl) {
        const token = yield* this.readToken();
        if (Option.isNone(token)) {
          return {
            authenticated: false,
            tokenFilePath: this.tokenFilePath,
            scopes: [],
            hasRefreshToken: false,
          };
        }

        const { expiry_date: expiryDate } = token.value;
        return {
          authenticated: hasRequiredScopes(token.value, YOUTUBE_REQUIRED_SCOPES),
          tokenFilePath: this.tokenFilePath,
          scopes: tokenScopes(token.value),
          ...(expiryDate != null && { expiresAt: new Date(expiryDate) }),
          hasRefreshToken: Boolean(token.value.refresh_token),
        };
      }.bind(this),
    );
  }

  logout(): Effect.Effect<boolean, GoogleAuthenticationError> {
    return Effect.gen(
      function* (this: GoogleAuthServiceImpl) {
        const exists = yield* this.fs
          .exists(this.tokenFilePath)
          .pipe(Effect.catchAll(() => Effect.succeed(false)));
        if (!exists) return false;

        yield* this.fs.remove(this.tokenFilePath).pipe(
          Effect.mapError(
            (error) =>
              new GoogleAuthenticationError({
                message: `Failed to remove token file ${this.tokenFilePath}: ${error.message}`,
              }),
          ),
        );
        this.oauthClient.setCredentials({});
        this.loaded = false;
        yield* this.logger.info("Removed stored Google token", { path: this.tokenFilePath });
        return true;
      }.bind(this),
    );
  }

  private readToken(): Effect.Effect<Option.Option<GoogleOAuthToken>, never> {
    return this.fs.readFileString(this.tokenFilePath).pipe(
      Effect.map(parseToken),
      Effect.catchAll(() => Effect.succeed(Option.none())),
    );
  }

  private readTokenIfExists(): Effect.Effect<boolean, never> {
    return Effect.gen(
      function* (this: GoogleAuthServiceImpl) {
        const token = yield* this.readToken();
        if (Option.isNone(token)) return false;
        if (!hasRequiredScopes(token.value, YOUTUBE_REQUIRED_SCOPES)) {
          yield* this.logger.info("Stored Google token lacks the YouTube scope, re-authenticating");
          return false;
        }
        this.oauthClient.setCredentials(toCredentials(token.value));
        return true;
      }.bind(this),
    );
  }

  private performOAuthFlow(): Effect.Effect<void, GoogleAuthenticationError> {
    return Effect.gen(
      function* (this: GoogleAuthServiceImpl) {
        const authUrl = this.oauthClient.generateAuthUrl({
          access_type: "offline",
          scope: [...YOUTUBE_REQUIRED_SCOPES],
          prompt: "consent",
        });

        const code = yield* Effect.scoped(
          Effect.gen(
            function* (this: GoogleAuthServiceImpl) {
              const result = yield* Deferred.make<string, GoogleAuthenticationError>();
              yield* Effect.acquireRelease(startCallbackServer(this.port, result), (server) =>
                Effect.sync(() => {
                  server.close();
                }),
              );

              yield* this.terminal.info(
                `Open this URL in your browser to authorize YouTube access: ${authUrl}`,
              );
              yield* Effect.tryPromise(() => open(authUrl)).pipe(
                Effect.catchAll((error) =>
                  this.logger.debug("Could not open a browser", { error: getErrorMessage(error) }),
                ),
              );
              return yield* Deferred.await(result);
            }.bind(this),
          ),
        );

        const tokenResp = yield* Effect.tryPromise({
          try: () => this.oauthClient.getToken(code),
          catch: (err) =>
            new GoogleAuthenticationError({
              message: `OAuth flow failed: ${getErrorMessage(err)}`,
            }),
        });
        this.oauthClient.setCredentials(tokenResp.tokens);
        yield* this.persistToken(tokenResp.tokens);
        yield* this.logger.info("Stored new Google token", { path: this.tokenFilePath });
      }.bind(this),
    );
  }

  private persistToken(token: OAuthCredentials): Effect.Effect<void, GoogleAuthenticationError> {
    return Effect.gen(
      function* (this: GoogleAuthServiceImpl) {
        const toPersistError = (error: { message: string }) =>
          new GoogleAuthenticationError({
            message: `Failed to persist token: ${error.message}`,
            suggestion: "Check that the storage directory is writable",
          });

        yield* this.fs
          .makeDirectory(path.dirname(this.tokenFilePath), { recursive: true })
          .pipe(Effect.mapError(toPersistError));
        yield* this.fs
          .writeFileString(this.tokenFilePath, JSON.stringify(token, null, 2))
          .pipe(Effect.mapError(toPersistError));
      }.bind(this),
    );
  }
}

// Layer for providing the Google OAuth session
export function createGoogleAuthLayer(): Layer.Layer<
  GoogleAuthService,
  never,
  FileSystem.FileSystem | AppConfigService | TerminalService | LoggerService
> {
  return Layer.effect(
    GoogleAuthServiceTag,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const terminal = yield* TerminalServiceTag;
      const logger = yield* LoggerServiceTag;
      const appConfig = yield* (yield* AppConfigServiceTag).appConfig;

      const credentials = yield* Effect.either(resolveClientCredentials(fs, appConfig.google));
      const port = appConfig.google.redirectPort;
      const oauthClient = new google.auth.OAuth2({
        ...(Either.isRight(credentials) && {
          clientId: credentials.right.clientId,
          clientSecret: credentials.right.clientSecret,
        }),
        redirectUri: getGoogleOAuthRedirectUri(port),
      });

      const requireCredentials = (): Effect.Effect<void, GoogleAuthenticationError> =>
        Either.isLeft(credentials) ? Effect.fail(credentials.left) : Effect.void;

      const tokenFilePath = getGoogleTokenFilePath(resolveStorageDirectory(appConfig.storage));
      return new GoogleAuthServiceImpl(
        fs,
        tokenFilePath,
        oauthClient,
        port,
        requireCredentials,
        terminal,
        logger,
      );
    }),
  );
}
