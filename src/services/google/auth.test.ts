import { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import { google } from "googleapis";
import { describe, expect, it } from "vitest";
import { makeRecordingLogger } from "../../core/scheduling/test-helpers";
import { GoogleAuthenticationError } from "../../core/types/errors";
import { TerminalServiceImpl } from "../terminal";
import {
  GoogleAuthServiceImpl,
  YOUTUBE_SCOPE,
  getGoogleTokenFilePath,
  hasRequiredScopes,
  parseClientCredentialsFile,
  parseToken,
  resolveClientCredentials,
} from "./auth";

const TOKEN_PATH = "/data/google/youtube-token.json";

function memoryFs(files: Record<string, string>) {
  const store = new Map(Object.entries(files));
  const fallback = FileSystem.makeNoop({});
  const fs = FileSystem.makeNoop({
    exists: (path) => Effect.succeed(store.has(path)),
    readFileString: (path) => {
      const content = store.get(path);
      return content === undefined ? fallback.readFileString(path) : Effect.succeed(content);
    },
    writeFileString: (path, data) =>
      Effect.sync(() => {
        store.set(path, data);
      }),
    makeDirectory: () => Effect.void,
    remove: (path) =>
      Effect.sync(() => {
        store.delete(path);
      }),
  });
  return { fs, store };
}

function makeService(
  files: Record<string, string>,
  requireCredentials: () => Effect.Effect<void, GoogleAuthenticationError> = () => Effect.void,
) {
  const { fs, store } = memoryFs(files);
  const client = new google.auth.OAuth2({ clientId: "test-client", clientSecret: "test-secret" });
  const { logger, logs } = makeRecordingLogger();
  const terminal = new TerminalServiceImpl(() => undefined);
  const service = new GoogleAuthServiceImpl(
    fs,
    TOKEN_PATH,
    client,
    53682,
    requireCredentials,
    terminal,
    logger,
  );
  return { service, client, store, logs };
}

const storedToken = JSON.stringify({
  access_token: "test-access-token",
  refresh_token: "test-refresh-token",
  scope: YOUTUBE_SCOPE,
  token_type: "Bearer",
  expiry_date: Date.parse("2025-01-04T22:00:00.000Z"),
});

describe("Google auth", () => {
  describe("getGoogleTokenFilePath", () => {
    it("should keep the token under the google folder of the data directory", () => {
      expect(getGoogleTokenFilePath("/data")).toBe(TOKEN_PATH);
    });
  });

  describe("parseToken", () => {
    it("should accept a stored token", () => {
      const token = parseToken(storedToken);
      expect(Option.map(token, (value) => value.access_token)).toEqual(
        Option.some("test-access-token"),
      );
    });

    it("should reject content that is not a token", () => {
      expect(Option.isNone(parseToken("not json"))).toBe(true);
      expect(Option.isNone(parseToken(JSON.stringify({ access_token: 42 })))).toBe(true);
    });
  });

  describe("hasRequiredScopes", () => {
    it("should require every scope to be granted", () => {
      const token = { scope: `openid ${YOUTUBE_SCOPE}` };
      expect(hasRequiredScopes(token, [YOUTUBE_SCOPE])).toBe(true);
      expect(hasRequiredScopes({ scope: "openid" }, [YOUTUBE_SCOPE])).toBe(false);
      expect(hasRequiredScopes({}, [YOUTUBE_SCOPE])).toBe(false);
    });
  });

  describe("parseClientCredentialsFile", () => {
    it("should read installed and web clients", () => {
      const installed = JSON.stringify({
        installed: { client_id: "test-client", client_secret: "test-secret" },
      });
      const web = JSON.stringify({ web: { client_id: "web-client", client_secret: "test-secret" } });

      expect(parseClientCredentialsFile(installed)).toEqual(
        Option.some({ clientId: "test-client", clientSecret: "test-secret" }),
      );
      expect(parseClientCredentialsFile(web)).toEqual(
        Option.some({ clientId: "web-client", clientSecret: "test-secret" }),
      );
    });

    it("should reject a file without a client", () => {
      expect(Option.isNone(parseClientCredentialsFile(JSON.stringify({ other: {} })))).toBe(true);
    });
  });

  describe("resolveClientCredentials", () => {
    it("should prefer explicit config values", async () => {
      const { fs } = memoryFs({});
      const credentials = await Effect.runPromise(
        resolveClientCredentials(fs, {
          clientId: "config-client",
          clientSecret: "test-secret",
          credentialsFile: "/secrets/client.json",
          redirectPort: 53682,
        }),
      );
      expect(credentials).toEqual({ clientId: "config-client", clientSecret: "test-secret" });
    });

    it("should fall back to the credentials file", async () => {
      const { fs } = memoryFs({
        "/secrets/client.json": JSON.stringify({
          installed: { client_id: "file-client", client_secret: "test-secret" },
        }),
      });
      const credentials = await Effect.runPromise(
        resolveClientCredentials(fs, {
          clientId: "",
          clientSecret: "",
          credentialsFile: "/secrets/client.json",
          redirectPort: 53682,
        }),
      );
      expect(credentials).toEqual({ clientId: "file-client", clientSecret: "test-secret" });
    });

    it("should fail when nothing is configured", async () => {
      const { fs } = memoryFs({});
      const error = await Effect.runPromise(
        Effect.flip(
          resolveClientCredentials(fs, { clientId: "", clientSecret: "", redirectPort: 53682 }),
        ),
      );
      expect(error._tag).toBe("GoogleAuthenticationError");
      expect(error.message).toContain("Missing Google OAuth credentials");
    });
  });

  describe("GoogleAuthServiceImpl", () => {
    it("should load a stored token without running the browser flow", async () => {
      const { service, client } = makeService({ [TOKEN_PATH]: storedToken });

      const authorized = await Effect.runPromise(service.authorizedClient());

      expect(authorized).toBe(client);
      expect(client.credentials.access_token).toBe("test-access-token");
      expect(client.credentials.refresh_token).toBe("test-refresh-token");
    });

    it("should fail before anything else when credentials are missing", async () => {
      const missing = new GoogleAuthenticationError({ message: "Missing Google OAuth credentials" });
      const { service } = makeService({ [TOKEN_PATH]: storedToken }, () => Effect.fail(missing));

      const error = await Effect.runPromise(Effect.flip(service.authenticate()));

      expect(error).toBe(missing);
    });

    it("should report the stored token status", async () => {
      const { service } = makeService({ [TOKEN_PATH]: storedToken });

      const status = await Effect.runPromise(service.status());

      expect(status).toEqual({
        authenticated: true,
        tokenFilePath: TOKEN_PATH,
        scopes: [YOUTUBE_SCOPE],
        expiresAt: new Date("2025-01-04T22:00:00.000Z"),
        hasRefreshToken: true,
      });
    });

    it("should report a missing token as unauthenticated", async () => {
      const { service } = makeService({});

      const status = await Effect.runPromise(service.status());

      expect(status).toEqual({
        authenticated: false,
        tokenFilePath: TOKEN_PATH,
        scopes: [],
        hasRefreshToken: false,
      });
    });

    it("should treat a token without the YouTube scope as unauthenticated", async () => {
      const token = JSON.stringify({ access_token: "test-access-token", scope: "openid" });
      const { service } = makeService({ [TOKEN_PATH]: token });

      const status = await Effect.runPromise(service.status());

      expect(status.authenticated).toBe(false);
      expect(status.scopes).toEqual(["openid"]);
    });

    it("should remove the stored token on logout", async () => {
      const { service, store, logs } = makeService({ [TOKEN_PATH]: storedToken });

      expect(await Effect.runPromise(service.logout())).toBe(true);
      expect(store.has(TOKEN_PATH)).toBe(false);
      expect(logs.map((log) => log.message)).toEqual(["Removed stored Google token"]);

      expect(await Effect.runPromise(service.logout())).toBe(false);
    });
  });
});
