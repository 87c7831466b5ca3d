import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { google } from "googleapis";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { authorizeGoogle } from "../../../src/auth/google.js";
import { AuthError } from "../../../src/errors.js";

describe("auth/google", () => {
  let dir: string;
  let credentialsFile: string;
  let tokenFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "weather-auth-"));
    credentialsFile = join(dir, "credentials.json");
    tokenFile = join(dir, "token.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const oauthClient = {
    installed: {
      client_id: "test-client-id",
      client_secret: "test-secret",
      redirect_uris: ["http://localhost"],
    },
  };

  it("should build a JWT client from a service account key", async () => {
    await writeFile(
      credentialsFile,
      JSON.stringify({
        type: "service_account",
        client_email: "poller@example.test",
        private_key: "test-private-key",
      })
    );

    const client = await authorizeGoogle({ credentialsFile, tokenFile });

    expect(client).toBeInstanceOf(google.auth.JWT);
  });

  it("should use a cached OAuth token", async () => {
    await writeFile(credentialsFile, JSON.stringify(oauthClient));
    await writeFile(
      tokenFile,
      JSON.stringify({ refresh_token: "test-refresh-token" })
    );

    const client = await authorizeGoogle({ credentialsFile, tokenFile });

    expect(client).toBeInstanceOf(google.auth.OAuth2);
    expect(client.credentials.refresh_token).toBe("test-refresh-token");
  });

  it("should accept a web OAuth client", async () => {
    await writeFile(
      credentialsFile,
      JSON.stringify({ web: oauthClient.installed })
    );
    await writeFile(tokenFile, JSON.stringify({ access_token: "test-token" }));

    const client = await authorizeGoogle({ credentialsFile, tokenFile });

    expect(client.credentials.access_token).toBe("test-token");
  });

  it("should require a token when not interactive", async () => {
    await writeFile(credentialsFile, JSON.stringify(oauthClient));

    await expect(
      authorizeGoogle({ credentialsFile, tokenFile, interactive: false })
    ).rejects.toThrow(/run the "auth" command first/);
  });

  it("should reject an unrecognised credentials file", async () => {
    await writeFile(credentialsFile, JSON.stringify({ client_id: "x" }));

    await expect(
      authorizeGoogle({ credentialsFile, tokenFile })
    ).rejects.toThrow(AuthError);
  });

  it("should reject a missing credentials file", async () => {
    await expect(
      authorizeGoogle({ credentialsFile, tokenFile })
    ).rejects.toThrow(/Unable to read credentials file/);
  });
});
