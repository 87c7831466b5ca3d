/**
 * Google API authorization
 *
 * Accepts either a service account key or an OAuth client ("installed" or
 * "web") credentials file. OAuth tokens are cached in a local token file;
 * without one, the interactive flow prints the consent URL and asks for the
 * authorization code.
 */

import { readFile, writeFile } from "node:fs/promises";

import { input } from "@inquirer/prompts";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { google, type Auth } from "googleapis";

import { AuthError, errorMessage } from "../errors.js";
import { authLogger } from "../logger.js";

export const SHEETS_SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];

// ============================================================================
// Credential File Schemas
// ============================================================================

const ServiceAccountSchema = Type.Object({
  type: Type.Literal("service_account"),
  client_email: Type.String(),
  private_key: Type.String(),
});

const OAuthClientSchema = Type.Object({
  client_id: Type.String(),
  client_secret: Type.String(),
  redirect_uris: Type.Optional(Type.Array(Type.String())),
});

const OAuthClientFileSchema = Type.Union([
  Type.Object({ installed: OAuthClientSchema }),
  Type.Object({ web: OAuthClientSchema }),
]);

const TokenSchema = Type.Object({
  access_token: Type.Optional(Type.String()),
  refresh_token: Type.Optional(Type.String()),
  expiry_date: Type.Optional(Type.Number()),
  token_type: Type.Optional(Type.String()),
  scope: Type.Optional(Type.String()),
});

// ============================================================================
// Types
// ============================================================================

export interface AuthorizeOptions {
  credentialsFile: string;
  tokenFile: string;
  /** Prompt for a consent code when no token is cached */
  interactive?: boolean;
}

export type GoogleAuthClient = Auth.OAuth2Client | Auth.JWT;

// ============================================================================
// Helpers
// ============================================================================

async function readJson(path: string, what: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new AuthError(`Unable to read ${what} ${path}: ${errorMessage(error)}`);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new AuthError(`${what} ${path} is not valid JSON`);
  }
}

async function loadCachedToken(
  tokenFile: string
): Promise<Auth.Credentials | null> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(tokenFile, "utf-8"));
  } catch {
    return null;
  }
  return Value.Check(TokenSchema, parsed) ? parsed : null;
}

export async function saveToken(
  tokenFile: string,
  token: Auth.Credentials
): Promise<void> {
  authLogger.info({ tokenFile }, "Saving OAuth token");
  await writeFile(tokenFile, JSON.stringify(token), { mode: 0o600 });
}

/**
 * Run the consent flow for an OAuth client and cache the resulting token
 */
export async function requestTokenInteractively(
  client: Auth.OAuth2Client,
  tokenFile: string
): Promise<Auth.Credentials> {
  const authUrl = client.generateAuthUrl({
    access_type: "offline",
    scope: SHEETS_SCOPES,
  });
  console.log(
    `Go to the following link in your browser, then enter the authorization code:\n${authUrl}\n`
  );

  const code = await input({ message: "Authorization code:" });
  let tokens: Auth.Credentials;
  try {
    ({ tokens } = await client.getToken(code.trim()));
  } catch (error) {
    throw new AuthError(`Unable to exchange authorization code: ${errorMessage(error)}`);
  }

  await saveToken(tokenFile, tokens);
  return tokens;
}

// ============================================================================
// Authorization
// ============================================================================

export async function createOAuthClient(
  credentialsFile: string
): Promise<Auth.OAuth2Client> {
  const parsed = await readJson(credentialsFile, "credentials file");
  if (!Value.Check(OAuthClientFileSchema, parsed)) {
    throw new AuthError(
      `${credentialsFile} is neither an OAuth client nor a service account key`
    );
  }
  const details = "installed" in parsed ? parsed.installed : parsed.web;
  return new google.auth.OAuth2(
    details.client_id,
    details.client_secret,
    details.redirect_uris?.[0]
  );
}

export async function authorizeGoogle(
  options: AuthorizeOptions
): Promise<GoogleAuthClient> {
  const parsed = await readJson(options.credentialsFile, "credentials file");

  if (Value.Check(ServiceAccountSchema, parsed)) {
    authLogger.info(
      { clientEmail: parsed.client_email },
      "Using service account credentials"
    );
    return new google.auth.JWT({
      email: parsed.client_email,
      key: parsed.private_key,
      scopes: SHEETS_SCOPES,
    });
  }

  const client = await createOAuthClient(options.credentialsFile);
  const cached = await loadCachedToken(options.tokenFile);
  if (cached !== null) {
    client.setCredentials(cached);
    authLogger.info("Successfully initialized Sheets client from cached token");
    return client;
  }

  if (options.interactive !== true) {
    throw new AuthError(
      `No OAuth token in ${options.tokenFile}; run the "auth" command first`
    );
  }

  client.setCredentials(
    await requestTokenInteractively(client, options.tokenFile)
  );
  return client;
}
