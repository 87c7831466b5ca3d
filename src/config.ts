/**
 * Runtime configuration from the environment (and `.env` via dotenv,
 * loaded by the logger module).
 */

import { readFile } from "node:fs/promises";

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError, errorMessage } from "./errors.js";
import { DEFAULT_BASE_URL } from "./station/client.js";

import type { StationCredentials } from "./types/index.js";

// ============================================================================
// Schema
// ============================================================================

export const EnvSchema = Type.Object({
  SPREADSHEET_ID: Type.String({ minLength: 1 }),
  STATION_MAC_ADDRESS: Type.Optional(Type.String({ minLength: 1 })),
  AMBIENT_API_KEY: Type.Optional(Type.String({ minLength: 1 })),
  AMBIENT_APPLICATION_KEY: Type.Optional(Type.String({ minLength: 1 })),
  SECRETS_FILE: Type.String({ default: "secrets.txt" }),
  AMBIENT_API_BASE_URL: Type.String({ default: DEFAULT_BASE_URL }),
  SENSOR_CATALOG_FILE: Type.String({ default: "headers.txt" }),
  GOOGLE_CREDENTIALS_FILE: Type.String({ default: "credentials.json" }),
  GOOGLE_TOKEN_FILE: Type.String({ default: "token.json" }),
  POLL_INTERVAL_MINUTES: Type.Integer({ minimum: 1, maximum: 60, default: 5 }),
  RETRY_STEP_SECONDS: Type.Number({ minimum: 0, default: 10 }),
  REQUEST_TIMEOUT_SECONDS: Type.Number({ exclusiveMinimum: 0, default: 30 }),
});

export interface AppConfig {
  spreadsheetId: string;
  station: Partial<StationCredentials>;
  secretsFile: string;
  apiBaseUrl: string;
  catalogFile: string;
  credentialsFile: string;
  tokenFile: string;
  intervalMs: number;
  retryStepMs: number;
  requestTimeoutMs: number;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate the environment. Empty strings count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const raw: Record<string, unknown> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key]?.trim();
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }

  const candidate = Value.Convert(EnvSchema, Value.Default(EnvSchema, raw));
  if (!Value.Check(EnvSchema, candidate)) {
    const details = [...Value.Errors(EnvSchema, candidate)].map(
      (error) => `${error.path.slice(1) || "(root)"}: ${error.message}`
    );
    throw new ConfigError("Invalid configuration", details);
  }

  return {
    spreadsheetId: candidate.SPREADSHEET_ID,
    station: {
      macAddress: candidate.STATION_MAC_ADDRESS,
      apiKey: candidate.AMBIENT_API_KEY,
      applicationKey: candidate.AMBIENT_APPLICATION_KEY,
    },
    secretsFile: candidate.SECRETS_FILE,
    apiBaseUrl: candidate.AMBIENT_API_BASE_URL,
    catalogFile: candidate.SENSOR_CATALOG_FILE,
    credentialsFile: candidate.GOOGLE_CREDENTIALS_FILE,
    tokenFile: candidate.GOOGLE_TOKEN_FILE,
    intervalMs: candidate.POLL_INTERVAL_MINUTES * 60_000,
    retryStepMs: candidate.RETRY_STEP_SECONDS * 1000,
    requestTimeoutMs: candidate.REQUEST_TIMEOUT_SECONDS * 1000,
  };
}

// ============================================================================
// Station Credentials
// ============================================================================

/**
 * Parse a `macAddress,apiKey,applicationKey` secrets file
 */
export function parseSecrets(text: string): StationCredentials {
  const parts = text.trim().split(",").map((part) => part.trim());
  const [macAddress, apiKey, applicationKey] = parts;
  if (
    parts.length !== 3 ||
    macAddress === undefined ||
    macAddress === "" ||
    apiKey === undefined ||
    apiKey === "" ||
    applicationKey === undefined ||
    applicationKey === ""
  ) {
    throw new ConfigError(
      "Secrets file must hold macAddress,apiKey,applicationKey"
    );
  }
  return { macAddress, apiKey, applicationKey };
}

/**
 * Station credentials from the environment, falling back to the secrets file
 * when any of the three values is missing.
 */
export async function resolveStationCredentials(
  config: AppConfig
): Promise<StationCredentials> {
  const { macAddress, apiKey, applicationKey } = config.station;
  if (
    macAddress !== undefined &&
    apiKey !== undefined &&
    applicationKey !== undefined
  ) {
    return { macAddress, apiKey, applicationKey };
  }

  let text: string;
  try {
    text = await readFile(config.secretsFile, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Station credentials not set and ${config.secretsFile} unreadable: ${errorMessage(error)}`
    );
  }
  return parseSecrets(text);
}
