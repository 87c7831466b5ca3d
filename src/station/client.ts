import { FetchError, PayloadShapeError, errorMessage } from "../errors.js";
import { apiLogger } from "../logger.js";
import {
  FETCH_RETRY_POLICY,
  withRetry,
  type RetryOutcome,
  type RetryPolicy,
  type SleepFn,
} from "../utils/retry.js";

import type { RawPayload, StationCredentials } from "../types/index.js";

export const DEFAULT_BASE_URL = "https://api.ambientweather.net/v1/devices/";
const DEFAULT_TIMEOUT_MS = 30_000;
const SECRET_PARAMS = ["apiKey", "applicationKey"] as const;

export interface DeviceUrlOptions extends StationCredentials {
  baseUrl?: string;
}

export interface FetchReadingOptions {
  policy?: RetryPolicy;
  timeoutMs?: number;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

/**
 * Build the "latest record" URL for one station
 * @returns `<base><mac>?apiKey=..&applicationKey=..&limit=1`
 */
export function buildDeviceUrl(options: DeviceUrlOptions): string {
  const base = options.baseUrl ?? DEFAULT_BASE_URL;
  const url = new URL(
    encodeURIComponent(options.macAddress),
    base.endsWith("/") ? base : `${base}/`
  );
  url.searchParams.set("apiKey", options.apiKey);
  url.searchParams.set("applicationKey", options.applicationKey);
  url.searchParams.set("limit", "1");
  return url.toString();
}

/**
 * Get the device URL for display, with keys masked
 */
export function maskDeviceUrl(deviceUrl: string): string {
  const url = new URL(deviceUrl);
  for (const param of SECRET_PARAMS) {
    if (url.searchParams.has(param)) {
      url.searchParams.set(param, "****");
    }
  }
  return url.toString();
}

/**
 * Reduce a `[{...}]` response body to the flat object body between the braces
 */
export function extractObjectBody(body: string): RawPayload {
  const trimmed = body.trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    throw new PayloadShapeError("Response body is not valid JSON");
  }

  if (!Array.isArray(parsed)) {
    throw new PayloadShapeError("Response body is not a JSON array");
  }
  if (parsed.length !== 1) {
    throw new PayloadShapeError(
      `Expected exactly one reading, received ${String(parsed.length)}`
    );
  }
  const [record] = parsed;
  if (typeof record !== "object" || record === null || Array.isArray(record)) {
    throw new PayloadShapeError("Reading is not a JSON object");
  }

  // Keep the original text: strip `[` `{` ... `}` `]` and surrounding spaces
  const inner = trimmed.slice(1, -1).trim();
  return inner.slice(1, -1).trim();
}

async function fetchOnce(url: string, timeoutMs: number): Promise<RawPayload> {
  const startTime = performance.now();
  const response = await fetch(url, {
    signal: AbortSignal.timeout(timeoutMs),
  });
  const duration = Math.round(performance.now() - startTime);

  apiLogger.debug(
    {
      url: maskDeviceUrl(url),
      status: response.status,
      statusText: response.statusText,
      duration: `${String(duration)}ms`,
    },
    "Received response from station API"
  );

  if (response.status !== 200) {
    // Release the connection before retrying
    await response.body?.cancel();
    throw new FetchError(
      `Received error status code ${String(response.status)}`,
      response.status
    );
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new FetchError(`Unable to read response body: ${errorMessage(error)}`);
  }

  apiLogger.trace({ body }, "Station API response body");
  return extractObjectBody(body);
}

/**
 * Fetch the latest reading, retrying transport errors, non-200 statuses
 * and unreadable bodies. Never throws.
 */
export async function fetchLatestReading(
  url: string,
  options: FetchReadingOptions = {}
): Promise<RetryOutcome<RawPayload>> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  apiLogger.info({ url: maskDeviceUrl(url) }, "Fetching latest reading");

  const outcome = await withRetry(() => fetchOnce(url, timeoutMs), {
    policy: options.policy ?? FETCH_RETRY_POLICY,
    operation: "fetch latest reading",
    logger: apiLogger,
    sleep: options.sleep,
    signal: options.signal,
    shouldRetry: (error) => !(error instanceof PayloadShapeError),
  });

  if (outcome.ok) {
    apiLogger.info(
      { attempts: outcome.attempts, length: outcome.value.length },
      "Fetched latest reading"
    );
  }
  return outcome;
}
