/**
 * AppContext - everything the poller needs, built once at startup and passed
 * explicitly to the pieces that use it.
 */

import { authorizeGoogle } from "../auth/google.js";
import { resolveStationCredentials, type AppConfig } from "../config.js";
import { logger } from "../logger.js";
import { buildDeviceUrl, fetchLatestReading, maskDeviceUrl } from "../station/client.js";
import {
  FETCH_RETRY_POLICY,
  STORE_RETRY_POLICY,
  withStep,
} from "../utils/retry.js";
import { SensorCatalog } from "./catalog/sensors.js";
import { GoogleSheetsBackend } from "./sheets/google-sheets.js";
import { TabularStore } from "./sheets/store.js";
import { SyncEngine } from "./sync/engine.js";
import { Scheduler, type ReadingSource } from "./sync/scheduler.js";

import type { TabularBackend } from "./sheets/backend.js";

export interface AppContext {
  config: AppConfig;
  catalog: SensorCatalog;
  deviceUrl: string;
  fetchReading: ReadingSource;
  store: TabularStore;
  engine: SyncEngine;
  scheduler: Scheduler;
}

export interface AppContextOptions {
  /** Use this backend instead of authorizing against Google Sheets */
  backend?: TabularBackend;
  interactiveAuth?: boolean;
}

/**
 * Reading source bound to one device URL
 */
export function createReadingSource(
  deviceUrl: string,
  config: Pick<AppConfig, "retryStepMs" | "requestTimeoutMs">
): ReadingSource {
  const policy = withStep(FETCH_RETRY_POLICY, config.retryStepMs);
  return (signal) =>
    fetchLatestReading(deviceUrl, {
      policy,
      timeoutMs: config.requestTimeoutMs,
      signal,
    });
}

export async function createAppContext(
  config: AppConfig,
  options: AppContextOptions = {}
): Promise<AppContext> {
  const catalog = await SensorCatalog.load(config.catalogFile);

  const credentials = await resolveStationCredentials(config);
  const deviceUrl = buildDeviceUrl({
    ...credentials,
    baseUrl: config.apiBaseUrl,
  });
  logger.info({ url: maskDeviceUrl(deviceUrl) }, "Device URL created");

  let backend = options.backend;
  if (backend === undefined) {
    const auth = await authorizeGoogle({
      credentialsFile: config.credentialsFile,
      tokenFile: config.tokenFile,
      interactive: options.interactiveAuth,
    });
    backend = GoogleSheetsBackend.fromAuth(auth, config.spreadsheetId);
  }

  const store = new TabularStore(backend, {
    policy: withStep(STORE_RETRY_POLICY, config.retryStepMs),
  });
  const engine = new SyncEngine(store, catalog);
  const fetchReading = createReadingSource(deviceUrl, config);
  const scheduler = new Scheduler(fetchReading, engine, {
    intervalMs: config.intervalMs,
  });

  return { config, catalog, deviceUrl, fetchReading, store, engine, scheduler };
}
