/**
 * TabularStore - idempotent ensure/read/write over a TabularBackend
 *
 * Each backend call runs through its own bounded retry. Once the budget is
 * spent the store returns a sentinel ("unavailable", null, false) instead of
 * throwing, and the caller abandons the cycle.
 */

import { sheetsLogger } from "../../logger.js";
import {
  STORE_RETRY_POLICY,
  withRetry,
  type RetryOutcome,
  type RetryPolicy,
  type SleepFn,
} from "../../utils/retry.js";

import type { Destination, TabularBackend } from "./backend.js";
import type { CellRows } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type EnsureResult = "exists" | "created" | "unavailable";

export interface TabularStoreOptions {
  policy?: RetryPolicy;
  sleep?: SleepFn;
}

const HEADER_ROW_COUNT = 1;

// ============================================================================
// TabularStore
// ============================================================================

export class TabularStore {
  private policy: RetryPolicy;
  private sleep?: SleepFn;

  constructor(
    private backend: TabularBackend,
    options: TabularStoreOptions = {}
  ) {
    this.policy = options.policy ?? STORE_RETRY_POLICY;
    this.sleep = options.sleep;
  }

  private attempt<T>(
    operation: string,
    task: (attempt: number) => Promise<T>
  ): Promise<RetryOutcome<T>> {
    return withRetry(task, {
      policy: this.policy,
      operation,
      logger: sheetsLogger,
      sleep: this.sleep,
    });
  }

  private async findDestination(
    label: string
  ): Promise<RetryOutcome<Destination | undefined>> {
    const listed = await this.attempt("list sheets", () =>
      this.backend.listDestinations()
    );
    if (!listed.ok) return listed;
    return {
      ok: true,
      value: listed.value.find((d) => d.title === label),
      attempts: listed.attempts,
    };
  }

  /**
   * Make sure a sheet named `label` exists. A new sheet gets its first row
   * frozen for the header.
   */
  async ensureExists(label: string): Promise<EnsureResult> {
    const found = await this.findDestination(label);
    if (!found.ok) {
      sheetsLogger.error(
        { period: label, error: found.error },
        "Unable to list sheets"
      );
      return "unavailable";
    }
    if (found.value !== undefined) {
      return "exists";
    }

    sheetsLogger.info({ period: label }, "Creating sheet for period");
    const created = await this.attempt("create sheet", (attempt) =>
      attempt === 1 ? this.backend.createDestination(label) : this.recreate(label)
    );
    if (!created.ok) {
      sheetsLogger.error(
        { period: label, error: created.error },
        "Unable to create sheet"
      );
      return "unavailable";
    }

    sheetsLogger.info(
      { period: label, sheetId: created.value.id },
      "Sheet created successfully"
    );
    await this.freeze(created.value);
    return "created";
  }

  /**
   * Retry of a failed create. The earlier request may have been applied
   * with its reply lost, so reuse a sheet that now carries the label.
   */
  private async recreate(label: string): Promise<Destination> {
    const existing = (await this.backend.listDestinations()).find(
      (d) => d.title === label
    );
    if (existing !== undefined) {
      sheetsLogger.warn(
        { period: label, sheetId: existing.id },
        "Sheet found after failed create, using it"
      );
      return existing;
    }
    return this.backend.createDestination(label);
  }

  /**
   * Freeze the header row of an existing sheet
   */
  async pinHeaderRow(label: string): Promise<boolean> {
    const found = await this.findDestination(label);
    if (!found.ok || found.value === undefined) {
      sheetsLogger.warn({ period: label }, "Sheet not found, cannot pin header");
      return false;
    }
    return this.freeze(found.value);
  }

  private async freeze(destination: Destination): Promise<boolean> {
    const frozen = await this.attempt("freeze header row", () =>
      this.backend.freezeRows(destination.id, HEADER_ROW_COUNT)
    );
    if (!frozen.ok) {
      // The sheet is usable without a frozen header
      sheetsLogger.warn(
        { period: destination.title, error: frozen.error },
        "Unable to freeze header row"
      );
    }
    return frozen.ok;
  }

  async readRange(label: string, range: string): Promise<CellRows | null> {
    const read = await this.attempt("read values", () =>
      this.backend.getValues(label, range)
    );
    if (!read.ok) {
      sheetsLogger.error(
        { period: label, range, error: read.error },
        "Unable to retrieve data from sheet"
      );
      return null;
    }
    return read.value;
  }

  /**
   * Positional write: retries target the same range, so a retried write
   * cannot produce a second row.
   */
  async writeRange(
    label: string,
    range: string,
    rows: CellRows
  ): Promise<boolean> {
    sheetsLogger.info({ period: label, range }, "Writing values to sheet");
    const written = await this.attempt("update values", () =>
      this.backend.updateValues(label, range, rows)
    );
    if (!written.ok) {
      sheetsLogger.error(
        { period: label, range, error: written.error },
        "Unable to update values in sheet"
      );
      return false;
    }
    sheetsLogger.info({ period: label, range }, "Successfully updated values");
    return true;
  }
}
