/**
 * SyncEngine - one raw payload -> one row in the current year's sheet
 */

import { syncLogger } from "../../logger.js";
import { ordinalToColumnCode } from "../../utils/columns.js";
import { parsePayload } from "./payload.js";

import type { SensorCatalog } from "../catalog/sensors.js";
import type { TabularStore } from "../sheets/store.js";
import type { RawPayload } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type PersistFailureReason =
  | "empty-payload"
  | "destination-unavailable"
  | "header-unavailable"
  | "read-unavailable"
  | "no-mapped-fields"
  | "write-unavailable";

export type PersistResult =
  | {
      ok: true;
      period: string;
      /** 1-based sheet row the reading was written to */
      row: number;
      fieldsWritten: number;
      skipped: string[];
    }
  | { ok: false; reason: PersistFailureReason; period?: string };

export interface SyncEngineOptions {
  clock?: () => Date;
}

const HEADER_ROW = 1;
const FIRST_DATA_ROW = 2;

/**
 * Label of the sheet a reading taken at `now` belongs to
 */
export function periodLabel(now: Date): string {
  return String(now.getFullYear());
}

// ============================================================================
// SyncEngine
// ============================================================================

export class SyncEngine {
  private clock: () => Date;
  // Periods whose header row was checked during this process run
  private verifiedPeriods = new Set<string>();

  constructor(
    private store: TabularStore,
    private catalog: SensorCatalog,
    options: SyncEngineOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async persist(raw: RawPayload): Promise<PersistResult> {
    if (raw.trim() === "") {
      syncLogger.error("Payload is empty, nothing to write this cycle");
      return { ok: false, reason: "empty-payload" };
    }

    const period = periodLabel(this.clock());
    syncLogger.info({ period }, "Writing reading to sheet");

    const ensured = await this.store.ensureExists(period);
    if (ensured === "unavailable") {
      return { ok: false, reason: "destination-unavailable", period };
    }

    const headerReady = await this.ensureHeader(period, ensured === "created");
    if (!headerReady) {
      return { ok: false, reason: "header-unavailable", period };
    }

    const lastColumn = ordinalToColumnCode(Math.max(this.catalog.width - 1, 0));
    const existing = await this.store.readRange(period, `A:${lastColumn}`);
    if (existing === null) {
      syncLogger.error({ period }, "Sheet rows unavailable, unable to write");
      return { ok: false, reason: "read-unavailable", period };
    }
    const row = Math.max(existing.length + 1, FIRST_DATA_ROW);

    const parsed = parsePayload(raw);
    for (const field of parsed.malformed) {
      syncLogger.warn({ period, field }, "Skipping malformed payload field");
    }

    const mapped = this.catalog.buildRow(parsed.fields);
    for (const sensor of mapped.unknown) {
      syncLogger.warn({ period, sensor }, "Skipping field for unknown sensor");
    }

    if (mapped.written.length === 0) {
      syncLogger.error(
        { period, fields: parsed.fields.length },
        "No payload field maps to a catalog column"
      );
      return { ok: false, reason: "no-mapped-fields", period };
    }

    const written = await this.store.writeRange(period, `A${String(row)}`, [
      mapped.row,
    ]);
    if (!written) {
      return { ok: false, reason: "write-unavailable", period };
    }

    syncLogger.info(
      { period, row, fieldsWritten: mapped.written.length },
      "Reading written"
    );
    return {
      ok: true,
      period,
      row,
      fieldsWritten: mapped.written.length,
      skipped: [...mapped.unknown, ...parsed.malformed],
    };
  }

  /**
   * Write the header row for a new sheet. For an existing sheet, check once
   * per run that row 1 holds a header and restore it when it does not, which
   * covers a crash between sheet creation and the header write.
   */
  private async ensureHeader(period: string, created: boolean): Promise<boolean> {
    if (!created && this.verifiedPeriods.has(period)) {
      return true;
    }

    if (!created) {
      const header = await this.store.readRange(
        period,
        `${String(HEADER_ROW)}:${String(HEADER_ROW)}`
      );
      if (header === null) {
        return false;
      }
      const hasHeader = (header[0] ?? []).some(
        (cell) => cell !== null && cell !== ""
      );
      if (hasHeader) {
        this.verifiedPeriods.add(period);
        return true;
      }
      syncLogger.warn({ period }, "Sheet has no header row, restoring it");
      await this.store.pinHeaderRow(period);
    }

    const written = await this.store.writeRange(period, `A${String(HEADER_ROW)}`, [
      this.catalog.headerRow(),
    ]);
    if (written) {
      this.verifiedPeriods.add(period);
    }
    return written;
  }
}
