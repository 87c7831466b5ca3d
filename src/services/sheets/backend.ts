import type { CellRows } from "../../types/index.js";

/**
 * A sheet inside the target spreadsheet
 */
export interface Destination {
  id: number;
  title: string;
}

/**
 * Capabilities the poller needs from a spreadsheet service. Ranges are A1
 * notation without the sheet name (`A1`, `A:C`, `1:1`).
 */
export interface TabularBackend {
  listDestinations(): Promise<Destination[]>;
  createDestination(title: string): Promise<Destination>;
  freezeRows(destinationId: number, rowCount: number): Promise<void>;
  getValues(title: string, range: string): Promise<CellRows>;
  updateValues(title: string, range: string, rows: CellRows): Promise<void>;
}
