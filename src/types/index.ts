// Shared domain types

// =====================
// Sensor Catalog
// =====================

/**
 * One catalog entry. `column` is the zero-based ordinal decoded from the
 * letter code (`A` = 0, `AA` = 26).
 */
export interface SensorDescriptor {
  name: string;
  columnCode: string;
  column: number;
  description: string;
}

// =====================
// Readings
// =====================

/**
 * Bracket-stripped body of one API response: `"key":value,"key":value`
 */
export type RawPayload = string;

export interface ReadingField {
  sensor: string;
  value: string;
}

export interface ParsedPayload {
  fields: ReadingField[];
  /** Raw text of fields that could not be split into key and value */
  malformed: string[];
}

// =====================
// Tabular Data
// =====================

/** `null` leaves the cell untouched */
export type Cell = string | null;
export type CellRow = Cell[];
export type CellRows = CellRow[];

// =====================
// Station API
// =====================

export interface StationCredentials {
  macAddress: string;
  apiKey: string;
  applicationKey: string;
}
