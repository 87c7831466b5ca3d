/**
 * SensorCatalog - sensor name -> column layout
 *
 * Loaded once at startup from a line-oriented file:
 *
 *   tempf, B, Outdoor Temperature (F)
 *   humidity, C, Outdoor Humidity (%)
 *
 * Each line is split on its first two commas, so descriptions may contain
 * commas. The catalog is read-only after construction.
 */

import { readFile } from "node:fs/promises";

import { CatalogError, errorMessage } from "../../errors.js";
import { catalogLogger } from "../../logger.js";
import { columnCodeToOrdinal } from "../../utils/columns.js";

import type {
  CellRow,
  ReadingField,
  SensorDescriptor,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface MappedRow {
  row: CellRow;
  /** Fields placed in the row */
  written: ReadingField[];
  /** Sensor names with no catalog entry */
  unknown: string[];
}

// ============================================================================
// SensorCatalog
// ============================================================================

export class SensorCatalog {
  private readonly sensors: ReadonlyMap<string, SensorDescriptor>;
  readonly width: number;

  constructor(descriptors: Iterable<SensorDescriptor>) {
    const sensors = new Map<string, SensorDescriptor>();
    for (const descriptor of descriptors) {
      sensors.set(descriptor.name, descriptor);
    }
    this.sensors = sensors;

    let width = 0;
    for (const descriptor of sensors.values()) {
      width = Math.max(width, descriptor.column + 1);
    }
    this.width = width;
  }

  /**
   * Parse catalog text. Malformed lines are skipped with a warning and
   * duplicate names keep the last entry.
   */
  static parse(text: string, source = "catalog"): SensorCatalog {
    const descriptors = new Map<string, SensorDescriptor>();
    const lines = text.split(/\r?\n/);

    for (const [index, rawLine] of lines.entries()) {
      const line = rawLine.trim();
      if (line === "" || line.startsWith("#")) continue;

      const lineNumber = index + 1;
      const parts = splitCatalogLine(line);
      if (parts === null) {
        catalogLogger.warn(
          { source, lineNumber, line },
          "Skipping catalog line without name, column and description"
        );
        continue;
      }

      const [name, columnCode, description] = parts;
      let column: number;
      try {
        column = columnCodeToOrdinal(columnCode);
      } catch (error) {
        catalogLogger.warn(
          { source, lineNumber, columnCode, error: errorMessage(error) },
          "Skipping catalog line with invalid column code"
        );
        continue;
      }

      const previous = descriptors.get(name);
      if (previous !== undefined) {
        catalogLogger.warn(
          {
            source,
            lineNumber,
            sensor: name,
            previousColumn: previous.columnCode,
            column: columnCode,
          },
          "Duplicate sensor name in catalog, keeping the last entry"
        );
      }

      descriptors.set(name, {
        name,
        columnCode: columnCode.toUpperCase(),
        column,
        description,
      });
    }

    const catalog = new SensorCatalog(descriptors.values());
    catalogLogger.info(
      { source, sensors: catalog.size, width: catalog.width },
      "Sensor catalog loaded"
    );
    return catalog;
  }

  static async load(path: string): Promise<SensorCatalog> {
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (error) {
      throw new CatalogError(
        `Unable to read sensor catalog ${path}: ${errorMessage(error)}`
      );
    }
    return SensorCatalog.parse(text, path);
  }

  get size(): number {
    return this.sensors.size;
  }

  get(name: string): SensorDescriptor | undefined {
    return this.sensors.get(name);
  }

  descriptors(): SensorDescriptor[] {
    return [...this.sensors.values()].sort(
      (a, b) => a.column - b.column || a.name.localeCompare(b.name)
    );
  }

  /**
   * Description of each sensor at its column, blank elsewhere
   */
  headerRow(): CellRow {
    const row: CellRow = new Array<string | null>(this.width).fill(null);
    for (const descriptor of this.descriptors()) {
      row[descriptor.column] = descriptor.description;
    }
    return row;
  }

  /**
   * Place each field's value at its sensor's column. Unknown sensors are
   * reported, not placed.
   */
  buildRow(fields: readonly ReadingField[]): MappedRow {
    const row: CellRow = new Array<string | null>(this.width).fill(null);
    const written: ReadingField[] = [];
    const unknown: string[] = [];

    for (const field of fields) {
      const descriptor = this.sensors.get(field.sensor);
      if (descriptor === undefined) {
        unknown.push(field.sensor);
        continue;
      }
      row[descriptor.column] = field.value;
      written.push(field);
    }

    return { row, written, unknown };
  }
}

function splitCatalogLine(line: string): [string, string, string] | null {
  const first = line.indexOf(",");
  if (first === -1) return null;
  const second = line.indexOf(",", first + 1);
  if (second === -1) return null;

  const name = line.slice(0, first).trim();
  const columnCode = line.slice(first + 1, second).trim();
  const description = line.slice(second + 1).trim();

  if (name === "" || columnCode === "") return null;
  return [name, columnCode, description];
}
