/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import { ConfigError, errorMessage } from "../../errors.js";

import type { PersistResult } from "../../services/sync/engine.js";
import type { SensorCatalog } from "../../services/catalog/sensors.js";
import type { ParsedPayload } from "../../types/index.js";

/**
 * Display the sensor catalog ordered by column
 */
export function displayCatalogTable(catalog: SensorCatalog): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Sensor"),
      chalk.cyan("Column"),
      chalk.cyan("#"),
      chalk.cyan("Description"),
    ],
    colWidths: [22, 8, 6, 50],
    wordWrap: true,
  });

  for (const sensor of catalog.descriptors()) {
    table.push([
      chalk.green(sensor.name),
      sensor.columnCode,
      String(sensor.column),
      sensor.description,
    ]);
  }

  console.log(table.toString());
  console.log(
    `\n${String(catalog.size)} sensors, row width ${String(catalog.width)}`
  );
}

/**
 * Display parsed payload fields with their catalog column
 */
export function displayFields(
  parsed: ParsedPayload,
  catalog: SensorCatalog
): void {
  const table = new CliTable3({
    head: [chalk.cyan("Sensor"), chalk.cyan("Value"), chalk.cyan("Column")],
    colWidths: [22, 32, 10],
    wordWrap: true,
  });

  for (const field of parsed.fields) {
    const sensor = catalog.get(field.sensor);
    table.push([
      field.sensor,
      field.value,
      sensor !== undefined ? sensor.columnCode : chalk.yellow("unknown"),
    ]);
  }

  console.log(table.toString());

  if (parsed.malformed.length > 0) {
    printWarning(`${String(parsed.malformed.length)} malformed field(s):`);
    for (const field of parsed.malformed) {
      console.log(`  ${field}`);
    }
  }
}

export function describePersistResult(result: PersistResult): string {
  if (result.ok) {
    const skipped =
      result.skipped.length > 0
        ? ` (skipped: ${result.skipped.join(", ")})`
        : "";
    return `Wrote ${String(result.fieldsWritten)} fields to ${result.period} row ${String(result.row)}${skipped}`;
  }
  return result.period !== undefined
    ? `Reading not written to ${result.period}: ${result.reason}`
    : `Reading not written: ${result.reason}`;
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print an error, with each configuration problem on its own line
 */
export function printFailure(error: unknown): void {
  printError(errorMessage(error));
  if (error instanceof ConfigError) {
    for (const detail of error.details ?? []) {
      console.error(`  ${detail}`);
    }
  }
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green("Success:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
