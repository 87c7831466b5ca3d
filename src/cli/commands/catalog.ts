/**
 * Catalog command - Show the sensor column layout
 */

import { loadConfig } from "../../config.js";
import { SensorCatalog } from "../../services/catalog/sensors.js";
import { displayCatalogTable, printFailure } from "../utils/display.js";

import type { Command } from "commander";

export function registerCatalogCommand(program: Command): void {
  program
    .command("catalog")
    .description("List catalog sensors with their sheet columns")
    .option("-f, --file <path>", "Catalog file (defaults to SENSOR_CATALOG_FILE)")
    .option("-j, --json", "Output as JSON")
    .action(async (options: { file?: string; json?: boolean }) => {
      try {
        const file = options.file ?? loadConfig().catalogFile;
        const catalog = await SensorCatalog.load(file);

        if (options.json === true) {
          console.log(JSON.stringify(catalog.descriptors(), null, 2));
        } else {
          displayCatalogTable(catalog);
        }
      } catch (error) {
        printFailure(error);
        process.exitCode = 1;
      }
    });
}
