/**
 * Fetch command - Inspect the latest reading without writing it
 */

import ora from "ora";

import { loadConfig, resolveStationCredentials } from "../../config.js";
import { SensorCatalog } from "../../services/catalog/sensors.js";
import { createReadingSource } from "../../services/context.js";
import { parsePayload } from "../../services/sync/payload.js";
import { buildDeviceUrl } from "../../station/client.js";
import { displayFields, printFailure } from "../utils/display.js";

import type { Command } from "commander";

export function registerFetchCommand(program: Command): void {
  program
    .command("fetch")
    .description("Fetch the latest reading and show how it maps to columns")
    .option("-r, --raw", "Print the raw payload only")
    .action(async (options: { raw?: boolean }) => {
      const spinner = ora("Fetching latest reading...").start();

      try {
        const config = loadConfig();
        const credentials = await resolveStationCredentials(config);
        const fetchReading = createReadingSource(
          buildDeviceUrl({ ...credentials, baseUrl: config.apiBaseUrl }),
          config
        );

        const outcome = await fetchReading();
        if (!outcome.ok) {
          spinner.fail(
            `No reading after ${String(outcome.attempts)} attempts: ${outcome.error}`
          );
          process.exitCode = 1;
          return;
        }
        spinner.succeed(`Reading fetched in ${String(outcome.attempts)} attempt(s)`);

        if (options.raw === true) {
          console.log(outcome.value);
          return;
        }

        const catalog = await SensorCatalog.load(config.catalogFile);
        displayFields(parsePayload(outcome.value), catalog);
      } catch (error) {
        spinner.stop();
        printFailure(error);
        process.exitCode = 1;
      }
    });
}
