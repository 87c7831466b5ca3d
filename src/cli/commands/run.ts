/**
 * Run and once commands - scheduled and one-off poll cycles
 */

import ora from "ora";

import { loadConfig } from "../../config.js";
import { logger } from "../../logger.js";
import { createAppContext } from "../../services/context.js";
import { describePersistResult, printFailure } from "../utils/display.js";

import type { Command } from "commander";

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Poll the station every interval and write each reading")
    .action(async () => {
      try {
        const config = loadConfig();
        const context = await createAppContext(config);

        const stop = (signal: NodeJS.Signals): void => {
          logger.info({ signal }, "Stopping scheduler");
          context.scheduler.stop();
        };
        process.once("SIGINT", stop);
        process.once("SIGTERM", stop);

        logger.info(
          { intervalMinutes: config.intervalMs / 60_000 },
          "Starting scheduled API calls"
        );
        await context.scheduler.run();
      } catch (error) {
        printFailure(error);
        process.exitCode = 1;
      }
    });

  program
    .command("once")
    .description("Fetch the latest reading now and write it")
    .action(async () => {
      const spinner = ora("Loading configuration...").start();

      try {
        const context = await createAppContext(loadConfig());

        spinner.text = "Fetching latest reading...";
        const result = await context.scheduler.runCycle();

        if (result.persist?.ok === true) {
          spinner.succeed(describePersistResult(result.persist));
        } else {
          spinner.fail(
            result.persist !== null
              ? describePersistResult(result.persist)
              : `Cycle failed: ${result.error ?? "unknown error"}`
          );
          process.exitCode = 1;
        }
      } catch (error) {
        spinner.stop();
        printFailure(error);
        process.exitCode = 1;
      }
    });
}
