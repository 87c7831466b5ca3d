/**
 * Next-run command - Show the upcoming aligned poll times
 */

import chalk from "chalk";

import { loadConfig } from "../../config.js";
import { nextRunAt } from "../../services/sync/scheduler.js";
import { printFailure } from "../utils/display.js";

import type { Command } from "commander";

export function registerScheduleCommand(program: Command): void {
  program
    .command("next-run")
    .description("Show when the next poll cycles would start")
    .option("-n, --count <n>", "Number of upcoming runs to list", "1")
    .action((options: { count: string }) => {
      try {
        const { intervalMs } = loadConfig();
        const count = Math.max(parseInt(options.count, 10) || 1, 1);

        let from = new Date();
        for (let i = 0; i < count; i++) {
          const next = nextRunAt(from, intervalMs);
          console.log(`  ${chalk.cyan(next.toISOString())}  ${next.toString()}`);
          from = next;
        }
      } catch (error) {
        printFailure(error);
        process.exitCode = 1;
      }
    });
}
