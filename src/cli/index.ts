#!/usr/bin/env node

/**
 * Weather Sheet Sync CLI
 *
 * Polls a weather station's latest reading and writes it to a yearly sheet.
 */

import { Command } from "commander";

import { registerAuthCommand } from "./commands/auth.js";
import { registerCatalogCommand } from "./commands/catalog.js";
import { registerFetchCommand } from "./commands/fetch.js";
import { registerRunCommand } from "./commands/run.js";
import { registerScheduleCommand } from "./commands/schedule.js";

const program = new Command();

program
  .name("weather-sync")
  .description("Weather station to Google Sheets poller")
  .version("0.1.0");

registerRunCommand(program);
registerFetchCommand(program);
registerCatalogCommand(program);
registerAuthCommand(program);
registerScheduleCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
