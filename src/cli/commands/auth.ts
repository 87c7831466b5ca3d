/**
 * Auth command - Authorize Google Sheets access and cache the token
 */

import { requestTokenInteractively, createOAuthClient } from "../../auth/google.js";
import { loadConfig } from "../../config.js";
import { printFailure, printSuccess } from "../utils/display.js";

import type { Command } from "commander";

export function registerAuthCommand(program: Command): void {
  program
    .command("auth")
    .description("Run the OAuth consent flow and save the token file")
    .action(async () => {
      try {
        const config = loadConfig();
        const client = await createOAuthClient(config.credentialsFile);
        await requestTokenInteractively(client, config.tokenFile);
        printSuccess(`Token saved to ${config.tokenFile}`);
      } catch (error) {
        printFailure(error);
        process.exitCode = 1;
      }
    });
}
