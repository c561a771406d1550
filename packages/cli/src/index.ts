/**
 * @csv-trim/cli
 *
 * Command-line interface for trimming CSV files with saved profiles.
 */

import { logger } from "@csv-trim/core";
import { Command } from "commander";
import { configureApplyCommand, configureProfilesCommand, configureTrimCommand } from "./commands";
import type { GlobalOptions } from "./types";

export const version = "0.1.0";

export type { GlobalOptions, CommandContext } from "./types";
export { type CsvTrimConfig, DEFAULT_CONFIG, loadConfig } from "./config";
export { ProfileStore, ProfileStoreError } from "./profile-store";

/**
 * Build the program with every command configured
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("csv-trim")
    .description("Clean CSV files with reusable trimming profiles")
    .version(version)
    .option("-v, --verbose", "Show debug logging");

  program.hook("preAction", (thisCommand) => {
    const options = thisCommand.opts<GlobalOptions>();
    if (options.verbose) {
      process.env.VERBOSE = "true";
      logger.pino.level = "debug";
    }
  });

  configureTrimCommand(program);
  configureApplyCommand(program);
  configureProfilesCommand(program);

  return program;
}

/**
 * CLI entry point
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
