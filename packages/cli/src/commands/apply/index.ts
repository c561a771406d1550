/**
 * csv-trim apply command
 *
 * Apply a saved profile to one CSV file without prompting.
 */

import { resolve } from "node:path";
import { type Table, applyProfile } from "@csv-trim/core";
import type { Command } from "commander";
import { createCommandContext } from "../../context";
import { outputPathFor, readCsvFile, writeCsvFile } from "../../files";
import { describeShape, formatPreview } from "../../preview";
import { ProfileStore } from "../../profile-store";
import type { CommandContext, GlobalOptions } from "../../types";
import {
  EXIT_FAILURE,
  ProfileNotFoundError,
  error,
  formatError,
  header,
  info,
  print,
  success,
} from "../../utils";

export interface ApplyOptions extends GlobalOptions {
  profile: string;
  output?: string;
  dryRun?: boolean;
}

export interface ApplyResult {
  table: Table;
  /** Where the result was written; absent on a dry run */
  outputPath?: string;
}

/**
 * Apply a named profile to a file and write the result
 *
 * @throws ProfileNotFoundError when the profile is not in the store
 */
export function runApply(file: string, options: ApplyOptions, ctx: CommandContext): ApplyResult {
  const store = ProfileStore.load(ctx.config.profilesFile);
  const stored = store.get(options.profile);
  if (!stored) {
    throw new ProfileNotFoundError(options.profile, store.names);
  }

  const inputPath = resolve(ctx.cwd, file);
  const table = readCsvFile(inputPath, ctx.config.delimiter);
  const trimmed = applyProfile(table, store.getProfile(options.profile) ?? {});

  if (options.dryRun) {
    return { table: trimmed };
  }

  const outputPath = options.output
    ? resolve(ctx.cwd, options.output)
    : outputPathFor(inputPath, ctx.config.outputPrefix);

  writeCsvFile(outputPath, trimmed, {
    useFirstRowAsHeader: stored.use_first_row_as_header ?? false,
    delimiter: ctx.config.delimiter,
  });

  return { table: trimmed, outputPath };
}

/**
 * Apply command handler
 */
function applyHandler(file: string, options: ApplyOptions, ctx: CommandContext): void {
  const result = runApply(file, options, ctx);

  if (!result.outputPath) {
    header(`Data after applying ${options.profile}:`);
    print(formatPreview(result.table, ctx.config.previewRows));
    info(`${describeShape(result.table)} (dry run, nothing written)`);
    return;
  }

  success(`Saved ${describeShape(result.table)} to ${result.outputPath}`);
}

/**
 * Configure the apply command
 */
export function configureApplyCommand(program: Command): void {
  program
    .command("apply <file>")
    .description("Apply a saved trimming profile to a CSV file")
    .requiredOption("-p, --profile <name>", "Profile to apply")
    .option("-o, --output <path>", "Output file (defaults to the prefixed input name)")
    .option("--dry-run", "Show the result without writing it")
    .action((file: string, options: ApplyOptions) => {
      try {
        applyHandler(file, options, createCommandContext());
      } catch (err) {
        error(formatError(err));
        process.exit(EXIT_FAILURE);
      }
    });
}
