/**
 * csv-trim trim command (default)
 *
 * Interactive flow:
 * 1. Pick a CSV file from the directory
 * 2. Preview it
 * 3. Pick a saved profile or build a new one
 * 4. Apply it and preview the result
 * 5. Optionally save to a prefixed copy beside the input
 */

import { join, resolve } from "node:path";
import * as p from "@clack/prompts";
import { applyProfile, logger } from "@csv-trim/core";
import type { Command } from "commander";
import pc from "picocolors";
import { createCommandContext } from "../../context";
import { findCsvFiles, outputPathFor, readCsvFile, writeCsvFile } from "../../files";
import { describeShape, formatPreview } from "../../preview";
import { promptForProfile } from "../../profile-builder";
import { ProfileStore } from "../../profile-store";
import type { CommandContext, GlobalOptions } from "../../types";
import {
  EXIT_FAILURE,
  dim,
  error,
  formatError,
  header,
  info,
  print,
  warning,
} from "../../utils";

export interface TrimOptions extends GlobalOptions {
  dir?: string;
}

export type TrimOutcome =
  | { status: "not-interactive" }
  | { status: "no-files" }
  | { status: "cancelled" }
  | { status: "discarded"; profileName: string }
  | { status: "saved"; profileName: string; outputPath: string };

const CANCELLED_MESSAGE = "Operation cancelled.";

function showPreview(title: string, lines: string[], summary: string): void {
  header(title);
  print(lines);
  dim(summary);
}

/**
 * Create a profile under the next free name and persist the store
 *
 * @returns the new name, or null when the user cancels
 */
async function createProfile(store: ProfileStore): Promise<string | null> {
  const profile = await promptForProfile();
  if (!profile) return null;

  const name = store.nextProfileName();
  store.set(name, profile);
  store.save();
  info(`Saved new profile ${name}`);
  return name;
}

/**
 * Ask for a profile, offering to create one after the saved ones
 */
async function chooseProfile(store: ProfileStore): Promise<string | null> {
  if (store.size === 0) {
    info("No profiles found, creating a new one.");
    const created = await createProfile(store);
    if (!created) return null;
  }

  const names = store.names;
  const choice = await p.select({
    message: "Select a trimming profile",
    options: [
      ...names.map((name, index) => ({ value: index, label: name })),
      { value: names.length, label: "Create a new trimming profile" },
    ],
  });
  if (p.isCancel(choice) || typeof choice !== "number") return null;

  const existing = names[choice];
  if (existing !== undefined) return existing;
  return createProfile(store);
}

/**
 * Trim command handler
 */
export async function trimHandler(options: TrimOptions, ctx: CommandContext): Promise<TrimOutcome> {
  if (!ctx.isInteractive) {
    warning("The trim command needs an interactive terminal. Use `csv-trim apply` in scripts.");
    return { status: "not-interactive" };
  }

  const dir = resolve(ctx.cwd, options.dir ?? ".");
  const files = findCsvFiles(dir);

  if (files.length === 0) {
    warning(`No CSV files found in ${dir}`);
    return { status: "no-files" };
  }

  p.intro(pc.inverse(" csv-trim "));

  const file = await p.select({
    message: "Select a CSV file to trim",
    options: files.map((name) => ({ value: name, label: name })),
  });
  if (p.isCancel(file) || typeof file !== "string") {
    p.cancel(CANCELLED_MESSAGE);
    return { status: "cancelled" };
  }

  const inputPath = join(dir, file);
  const table = readCsvFile(inputPath, ctx.config.delimiter);
  logger.debug({ inputPath, rows: table.rowCount, columns: table.columnCount }, "Loaded CSV");
  showPreview(
    "Original data (first row treated as data):",
    formatPreview(table, ctx.config.previewRows),
    describeShape(table)
  );

  const store = ProfileStore.load(ctx.config.profilesFile);
  const profileName = await chooseProfile(store);
  if (!profileName) {
    p.cancel(CANCELLED_MESSAGE);
    return { status: "cancelled" };
  }

  const stored = store.get(profileName) ?? {};
  const trimmed = applyProfile(table, store.getProfile(profileName) ?? {});
  showPreview(
    `Data after applying ${profileName}:`,
    formatPreview(trimmed, ctx.config.previewRows),
    describeShape(trimmed)
  );

  const save = await p.confirm({ message: "Save changes to a new CSV file?" });
  if (p.isCancel(save)) {
    p.cancel(CANCELLED_MESSAGE);
    return { status: "cancelled" };
  }
  if (!save) {
    p.outro("No changes saved.");
    return { status: "discarded", profileName };
  }

  const outputPath = outputPathFor(inputPath, ctx.config.outputPrefix);
  writeCsvFile(outputPath, trimmed, {
    useFirstRowAsHeader: stored.use_first_row_as_header ?? false,
    delimiter: ctx.config.delimiter,
  });
  p.outro(`Changes saved to ${outputPath}`);

  return { status: "saved", profileName, outputPath };
}

/**
 * Configure the trim command
 */
export function configureTrimCommand(program: Command): void {
  program
    .command("trim", { isDefault: true })
    .description("Interactively trim a CSV file in the current directory")
    .option("-d, --dir <path>", "Directory to look for CSV files in")
    .action(async (options: TrimOptions) => {
      try {
        await trimHandler(options, createCommandContext());
      } catch (err) {
        error(formatError(err));
        process.exit(EXIT_FAILURE);
      }
    });
}
