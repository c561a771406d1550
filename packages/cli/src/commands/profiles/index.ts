/**
 * csv-trim profiles command
 *
 * Inspect and remove saved trimming profiles.
 */

import type { StoredProfile } from "@csv-trim/core";
import type { Command } from "commander";
import { createCommandContext } from "../../context";
import { ProfileStore } from "../../profile-store";
import type { CommandContext } from "../../types";
import {
  EXIT_FAILURE,
  ProfileNotFoundError,
  colors,
  dim,
  error,
  formatError,
  print,
  success,
} from "../../utils";

/**
 * Short human-readable summary of a profile's steps
 */
export function describeProfile(profile: StoredProfile): string {
  const steps: string[] = [];

  if (profile.remove_blank_rows) {
    steps.push("remove blank rows");
  }
  if (profile.trim_prefixes && profile.trim_prefixes.length > 0) {
    steps.push(`trim prefixes ${profile.trim_prefixes.map((prefix) => JSON.stringify(prefix)).join(", ")}`);
  }
  if (profile.delete_column) {
    steps.push(`delete column ${profile.delete_column}`);
  }
  if (profile.format_datetime !== undefined) {
    steps.push(`format datetime in column ${profile.format_datetime + 1}`);
  }
  if (profile.use_first_row_as_header) {
    steps.push("first row as header");
  }

  return steps.length > 0 ? steps.join("; ") : "no steps";
}

function listHandler(ctx: CommandContext): void {
  const store = ProfileStore.load(ctx.config.profilesFile);
  if (store.size === 0) {
    dim(`No profiles saved in ${store.filePath}`);
    return;
  }

  print(
    store.names.map((name, index) => {
      const profile = store.get(name) ?? {};
      return `${index + 1}. ${colors.bold(name)}  ${colors.dim(describeProfile(profile))}`;
    })
  );
}

function showHandler(name: string, ctx: CommandContext): void {
  const store = ProfileStore.load(ctx.config.profilesFile);
  const profile = store.get(name);
  if (!profile) {
    throw new ProfileNotFoundError(name, store.names);
  }
  print([JSON.stringify(profile, null, 2)]);
}

function deleteHandler(name: string, ctx: CommandContext): void {
  const store = ProfileStore.load(ctx.config.profilesFile);
  if (!store.remove(name)) {
    throw new ProfileNotFoundError(name, store.names);
  }
  store.save();
  success(`Deleted profile ${name}`);
}

/**
 * Run a handler with the shared error handling
 */
function run(handler: (ctx: CommandContext) => void): void {
  try {
    handler(createCommandContext());
  } catch (err) {
    error(formatError(err));
    process.exit(EXIT_FAILURE);
  }
}

/**
 * Configure the profiles command
 */
export function configureProfilesCommand(program: Command): void {
  const profiles = program.command("profiles").description("Manage saved trimming profiles");

  profiles
    .command("list")
    .description("List saved profiles in display order")
    .action(() => run(listHandler));

  profiles
    .command("show <name>")
    .description("Print a profile as stored")
    .action((name: string) => run((ctx) => showHandler(name, ctx)));

  profiles
    .command("delete <name>")
    .description("Delete a profile")
    .action((name: string) => run((ctx) => deleteHandler(name, ctx)));
}
