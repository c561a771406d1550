/**
 * Profile validation using Zod
 *
 * Converts between the stored (snake_case) shape and the engine's Profile.
 * Unknown fields are dropped and absent or null fields skip their step.
 */

import { z } from "zod/v4";
import { ConfigurationError } from "../errors";
import { formatColumnSelector, parseColumnSelector } from "./selector";
import type { Profile, ProfileCollection, StoredProfile } from "./types";

const StoredProfileSchema = z.object({
  remove_blank_rows: z.boolean().nullish(),
  trim_prefixes: z.array(z.string()).nullish(),
  delete_column: z
    .union([z.string(), z.number().int()])
    .nullish()
    .transform((value) => (typeof value === "number" ? String(value) : value)),
  format_datetime: z
    .number()
    .int("format_datetime must be an integer")
    .min(0, "format_datetime must be a zero-based column index")
    .nullish(),
  use_first_row_as_header: z.boolean().nullish(),
});

const ProfileCollectionSchema = z.record(z.string(), z.unknown());

/**
 * Convert Zod issues to `path: message` lines
 */
function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path.map(String)].filter(Boolean).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a stored profile and normalise it to its canonical stored form
 *
 * @throws ConfigurationError listing every invalid field
 */
export function validateStoredProfile(input: unknown, name?: string): StoredProfile {
  const result = StoredProfileSchema.safeParse(input);

  if (!result.success) {
    const issues = formatIssues(result.error, name);
    throw new ConfigurationError(
      `Invalid profile${name ? ` "${name}"` : ""}:\n${issues.map((line) => `  - ${line}`).join("\n")}`,
      issues
    );
  }

  const data = result.data;
  const stored: StoredProfile = {};
  if (data.remove_blank_rows != null) stored.remove_blank_rows = data.remove_blank_rows;
  if (data.trim_prefixes != null) stored.trim_prefixes = data.trim_prefixes;
  if (data.delete_column != null) stored.delete_column = data.delete_column;
  if (data.format_datetime != null) stored.format_datetime = data.format_datetime;
  if (data.use_first_row_as_header != null) {
    stored.use_first_row_as_header = data.use_first_row_as_header;
  }
  return stored;
}

/**
 * Build the engine profile from a stored one
 */
export function fromStoredProfile(stored: StoredProfile): Profile {
  const profile: Profile = {};
  if (stored.remove_blank_rows !== undefined) profile.removeBlankRows = stored.remove_blank_rows;
  if (stored.trim_prefixes !== undefined) profile.trimPrefixes = [...stored.trim_prefixes];
  if (stored.delete_column !== undefined) {
    profile.deleteColumn = parseColumnSelector(stored.delete_column);
  }
  if (stored.format_datetime !== undefined) profile.formatDatetime = stored.format_datetime;
  if (stored.use_first_row_as_header !== undefined) {
    profile.useFirstRowAsHeader = stored.use_first_row_as_header;
  }
  return profile;
}

/**
 * Validate untrusted input and build the engine profile in one step
 */
export function parseStoredProfile(input: unknown, name?: string): Profile {
  return fromStoredProfile(validateStoredProfile(input, name));
}

/**
 * Stored form of a profile; only present fields are written
 */
export function toStoredProfile(profile: Profile): StoredProfile {
  const stored: StoredProfile = {};
  if (profile.removeBlankRows !== undefined) stored.remove_blank_rows = profile.removeBlankRows;
  if (profile.trimPrefixes !== undefined) stored.trim_prefixes = [...profile.trimPrefixes];
  if (profile.deleteColumn !== undefined) {
    stored.delete_column = formatColumnSelector(profile.deleteColumn);
  }
  if (profile.formatDatetime !== undefined) stored.format_datetime = profile.formatDatetime;
  if (profile.useFirstRowAsHeader !== undefined) {
    stored.use_first_row_as_header = profile.useFirstRowAsHeader;
  }
  return stored;
}

/**
 * Validate a whole profile collection, keeping insertion order
 *
 * @throws ConfigurationError when the input is not an object or any profile is invalid
 */
export function validateProfileCollection(input: unknown): ProfileCollection {
  const result = ProfileCollectionSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError("Profile collection must be an object mapping names to profiles", [
      ...formatIssues(result.error),
    ]);
  }

  const collection: ProfileCollection = {};
  const issues: string[] = [];
  for (const [name, value] of Object.entries(result.data)) {
    try {
      collection[name] = validateStoredProfile(value, name);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      issues.push(...error.issues);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(
      `Invalid profile collection:\n${issues.map((line) => `  - ${line}`).join("\n")}`,
      issues
    );
  }
  return collection;
}
