/**
 * Interactive profile construction
 */

import * as p from "@clack/prompts";
import { ConfigurationError, type StoredProfile } from "@csv-trim/core";

/**
 * Raw answers collected by the prompts
 */
export interface ProfileAnswers {
  removeBlankRows: boolean;
  /** Comma-separated prefixes */
  prefixes: string;
  /** Column label or 1-based position */
  deleteColumn: string;
  /** 1-based position, or empty */
  datetimeColumn: string;
  useFirstRowAsHeader: boolean;
}

const POSITIVE_INTEGER_REGEX = /^\d+$/;

/**
 * Validation message for a 1-based datetime column answer, if invalid
 */
export function validateDatetimeColumn(value: string): string | undefined {
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  if (!POSITIVE_INTEGER_REGEX.test(trimmed) || Number.parseInt(trimmed, 10) < 1) {
    return "Enter a column number starting at 1, or leave blank";
  }
  return undefined;
}

/**
 * Turn prompt answers into a stored profile
 *
 * Only answered steps are recorded; the header choice is always recorded.
 */
export function buildStoredProfile(answers: ProfileAnswers): StoredProfile {
  const profile: StoredProfile = {};

  if (answers.removeBlankRows) {
    profile.remove_blank_rows = true;
  }

  const prefixes = answers.prefixes
    .split(",")
    .map((prefix) => prefix.trim())
    .filter((prefix) => prefix.length > 0);
  if (prefixes.length > 0) {
    profile.trim_prefixes = prefixes;
  }

  if (answers.deleteColumn.trim()) {
    profile.delete_column = answers.deleteColumn;
  }

  if (answers.datetimeColumn.trim()) {
    const problem = validateDatetimeColumn(answers.datetimeColumn);
    if (problem) {
      throw new ConfigurationError(problem);
    }
    profile.format_datetime = Number.parseInt(answers.datetimeColumn.trim(), 10) - 1;
  }

  profile.use_first_row_as_header = answers.useFirstRowAsHeader;
  return profile;
}

/**
 * Ask for each profile option
 *
 * @returns the stored profile, or null when the user cancels
 */
export async function promptForProfile(): Promise<StoredProfile | null> {
  const removeBlankRows = await p.confirm({
    message: "Remove all blank rows?",
    initialValue: false,
  });
  if (p.isCancel(removeBlankRows)) return null;

  const prefixes = await p.text({
    message: "Prefixes to trim rows starting with in the first column (comma separated)",
    placeholder: "leave blank if not needed",
    defaultValue: "",
  });
  if (p.isCancel(prefixes)) return null;

  const deleteColumn = await p.text({
    message: "Column name or number to delete",
    placeholder: "leave blank if not needed",
    defaultValue: "",
  });
  if (p.isCancel(deleteColumn)) return null;

  const datetimeColumn = await p.text({
    message: "Datetime column number to format",
    placeholder: "leave blank if not needed",
    defaultValue: "",
    validate: (value) => validateDatetimeColumn(value ?? ""),
  });
  if (p.isCancel(datetimeColumn)) return null;

  const useFirstRowAsHeader = await p.confirm({
    message: "Use the first row as the header in the saved file?",
    initialValue: false,
  });
  if (p.isCancel(useFirstRowAsHeader)) return null;

  return buildStoredProfile({
    removeBlankRows,
    prefixes,
    deleteColumn,
    datetimeColumn,
    useFirstRowAsHeader,
  });
}
