/**
 * Profile engine
 *
 * Applies a profile's steps in a fixed order. Column deletion and datetime
 * formatting address columns of the table as it stands after row filtering.
 */

import logger from "../logger";
import type { Profile } from "../profile/types";
import type { Table } from "../table";
import {
  deleteColumn,
  formatDatetimeColumn,
  removeBlankRows,
  resolveColumn,
  trimPrefixes,
} from "./steps";

export { deleteColumn, formatDatetimeColumn, removeBlankRows, resolveColumn, trimPrefixes };

/**
 * Apply a profile to a table
 *
 * Fails atomically: on error no partially transformed table is returned and
 * the input is never modified.
 */
export function applyProfile(table: Table, profile: Profile): Table {
  let result = table;

  if (profile.removeBlankRows) {
    const before = result.rowCount;
    result = removeBlankRows(result);
    logger.debug({ removed: before - result.rowCount }, "Removed blank rows");
  }

  if (profile.trimPrefixes && profile.trimPrefixes.length > 0) {
    const before = result.rowCount;
    result = trimPrefixes(result, profile.trimPrefixes);
    logger.debug(
      { removed: before - result.rowCount, prefixes: profile.trimPrefixes },
      "Trimmed rows by prefix"
    );
  }

  if (profile.deleteColumn) {
    const index = resolveColumn(result, profile.deleteColumn);
    if (index === -1) {
      logger.debug({ selector: profile.deleteColumn }, "Column to delete not found, skipping");
    } else {
      result = deleteColumn(result, profile.deleteColumn);
      logger.debug({ index }, "Deleted column");
    }
  }

  if (profile.formatDatetime !== undefined) {
    result = formatDatetimeColumn(result, profile.formatDatetime);
    logger.debug({ index: profile.formatDatetime }, "Formatted datetime column");
  }

  return result;
}
