/**
 * Individual trimming steps
 *
 * Each step is a pure function from a table and its own configuration to a
 * new table.
 */

import { formatDateTime, parseDateTime } from "../datetime";
import { ConfigurationError, OutOfRangeError, ParseError } from "../errors";
import type { ColumnSelector } from "../profile/types";
import { type CellValue, type Table, cellText, isMissing } from "../table";

/**
 * Drop rows in which every cell is missing
 */
export function removeBlankRows(table: Table): Table {
  return table.filterRows((row) => !row.every(isMissing));
}

/**
 * Drop rows whose first cell starts with any of the prefixes
 *
 * A missing first cell never matches.
 *
 * @throws ConfigurationError when the table has no columns
 */
export function trimPrefixes(table: Table, prefixes: readonly string[]): Table {
  if (prefixes.length === 0) return table;
  if (table.columnCount === 0) {
    throw new ConfigurationError("Prefix trimming was requested but there is no column to trim on");
  }

  return table.filterRows((row) => {
    const first = row[0] ?? null;
    if (isMissing(first)) return true;
    const text = cellText(first);
    return !prefixes.some((prefix) => text.startsWith(prefix));
  });
}

/**
 * Resolve a selector against the table's current columns
 *
 * @returns the zero-based position, or -1 when nothing matches
 */
export function resolveColumn(table: Table, selector: ColumnSelector): number {
  if (selector.kind === "index") {
    return selector.index >= 0 && selector.index < table.columnCount ? selector.index : -1;
  }
  return table.columnIndexOf(selector.label);
}

/**
 * Remove the selected column; an unresolvable selector leaves the table as is
 */
export function deleteColumn(table: Table, selector: ColumnSelector): Table {
  const index = resolveColumn(table, selector);
  return index === -1 ? table : table.dropColumn(index);
}

/**
 * Rewrite a column as `YYYY-MM-DD HH:MM:SS`
 *
 * Missing and blank cells stay missing.
 *
 * @throws OutOfRangeError when the column does not exist
 * @throws ParseError for the first value that is not a date-time
 */
export function formatDatetimeColumn(table: Table, index: number): Table {
  if (!Number.isInteger(index) || index < 0 || index >= table.columnCount) {
    throw new OutOfRangeError(index, table.columnCount);
  }

  return table.mapColumn(index, (value: CellValue, rowIndex) => {
    if (isMissing(value)) return null;
    const raw = cellText(value);
    if (!raw.trim()) return null;

    const parts = parseDateTime(raw);
    if (!parts) {
      throw new ParseError(rowIndex, raw, index);
    }
    return formatDateTime(parts);
  });
}
