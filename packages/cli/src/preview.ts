/**
 * Plain-text table preview
 */

import { type CellValue, type Table, cellText } from "@csv-trim/core";

const MISSING = "null";

function renderCell(value: CellValue): string {
  return value === null ? MISSING : cellText(value);
}

/**
 * Render up to `limit` rows as aligned text lines
 *
 * When the table has more than one row the first is skipped, since it
 * usually holds the header text. Each line starts with the row position; the
 * header line shows the column labels, or positions when there are none.
 */
export function formatPreview(table: Table, limit: number): string[] {
  if (table.rowCount === 0) {
    return ["(no rows)"];
  }

  const start = table.rowCount > 1 ? 1 : 0;
  const rows = table.rows.slice(start, start + limit);

  const headings = table.labels
    ? [...table.labels]
    : Array.from({ length: table.columnCount }, (_, index) => String(index));

  const grid = [
    ["", ...headings],
    ...rows.map((row, offset) => [String(start + offset), ...row.map(renderCell)]),
  ];

  const widths = grid[0]?.map((_, column) =>
    Math.max(...grid.map((line) => (line[column] ?? "").length))
  ) ?? [];

  return grid.map((line) =>
    line
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join("  ")
      .trimEnd()
  );
}

/**
 * One-line shape summary, e.g. `3 rows × 2 columns`
 */
export function describeShape(table: Table): string {
  const rows = `${table.rowCount} row${table.rowCount === 1 ? "" : "s"}`;
  const columns = `${table.columnCount} column${table.columnCount === 1 ? "" : "s"}`;
  return `${rows} × ${columns}`;
}
