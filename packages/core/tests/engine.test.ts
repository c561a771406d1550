/**
 * Tests for the profile engine and its individual steps.
 */

import { describe, expect, test } from "vitest";
import { parseCsv } from "../src/csv";
import {
  applyProfile,
  deleteColumn,
  formatDatetimeColumn,
  removeBlankRows,
  resolveColumn,
  trimPrefixes,
} from "../src/engine";
import { ConfigurationError, OutOfRangeError, ParseError } from "../src/errors";
import { parseColumnSelector } from "../src/profile/selector";
import type { Profile } from "../src/profile/types";
import { Table } from "../src/table";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

describe("removeBlankRows", () => {
  test("drops rows whose cells are all missing", () => {
    const table = Table.fromRows([
      ["A", 1],
      [null, null],
      ["B", 2],
    ]);
    expect(removeBlankRows(table).toArray()).toEqual([
      ["A", 1],
      ["B", 2],
    ]);
  });

  test("keeps rows that only hold empty strings", () => {
    const table = Table.fromRows([
      ["", null],
      [null, null],
    ]);
    expect(removeBlankRows(table).toArray()).toEqual([["", null]]);
  });

  test("keeps rows with a single non-missing cell in their relative order", () => {
    const table = Table.fromRows([
      [null, 0],
      [null, null],
      ["x", null],
      [null, null],
      [null, "y"],
    ]);
    expect(removeBlankRows(table).toArray()).toEqual([
      [null, 0],
      ["x", null],
      [null, "y"],
    ]);
  });
});

describe("trimPrefixes", () => {
  test("drops rows whose first cell starts with a prefix", () => {
    const table = Table.fromRows([
      ["SKIP-1", "x"],
      ["KEEP", "y"],
    ]);
    expect(trimPrefixes(table, ["SKIP"]).toArray()).toEqual([["KEEP", "y"]]);
  });

  test("matches any prefix in the list", () => {
    const table = Table.fromRows([["#note"], ["//comment"], ["data"], ["Total: 4"]]);
    expect(trimPrefixes(table, ["#", "//", "Total"]).toArray()).toEqual([["data"]]);
  });

  test("never trims a row whose first cell is missing", () => {
    const table = Table.fromRows([
      [null, "kept"],
      ["", "dropped"],
    ]);
    expect(trimPrefixes(table, [""]).toArray()).toEqual([[null, "kept"]]);
  });

  test("compares numbers through their decimal text", () => {
    const table = Table.fromRows([[1999], [2023], ["2024-01-01"]]);
    expect(trimPrefixes(table, ["20"]).toArray()).toEqual([[1999]]);
  });

  test("only inspects the first column", () => {
    const table = Table.fromRows([["keep", "SKIP"]]);
    expect(trimPrefixes(table, ["SKIP"]).toArray()).toEqual([["keep", "SKIP"]]);
  });

  test("is case sensitive", () => {
    const table = Table.fromRows([["skip-me"]]);
    expect(trimPrefixes(table, ["SKIP"]).rowCount).toBe(1);
  });

  test("an empty prefix list is a no-op", () => {
    const table = Table.fromRows([["a"]]);
    expect(trimPrefixes(table, [])).toBe(table);
  });

  test("fails with ConfigurationError on a zero-column table", () => {
    expect(() => trimPrefixes(Table.empty(), ["x"])).toThrow(ConfigurationError);
    expect(() => trimPrefixes(Table.empty(), ["x"])).toThrow("no column to trim on");
  });
});

describe("deleteColumn", () => {
  const table = Table.fromRows([[1, "Ann", 30]]);

  test("treats numeric selectors as 1-based", () => {
    const selector = parseColumnSelector("2");
    expect(selector).toEqual({ kind: "index", index: 1 });
    if (!selector) return;
    expect(deleteColumn(table, selector).toArray()).toEqual([[1, 30]]);
  });

  test("skips an index past the last column", () => {
    expect(deleteColumn(table, { kind: "index", index: 3 })).toBe(table);
  });

  test("skips zero and negative positions", () => {
    expect(resolveColumn(table, { kind: "index", index: -1 })).toBe(-1);
    expect(deleteColumn(table, { kind: "index", index: -2 })).toBe(table);
  });

  test("matches labels exactly", () => {
    const labelled = Table.fromRows([[1, "Ann", 30]], { labels: ["id", "name", "age"] });
    expect(deleteColumn(labelled, { kind: "label", label: "name" }).toArray()).toEqual([[1, 30]]);
    expect(deleteColumn(labelled, { kind: "label", label: "Name" })).toBe(labelled);
  });

  test("skips labels on a table without labels", () => {
    expect(deleteColumn(table, { kind: "label", label: "name" })).toBe(table);
  });
});

describe("formatDatetimeColumn", () => {
  test("rewrites every value in the column", () => {
    const table = Table.fromRows([
      ["a", "2023-1-5 9:0:0"],
      ["b", "Jan 6, 2023"],
    ]);
    expect(formatDatetimeColumn(table, 1).toArray()).toEqual([
      ["a", "2023-01-05 09:00:00"],
      ["b", "2023-01-06 00:00:00"],
    ]);
  });

  test("keeps missing and blank cells missing", () => {
    const table = Table.fromRows([[null], ["  "], ["2023-01-05"]]);
    expect(formatDatetimeColumn(table, 0).toArray()).toEqual([
      [null],
      [null],
      ["2023-01-05 00:00:00"],
    ]);
  });

  test("parses numbers through their decimal text", () => {
    const table = Table.fromRows([[20230105]]);
    expect(formatDatetimeColumn(table, 0).toArray()).toEqual([["2023-01-05 00:00:00"]]);
  });

  test("fails with OutOfRangeError past the last column", () => {
    const error = captureError(() => formatDatetimeColumn(Table.fromRows([["x"]]), 1));
    expect(error).toBeInstanceOf(OutOfRangeError);
    expect(error).toMatchObject({ index: 1, columnCount: 1 });
  });

  test("fails with ParseError naming the row and raw value", () => {
    const table = Table.fromRows([["2023-01-05"], ["soon"], ["later"]]);
    const error = captureError(() => formatDatetimeColumn(table, 0));
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ rowIndex: 1, rawValue: "soon", columnIndex: 0, code: "PARSE_ERROR" });
  });
});

describe("applyProfile", () => {
  test("removes blank rows parsed from empty CSV fields", () => {
    const table = parseCsv("A,1\n,\nB,2\n");
    expect(applyProfile(table, { removeBlankRows: true }).toArray()).toEqual([
      ["A", 1],
      ["B", 2],
    ]);
  });

  test("trims by prefix", () => {
    const table = Table.fromRows([
      ["SKIP-1", "x"],
      ["KEEP", "y"],
    ]);
    expect(applyProfile(table, { trimPrefixes: ["SKIP"] }).toArray()).toEqual([["KEEP", "y"]]);
  });

  test("deletes the second column by 1-based index", () => {
    const table = Table.fromRows([[1, "Ann", 30]]);
    const profile: Profile = { deleteColumn: { kind: "index", index: 1 } };
    expect(applyProfile(table, profile).toArray()).toEqual([[1, 30]]);
  });

  test("formats column 0", () => {
    const table = Table.fromRows([["2023-1-5 9:0:0"]]);
    expect(applyProfile(table, { formatDatetime: 0 }).toArray()).toEqual([["2023-01-05 09:00:00"]]);
  });

  test("an empty profile returns the same rows", () => {
    const table = Table.fromRows([["a", null]]);
    expect(applyProfile(table, {}).toArray()).toEqual([["a", null]]);
  });

  test("flags set to false skip their step", () => {
    const table = Table.fromRows([[null], ["x"]]);
    expect(applyProfile(table, { removeBlankRows: false, trimPrefixes: [] }).rowCount).toBe(2);
  });

  test("runs steps against the post-filtering table", () => {
    const table = Table.fromRows([
      ["# exported", null, null],
      [null, null, null],
      ["id", "when", "note"],
      ["1", "2023-1-5", "first"],
      ["2", "2023-2-6 14:3:0", "second"],
    ]);
    const profile: Profile = {
      removeBlankRows: true,
      trimPrefixes: ["#"],
      deleteColumn: { kind: "index", index: 0 },
      formatDatetime: 0,
    };

    const error = captureError(() => applyProfile(table, profile));
    // After deleting "id", column 0 holds the header text "when"
    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ rowIndex: 0, rawValue: "when" });
  });

  test("runs every step in order", () => {
    const table = Table.fromRows([
      ["# exported", null, null],
      [null, null, null],
      ["1", "2023-1-5", "first"],
      ["2", "2023-2-6 14:3:0", "second"],
    ]);
    const profile: Profile = {
      removeBlankRows: true,
      trimPrefixes: ["#"],
      deleteColumn: { kind: "index", index: 0 },
      formatDatetime: 0,
    };

    expect(applyProfile(table, profile).toArray()).toEqual([
      ["2023-01-05 00:00:00", "first"],
      ["2023-02-06 14:03:00", "second"],
    ]);
  });

  test("format_datetime out of range fails regardless of other fields", () => {
    const table = Table.fromRows([["a", "b"]]);
    const profiles: Profile[] = [
      { formatDatetime: 2 },
      { formatDatetime: 2, removeBlankRows: true, trimPrefixes: ["zzz"] },
      { formatDatetime: 1, deleteColumn: { kind: "index", index: 0 } },
    ];
    for (const profile of profiles) {
      expect(() => applyProfile(table, profile)).toThrow(OutOfRangeError);
    }
  });

  test("a numeric delete_column past the last column leaves the table unchanged", () => {
    const table = Table.fromRows([
      ["a", "b"],
      ["c", "d"],
    ]);
    const result = applyProfile(table, { deleteColumn: { kind: "index", index: 4 } });
    expect(result.toArray()).toEqual(table.toArray());
    expect(result.columnCount).toBe(2);
  });

  test("prefix trimming on a zero-column table fails", () => {
    expect(() => applyProfile(Table.empty(), { trimPrefixes: ["x"] })).toThrow(ConfigurationError);
  });

  test("is deterministic and leaves the input untouched", () => {
    const table = Table.fromRows([
      ["x", "2023-01-05"],
      [null, null],
      ["y", "2023-01-06"],
    ]);
    const snapshot = table.toArray();
    const profile: Profile = { removeBlankRows: true, formatDatetime: 1 };

    const first = applyProfile(table, profile).toArray();
    const second = applyProfile(table, profile).toArray();

    expect(first).toEqual(second);
    expect(table.toArray()).toEqual(snapshot);
  });
});
