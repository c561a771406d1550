/**
 * CSV codec for tables
 *
 * Reading treats every record as data. Writing optionally promotes the first
 * row to the header line.
 */

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { type CellValue, Table } from "./table";

export interface CsvReadOptions {
  delimiter?: string | undefined;
}

export interface CsvWriteOptions {
  /** Write the first row as the header line and the rest as data */
  useFirstRowAsHeader?: boolean | undefined;
  delimiter?: string | undefined;
}

/**
 * Convert a raw field: empty is missing, canonical decimal text is a number
 */
export function toCell(field: string): CellValue {
  if (field === "") return null;
  const numeric = Number(field);
  if (Number.isFinite(numeric) && String(numeric) === field) {
    return numeric;
  }
  return field;
}

/**
 * Parse CSV text into a table without assuming a header row
 */
export function parseCsv(text: string, options: CsvReadOptions = {}): Table {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      delimiter: options.delimiter ?? ",",
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    throw new Error(`CSV parsing failed: ${(error as Error).message}`);
  }

  if (!isRecordList(parsed)) {
    throw new Error("CSV parsing failed: parser did not return a list of records");
  }
  return Table.fromRows(parsed.map((record) => record.map(toCell)));
}

function isRecordList(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (record) => Array.isArray(record) && record.every((field) => typeof field === "string")
    )
  );
}

/**
 * Serialise a table to CSV text
 */
export function stringifyCsv(table: Table, options: CsvWriteOptions = {}): string {
  let records: CellValue[][];

  if (options.useFirstRowAsHeader) {
    const promoted = table.promoteFirstRowToHeader();
    records = promoted.labels ? [[...promoted.labels], ...promoted.toArray()] : promoted.toArray();
  } else {
    records = table.toArray();
  }

  if (records.length === 0) return "";

  try {
    return stringify(records, {
      delimiter: options.delimiter ?? ",",
    });
  } catch (error) {
    throw new Error(`CSV generation failed: ${(error as Error).message}`);
  }
}
