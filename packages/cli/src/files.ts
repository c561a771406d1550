/**
 * CSV file discovery and I/O
 */

import { readFileSync, readdirSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { type CsvWriteOptions, type Table, parseCsv, stringifyCsv } from "@csv-trim/core";

/**
 * Names of the `.csv` files directly inside a directory, sorted
 */
export function findCsvFiles(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".csv"))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));
}

export function readCsvFile(filePath: string, delimiter?: string): Table {
  return parseCsv(readFileSync(filePath, "utf-8"), { delimiter });
}

export function writeCsvFile(filePath: string, table: Table, options: CsvWriteOptions = {}): void {
  writeFileSync(filePath, stringifyCsv(table, options), "utf-8");
}

/**
 * Output path beside the input: `<dir>/<prefix><name>`
 */
export function outputPathFor(inputPath: string, prefix: string): string {
  return join(dirname(inputPath), `${prefix}${basename(inputPath)}`);
}
