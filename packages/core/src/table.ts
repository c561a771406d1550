/**
 * In-memory rectangular table
 *
 * Rows are data by default; column labels only exist once a row has been
 * promoted to the header. Every operation returns a new Table and leaves the
 * receiver untouched.
 */

import { OutOfRangeError } from "./errors";

/** `null` is the missing value; it is distinct from the empty string */
export type CellValue = string | number | null;

export type Row = readonly CellValue[];

export interface TableOptions {
  /** Column labels, one per column */
  labels?: readonly string[] | undefined;
}

/**
 * True when the cell holds the missing value
 */
export function isMissing(value: CellValue): value is null {
  return value === null;
}

/**
 * Text of a cell as used for labels and prefix matching
 */
export function cellText(value: CellValue): string {
  if (value === null) return "";
  return typeof value === "number" ? String(value) : value;
}

export class Table {
  private constructor(
    private readonly data: readonly Row[],
    readonly columnCount: number,
    readonly labels: readonly string[] | undefined
  ) {}

  /**
   * Build a table from raw rows, padding short rows with missing cells
   *
   * When labels are given they fix the column count; rows longer than the
   * labels are rejected.
   */
  static fromRows(rows: readonly Row[], options: TableOptions = {}): Table {
    const widest = rows.reduce((max, row) => Math.max(max, row.length), 0);
    const columnCount = options.labels ? options.labels.length : widest;

    if (widest > columnCount) {
      throw new RangeError(
        `Row has ${widest} cells but only ${columnCount} column labels were given`
      );
    }

    const normalized = rows.map((row) =>
      row.length === columnCount
        ? [...row]
        : [...row, ...new Array<CellValue>(columnCount - row.length).fill(null)]
    );

    return new Table(normalized, columnCount, options.labels ? [...options.labels] : undefined);
  }

  static empty(): Table {
    return new Table([], 0, undefined);
  }

  get rowCount(): number {
    return this.data.length;
  }

  get rows(): readonly Row[] {
    return this.data;
  }

  row(index: number): Row | undefined {
    return this.data[index];
  }

  /**
   * Keep rows for which the predicate holds, in their original order
   */
  filterRows(predicate: (row: Row, index: number) => boolean): Table {
    return new Table(this.data.filter(predicate), this.columnCount, this.labels);
  }

  /**
   * Cells at a column position across all rows
   */
  columnValues(index: number): CellValue[] {
    this.assertColumn(index);
    return this.data.map((row) => row[index] ?? null);
  }

  /**
   * Remove a column; later positions shift down by one
   */
  dropColumn(index: number): Table {
    this.assertColumn(index);
    const rows = this.data.map((row) => row.filter((_, column) => column !== index));
    const labels = this.labels?.filter((_, column) => column !== index);
    return new Table(rows, this.columnCount - 1, labels);
  }

  /**
   * Replace every cell of one column with the mapper's result
   */
  mapColumn(index: number, mapper: (value: CellValue, rowIndex: number) => CellValue): Table {
    this.assertColumn(index);
    const rows = this.data.map((row, rowIndex) =>
      row.map((value, column) => (column === index ? mapper(value, rowIndex) : value))
    );
    return new Table(rows, this.columnCount, this.labels);
  }

  /**
   * Position of the column carrying an exact label, or -1
   */
  columnIndexOf(label: string): number {
    return this.labels ? this.labels.indexOf(label) : -1;
  }

  /**
   * Turn the first row into column labels and drop it from the data
   */
  promoteFirstRowToHeader(): Table {
    const [first, ...rest] = this.data;
    if (!first) return this;
    return new Table(rest, this.columnCount, first.map(cellText));
  }

  toArray(): CellValue[][] {
    return this.data.map((row) => [...row]);
  }

  private assertColumn(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.columnCount) {
      throw new OutOfRangeError(index, this.columnCount);
    }
  }
}
