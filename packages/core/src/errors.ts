/**
 * Error types raised by the table model and the profile engine.
 *
 * Every failure surfaces to the caller unchanged; the engine never catches
 * or downgrades these.
 */

export type CsvTrimErrorCode = "OUT_OF_RANGE" | "CONFIGURATION_ERROR" | "PARSE_ERROR";

/**
 * Base class for csv-trim errors
 */
export class CsvTrimError extends Error {
  constructor(
    message: string,
    public readonly code: CsvTrimErrorCode
  ) {
    super(message);
    this.name = "CsvTrimError";
  }
}

/**
 * A positional column reference does not exist in the current table
 */
export class OutOfRangeError extends CsvTrimError {
  constructor(
    public readonly index: number,
    public readonly columnCount: number
  ) {
    super(
      `Column index ${index} is out of range (table has ${columnCount} column${columnCount === 1 ? "" : "s"})`,
      "OUT_OF_RANGE"
    );
    this.name = "OutOfRangeError";
  }
}

/**
 * A requested step cannot run against the table's shape, or a profile is malformed
 */
export class ConfigurationError extends CsvTrimError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

/**
 * A cell selected for datetime formatting is not a recognisable date-time
 */
export class ParseError extends CsvTrimError {
  constructor(
    public readonly rowIndex: number,
    public readonly rawValue: string,
    public readonly columnIndex: number
  ) {
    super(
      `Cannot parse "${rawValue}" as a date-time (row ${rowIndex}, column ${columnIndex})`,
      "PARSE_ERROR"
    );
    this.name = "ParseError";
  }
}
