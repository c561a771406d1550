/**
 * @csv-trim/core
 *
 * Table model, trimming profiles and the engine that applies them.
 */

export const VERSION = "0.1.0";

export {
  type CellValue,
  type Row,
  type TableOptions,
  Table,
  cellText,
  isMissing,
} from "./table";

export {
  type CsvTrimErrorCode,
  ConfigurationError,
  CsvTrimError,
  OutOfRangeError,
  ParseError,
} from "./errors";

export type {
  ColumnSelector,
  Profile,
  ProfileCollection,
  StoredProfile,
} from "./profile/types";

export { formatColumnSelector, parseColumnSelector } from "./profile/selector";

export {
  fromStoredProfile,
  parseStoredProfile,
  toStoredProfile,
  validateProfileCollection,
  validateStoredProfile,
} from "./profile/schema";

export {
  applyProfile,
  deleteColumn,
  formatDatetimeColumn,
  removeBlankRows,
  resolveColumn,
  trimPrefixes,
} from "./engine";

export { type DateTimeParts, formatDateTime, parseDateTime } from "./datetime";

export { type CsvReadOptions, type CsvWriteOptions, parseCsv, stringifyCsv, toCell } from "./csv";

export { default as logger } from "./logger";
