/**
 * Trimming profile types
 */

/**
 * Column to delete, decided once when the profile is loaded
 */
export type ColumnSelector =
  | { kind: "index"; /** Zero-based position */ index: number }
  | { kind: "label"; label: string };

/**
 * A profile as the engine consumes it; an absent field skips its step
 */
export interface Profile {
  /** Drop rows whose cells are all missing */
  removeBlankRows?: boolean | undefined;
  /** Drop rows whose first cell starts with any of these */
  trimPrefixes?: string[] | undefined;
  /** Column removed after row filtering */
  deleteColumn?: ColumnSelector | undefined;
  /** Zero-based column rewritten as `YYYY-MM-DD HH:MM:SS` */
  formatDatetime?: number | undefined;
  /** Consumed by the CSV writer, not the engine */
  useFirstRowAsHeader?: boolean | undefined;
}

/**
 * On-disk shape of a profile
 */
export interface StoredProfile {
  remove_blank_rows?: boolean;
  trim_prefixes?: string[];
  delete_column?: string;
  format_datetime?: number;
  use_first_row_as_header?: boolean;
}

/**
 * Profiles by name; insertion order is display order
 */
export type ProfileCollection = Record<string, StoredProfile>;
