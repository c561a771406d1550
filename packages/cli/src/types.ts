import type { CsvTrimConfig } from "./config";

/**
 * Options shared by every command
 */
export interface GlobalOptions {
  verbose?: boolean;
}

/**
 * Resolved environment a command handler runs in
 */
export interface CommandContext {
  cwd: string;
  config: CsvTrimConfig;
  isInteractive: boolean;
}
