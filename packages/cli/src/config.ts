/**
 * CLI configuration
 *
 * Defaults, overridden by an optional `csv-trim.yaml` in the working
 * directory, overridden in turn by environment variables.
 */

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";

export const CONFIG_FILE_NAME = "csv-trim.yaml";

export interface CsvTrimConfig {
  /** Absolute path of the profile store */
  profilesFile: string;
  /** Prepended to the input file name when saving */
  outputPrefix: string;
  /** Rows shown in previews */
  previewRows: number;
  /** Field delimiter for reading and writing */
  delimiter: string;
}

export const DEFAULT_CONFIG = {
  profilesFile: "trim_profiles.json",
  outputPrefix: "trimmed_",
  previewRows: 5,
  delimiter: ",",
} as const satisfies CsvTrimConfig;

const ConfigFileSchema = z.object({
  profiles_file: z.string().min(1, "profiles_file must not be empty").optional(),
  output_prefix: z.string().optional(),
  preview_rows: z.number().int().positive("preview_rows must be a positive integer").optional(),
  delimiter: z.string().length(1, "delimiter must be a single character").optional(),
});

/**
 * Error thrown when the configuration file cannot be used
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "ConfigLoadError";
  }
}

function readConfigFile(filePath: string): z.infer<typeof ConfigFileSchema> {
  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to read ${filePath}: ${(error as Error).message}`,
      filePath,
      error as Error
    );
  }

  // An empty file is an empty config
  if (parsed === undefined || parsed === null) return {};

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigLoadError(`Invalid configuration in ${filePath}:\n${details}`, filePath);
  }
  return result.data;
}

/**
 * Load configuration for a working directory
 *
 * @param cwd - Directory holding `csv-trim.yaml`; relative paths resolve against it
 * @param env - Environment consulted for overrides
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): CsvTrimConfig {
  const filePath = join(cwd, CONFIG_FILE_NAME);
  const fileConfig = existsSync(filePath) ? readConfigFile(filePath) : {};

  const profilesFile =
    env.CSV_TRIM_PROFILES_FILE || fileConfig.profiles_file || DEFAULT_CONFIG.profilesFile;

  return {
    profilesFile: resolve(cwd, profilesFile),
    outputPrefix: env.CSV_TRIM_OUTPUT_PREFIX ?? fileConfig.output_prefix ?? DEFAULT_CONFIG.outputPrefix,
    previewRows: fileConfig.preview_rows ?? DEFAULT_CONFIG.previewRows,
    delimiter: fileConfig.delimiter ?? DEFAULT_CONFIG.delimiter,
  };
}
