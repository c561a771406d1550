import { CsvTrimError } from "@csv-trim/core";

export const EXIT_FAILURE = 1;

/**
 * A named profile does not exist in the store
 */
export class ProfileNotFoundError extends Error {
  constructor(
    public readonly profileName: string,
    public readonly available: string[]
  ) {
    super(
      available.length > 0
        ? `Profile "${profileName}" not found. Available: ${available.join(", ")}`
        : `Profile "${profileName}" not found. No profiles have been saved yet.`
    );
    this.name = "ProfileNotFoundError";
  }
}

/**
 * Render any thrown value as a single message
 */
export function formatError(err: unknown): string {
  if (err instanceof CsvTrimError) {
    return `[${err.code}] ${err.message}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
