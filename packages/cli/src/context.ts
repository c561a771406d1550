import { loadConfig } from "./config";
import type { CommandContext } from "./types";

/**
 * Build the context for a command invocation in the current process
 */
export function createCommandContext(cwd: string = process.cwd()): CommandContext {
  return {
    cwd,
    config: loadConfig(cwd),
    isInteractive: (process.stdout.isTTY ?? false) && !process.env.CI,
  };
}
