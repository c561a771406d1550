import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";
import { loadConfig } from "../src/config";
import type { CommandContext } from "../src/types";

export interface TestDir {
  path: string;
  cleanup: () => void;
}

export function createTestDir(): TestDir {
  const path = mkdtempSync(join(tmpdir(), "csv-trim-test-"));
  return {
    path,
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
}

export function createTestContext(cwd: string): CommandContext {
  return { cwd, config: loadConfig(cwd, {}), isInteractive: true };
}

/**
 * Silence console output, returning the spies so tests can inspect it
 */
export function captureConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}
