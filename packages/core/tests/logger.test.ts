import { afterEach, describe, expect, test, vi } from "vitest";
import logger from "../src/logger";

describe("logger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  test("stays silent under test", () => {
    vi.stubEnv("VERBOSE", "true");
    const debug = vi.spyOn(logger.pino, "debug").mockImplementation(() => {});

    logger.debug("hidden");

    expect(debug).not.toHaveBeenCalled();
  });

  test("debug needs DEBUG or VERBOSE", () => {
    vi.stubEnv("NODE_ENV", "development");
    vi.stubEnv("CI", "false");
    vi.stubEnv("CSV_TRIM_SILENT", "false");
    vi.stubEnv("DEBUG", "");
    vi.stubEnv("VERBOSE", "");
    const debug = vi.spyOn(logger.pino, "debug").mockImplementation(() => {});

    logger.debug("quiet");
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv("VERBOSE", "true");
    logger.debug({ step: "trim" }, "shown");
    expect(debug).toHaveBeenCalledWith({ step: "trim" }, "shown");
  });
});
