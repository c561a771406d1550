import pino from "pino";

// Tests, CI and explicit opt-out keep the console clean
const isSilentMode = () =>
  process.env.CI === "true" ||
  process.env.NODE_ENV === "test" ||
  process.env.CSV_TRIM_SILENT === "true";

const logger = pino({
  level: process.env.LOG_LEVEL || (process.env.DEBUG || process.env.VERBOSE ? "debug" : "info"),
  ...(process.env.NODE_ENV !== "test" && {
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        ignore: "pid,hostname",
        translateTime: "SYS:standard",
        destination: 2,
      },
    },
  }),
});

// Silent mode is checked on every call so tests can toggle it
const wrappedLogger = {
  debug: (...args: Parameters<typeof logger.debug>) => {
    if (!isSilentMode() && (process.env.DEBUG || process.env.VERBOSE)) {
      logger.debug(...args);
    }
  },
  pino: logger,
};

export default wrappedLogger;
