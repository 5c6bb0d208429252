import pino from "pino";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;

/**
 * Shared structured logger. Call as `logger.info({ ctx }, "message")`.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { app: "sqlthread" },
});

