import pino from "pino";
import type { Logger } from "pino";

const LOG_LEVEL = process.env["LOG_LEVEL"] ?? "info";

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: "genefreq",
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

export const logger = pino(baseConfig);

// Child loggers per component
export const createLogger = (component: string, context?: Record<string, unknown>): Logger => {
  return logger.child({ component, ...context });
};

// Structured error logging; callers still rethrow
export const logError = (
  log: Logger,
  error: unknown,
  context?: Record<string, unknown>
): void => {
  if (error instanceof Error) {
    log.error({ err: error, ...context }, error.message);
  } else {
    log.error({ error: String(error), ...context }, "Unknown error occurred");
  }
};

export type { Logger };
