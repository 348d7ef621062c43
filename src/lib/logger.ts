import pino from "pino";

import { env } from "@/lib/env";

export type LogAttributes = Record<string, unknown>;

export interface Logger {
  debug(message: string, attributes?: LogAttributes): void;
  info(message: string, attributes?: LogAttributes): void;
  warn(message: string, attributes?: LogAttributes): void;
  error(message: string, attributes?: LogAttributes): void;
}

// stdout carries the receipt, so structured logs go to stderr
const rootLogger = pino(
  {
    level: env.LOG_LEVEL,
    base: {
      service: "scan-pricing",
      env: env.NODE_ENV,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      error: pino.stdSerializers.err,
    },
  },
  pino.destination(2)
);

/**
 * Create a logger bound to a module name.
 *
 * Call shape is message first, attributes second.
 */
export function createLogger(module: string): Logger {
  const moduleLogger = rootLogger.child({ module });

  return {
    debug: (message, attributes = {}) => moduleLogger.debug(attributes, message),
    info: (message, attributes = {}) => moduleLogger.info(attributes, message),
    warn: (message, attributes = {}) => moduleLogger.warn(attributes, message),
    error: (message, attributes = {}) => moduleLogger.error(attributes, message),
  };
}
