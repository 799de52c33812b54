/**
 * Shared pino logger; each module logs through a cached child tagged with its name.
 */

import { pino, type Logger, type LoggerOptions } from "pino";

const isDevelopment = process.env.NODE_ENV === "development";
const isTest = process.env.NODE_ENV === "test";

const errorSerializer = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    return {
      ...Object.fromEntries(Object.entries(error)),
      type: error.constructor.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { value: error };
};

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
  serializers: {
    err: errorSerializer,
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(isDevelopment
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
};

const rootLogger: Logger = pino(baseOptions);

type ModuleName = "address" | "geocoding" | "http" | "service";

const childLoggers = new Map<ModuleName, Logger>();

/** Cached child logger tagged with the module name. */
export function getLogger(module: ModuleName): Logger {
  let logger = childLoggers.get(module);
  if (!logger) {
    logger = rootLogger.child({ module });
    childLoggers.set(module, logger);
  }
  return logger;
}
