/**
 * Core logger implementation using Pino
 */

import pino, { type Logger as PinoLogger } from "pino";
import { getDefaultConfig, getPackageLogLevel } from "./config.js";
import { createLogFormatter, prettyTransportOptions } from "./formatters.js";
import type { Logger, LoggerConfig, LoggerContext } from "./types.js";

/**
 * Shared transport instance to prevent multiple exit listeners
 *
 * pino.transport() registers a process exit listener per instance, so every
 * logger in the process writes through the same worker.
 */
let sharedTransport: ReturnType<typeof pino.transport> | null = null;

function getSharedTransport(config: LoggerConfig): ReturnType<typeof pino.transport> {
  if (sharedTransport) {
    return sharedTransport;
  }

  const usePretty = config.prettyPrint && !config.fileOutput;

  sharedTransport = pino.transport({
    targets: [
      usePretty
        ? {
            target: "pino-pretty",
            level: config.level,
            options: prettyTransportOptions(),
          }
        : {
            target: "pino/file",
            level: config.level,
            options: {
              destination: config.filePath || 1, // 1 = stdout
              mkdir: true,
            },
          },
    ],
  });

  return sharedTransport;
}

/**
 * Create a new logger instance
 */
export function createLogger(packageName: string, config?: Partial<LoggerConfig>): Logger {
  const defaults = getDefaultConfig();
  const finalConfig: LoggerConfig = {
    level: config?.level ?? getPackageLogLevel(packageName) ?? defaults.level,
    prettyPrint: config?.prettyPrint ?? defaults.prettyPrint,
    fileOutput: config?.fileOutput ?? defaults.fileOutput,
    filePath: config?.filePath ?? defaults.filePath,
    redact: config?.redact ?? defaults.redact,
  };

  const options = {
    level: finalConfig.level,
    redact: finalConfig.redact,
    formatters: {
      log: createLogFormatter(packageName),
    },
  };

  // Silent loggers never start a transport worker (tests run with LOG_LEVEL=silent)
  const pinoLogger =
    finalConfig.level === "silent" ? pino(options) : pino(options, getSharedTransport(finalConfig));

  return createLoggerInterface(pinoLogger, { package: packageName });
}

/**
 * Create the Logger interface from a Pino instance
 */
function createLoggerInterface(pinoLogger: PinoLogger, baseContext: LoggerContext): Logger {
  return {
    debug(msg: string, context?: Partial<LoggerContext>): void {
      pinoLogger.debug({ ...baseContext, ...context }, msg);
    },

    info(msg: string, context?: Partial<LoggerContext>): void {
      pinoLogger.info({ ...baseContext, ...context }, msg);
    },

    warn(msg: string, context?: Partial<LoggerContext>): void {
      pinoLogger.warn({ ...baseContext, ...context }, msg);
    },

    error(msg: string, err?: Error, context?: Partial<LoggerContext>): void {
      if (err) {
        pinoLogger.error({ ...baseContext, ...context, err: serializeError(err) }, msg);
      } else {
        pinoLogger.error({ ...baseContext, ...context }, msg);
      }
    },

    child(context: Partial<LoggerContext>): Logger {
      return createLoggerInterface(pinoLogger.child(context), { ...baseContext, ...context });
    },
  };
}

/**
 * Serialize Error for JSON logging
 */
export function serializeError(err: Error): Record<string, unknown> {
  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
    cause: err.cause,
  };
}
