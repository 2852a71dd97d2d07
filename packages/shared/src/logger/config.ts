/**
 * Logger configuration for @vision-assistant/shared/logger
 */

import { LOG_LEVELS, type LogLevel, type LoggerConfig } from "./types.js";

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Get default logger configuration from environment variables
 */
export function getDefaultConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const logLevel = env.LOG_LEVEL;
  const filePath = env.LOG_FILE_PATH;
  const fileOutputEnv = (env.LOG_FILE_OUTPUT || "").toLowerCase();
  const fileOutputFromEnv = ["1", "true", "yes", "on"].includes(fileOutputEnv);

  return {
    level: isLogLevel(logLevel) ? logLevel : "info",
    prettyPrint: env.NODE_ENV !== "production",
    // Production always writes to a file or stdout. Development can opt in via LOG_FILE_PATH/LOG_FILE_OUTPUT.
    fileOutput: env.NODE_ENV === "production" || fileOutputFromEnv || Boolean(filePath),
    filePath,
    redact: [
      "req.headers.authorization",
      "req.headers.cookie",
      "apiKey",
      "groqApiKey",
      "token",
      "taggingToken",
      "secret",
    ],
  };
}

/**
 * Get package-specific log level override, e.g. LOG_LEVEL_SERVER=debug
 */
export function getPackageLogLevel(
  packageName: string,
  env: NodeJS.ProcessEnv = process.env
): LogLevel | undefined {
  const level = env[`LOG_LEVEL_${packageName.toUpperCase().replace(/[^A-Z0-9]/g, "_")}`];
  return isLogLevel(level) ? level : undefined;
}
