/**
 * Pino formatters for @vision-assistant/shared/logger
 */

import type { LoggerContext } from "./types.js";

/**
 * Create the prefix string for log messages
 * Format: [package:module] or [package] if no module
 */
export function createPrefix(context: Pick<LoggerContext, "package" | "module">): string {
  const parts: string[] = [context.package];

  if (context.module) {
    parts.push(context.module);
  }

  return `[${parts.join(":")}]`;
}

/**
 * Pretty transport options. messageFormat stays a string so the options
 * remain clone-safe for pino's worker thread.
 */
export function prettyTransportOptions(): Record<string, unknown> {
  return {
    colorize: true,
    translateTime: "HH:MM:ss",
    ignore: "pid,hostname,prefix",
    messageFormat: "{prefix} {msg}",
    customColors: "debug:blue,info:green,warn:yellow,error:red",
  };
}

/**
 * Adds the prefix and an ISO timestamp to every log record
 */
export function createLogFormatter(packageName: string) {
  return (object: Record<string, unknown>): Record<string, unknown> => {
    const pkg = typeof object.package === "string" ? object.package : packageName;
    const module = typeof object.module === "string" ? object.module : undefined;

    return {
      ...object,
      prefix: createPrefix({ package: pkg, module }),
      time: object.time ?? new Date().toISOString(),
    };
  };
}
