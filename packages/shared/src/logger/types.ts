/**
 * Logger type definitions for @vision-assistant/shared/logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface LoggerContext {
  package: string; // 'server', 'server:error-handler'
  module?: string; // 'api', 'analysis:orchestrator', 'tagging'
  requestId?: string;
  category?: string; // analysis category of the submission being logged
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  fileOutput: boolean;
  filePath?: string;
  redact?: string[];
}

export interface Logger {
  debug(msg: string, context?: Partial<LoggerContext>): void;
  info(msg: string, context?: Partial<LoggerContext>): void;
  warn(msg: string, context?: Partial<LoggerContext>): void;
  error(msg: string, err?: Error, context?: Partial<LoggerContext>): void;
  child(context: Partial<LoggerContext>): Logger;
}
