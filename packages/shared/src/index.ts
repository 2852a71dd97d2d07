/**
 * @vision-assistant/shared
 *
 * Shared utilities for vision-assistant packages
 */

export * from "./logger/index.js";
export * from "./shutdown.js";
