/**
 * Centralized Shutdown Manager
 *
 * Registers a single set of process signal handlers and runs cleanup
 * functions in priority order (lower numbers run first).
 */

import { createLogger } from "./logger/index.js";

type CleanupFn = () => Promise<void> | void;

interface CleanupItem {
  name: string;
  fn: CleanupFn;
  priority: number;
}

const logger = createLogger("shared");

export class ShutdownManager {
  private cleanupFns: CleanupItem[] = [];
  private isShuttingDown = false;
  private handlersRegistered = false;

  constructor(private readonly exit: (code: number) => void = code => process.exit(code)) {}

  /**
   * Register a cleanup function to run on shutdown.
   * Registering the same name twice replaces the earlier entry.
   */
  register(name: string, fn: CleanupFn, priority: number = 100): void {
    this.cleanupFns = this.cleanupFns.filter(item => item.name !== name);
    this.cleanupFns.push({ name, fn, priority });
    this.ensureHandlers();
  }

  registeredNames(): string[] {
    return [...this.cleanupFns].sort((a, b) => a.priority - b.priority).map(item => item.name);
  }

  private ensureHandlers(): void {
    if (this.handlersRegistered) return;

    process.once("SIGINT", () => void this.gracefulShutdown());
    process.once("SIGTERM", () => void this.gracefulShutdown());

    this.handlersRegistered = true;
  }

  private async gracefulShutdown(): Promise<void> {
    await this.shutdown();
    this.exit(0);
  }

  /**
   * Run every registered cleanup once; later calls are no-ops.
   * A failing cleanup is logged and does not stop the ones after it.
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    const sorted = [...this.cleanupFns].sort((a, b) => a.priority - b.priority);

    for (const { name, fn } of sorted) {
      try {
        await fn();
      } catch (err) {
        logger.error(
          `Failed to clean up ${name}`,
          err instanceof Error ? err : new Error(String(err)),
          { module: "shutdown" }
        );
      }
    }
  }
}

/**
 * Process-wide shutdown manager instance
 */
export const shutdown = new ShutdownManager();
