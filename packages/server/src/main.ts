import { createLogger } from "@vision-assistant/shared/logger";
import { ConfigError, loadConfig } from "./config/app-config.js";
import { startServer } from "./index.js";

const logger = createLogger("server");

try {
  await startServer(loadConfig());
} catch (error) {
  if (error instanceof ConfigError) {
    logger.error("Refusing to start", error, { module: "server:lifecycle", problems: error.problems });
  } else {
    logger.error(
      "Server failed to start",
      error instanceof Error ? error : new Error(String(error)),
      { module: "server:lifecycle" }
    );
  }
  process.exitCode = 1;
}
