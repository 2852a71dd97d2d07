import { createLogger } from "@vision-assistant/shared/logger";
import type { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { v7 as uuidv7 } from "uuid";
import type { AppConfig } from "../config/app-config.js";
import type { Env } from "../index.js";
import { PayloadTooLargeError } from "../types.js";

const logger = createLogger("server");

export function composeMiddleware(app: Hono<Env>, config: AppConfig): void {
  // Request logging
  app.use("*", async (c, next) => {
    const start = Date.now();
    const requestId = uuidv7();

    c.set("requestId", requestId);
    c.set("startTime", start);

    logger.debug(`${c.req.method} ${c.req.url}`, {
      module: "api",
      requestId,
    });

    await next();

    const duration = Date.now() - start;
    logger.info(`${c.req.method} ${c.req.url} ${c.res.status}`, {
      module: "api",
      requestId,
      duration,
      status: c.res.status,
    });
  });

  // Upload size for the API; the page route renders its own 413
  app.use(
    "/api/*",
    bodyLimit({
      maxSize: config.maxUploadBytes,
      onError: () => {
        throw new PayloadTooLargeError(config.maxUploadBytes);
      },
    })
  );
}
