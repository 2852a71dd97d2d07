/**
 * Error handler
 *
 * Maps typed errors to the JSON error envelope and logs every failure with
 * request context. 500 responses never carry the original message.
 */

import { createLogger } from "@vision-assistant/shared/logger";
import type { Context } from "hono";
import type { Env } from "../index.js";
import { getStatusCode, mapErrorToResponse } from "../shared/controller/errors/http-error-mapper.js";

const logger = createLogger("server:error-handler");

/**
 * Use as app.onError(errorHandler)
 */
export function errorHandler(err: unknown, c: Context<Env>): Response {
  const requestId = c.get("requestId");
  const context = {
    module: "error-handler",
    requestId,
    path: c.req.path,
    method: c.req.method,
  };

  if (err instanceof Error) {
    logger.error("Request failed", err, context);
  } else {
    logger.error("Request failed", undefined, { ...context, error: String(err) });
  }

  return c.json(mapErrorToResponse(err, requestId), getStatusCode(err));
}
