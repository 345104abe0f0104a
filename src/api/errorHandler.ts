/**
 * Global error boundary for the HTTP layer. Service code returns Results;
 * anything that still throws ends up here.
 */
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";

import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Logs the failure with request context and answers `{ error, requestId }`.
 * HTTPExceptions keep their status; everything else is a 500.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  if (err instanceof HTTPException) {
    log.warn(
      { requestId, status: err.status, path: c.req.path, error: err.message },
      "Request rejected",
    );
    return c.json({ error: err.message, requestId }, err.status);
  }

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  const message =
    config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json({ error: message, requestId }, 500);
};
