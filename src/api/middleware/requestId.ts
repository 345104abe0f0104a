/**
 * Request ID middleware - generates or propagates request ID for tracing.
 */
import type { MiddlewareHandler } from "hono";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

// Incoming ids end up in logs and response headers
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Reuse a well-formed x-request-id header, otherwise mint a UUID.
 */
export function resolveRequestId(header: string | undefined): string {
  return header !== undefined && REQUEST_ID_PATTERN.test(header)
    ? header
    : crypto.randomUUID();
}

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = resolveRequestId(c.req.header("x-request-id"));

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  log.debug({ requestId, method: c.req.method, path: c.req.path }, "→ Request started");

  const start = Date.now();
  await next();

  log.debug(
    { requestId, path: c.req.path, status: c.res.status, durationMs: Date.now() - start },
    "✓ Request completed",
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
