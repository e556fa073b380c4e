// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types.js";

// SECURITY: a client-supplied id ends up in every log line of the request,
// so only short ids without control characters are accepted.
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Reuses a well-formed incoming `X-Request-ID` or generates one, stores it
 * as `requestId` and echoes it in the response header.
 */
export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const existing = c.req.header("x-request-id");
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing) ? existing : crypto.randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
