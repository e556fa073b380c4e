// ---------------------------------------------------------------------------
// Request-scoped logging middleware for Hono.
// ---------------------------------------------------------------------------

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../api/types.js";

/**
 * Attaches a child logger bound to `requestId`, `method` and `path`;
 * handlers read it with `c.get("logger")`.  Logs one line per completed
 * request.  Must run after the request-id middleware.
 */
export function createRequestLogger(baseLogger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const childLogger = baseLogger.child({
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
    });
    c.set("logger", childLogger);

    const start = Date.now();
    await next();

    childLogger.info({ durationMs: Date.now() - start, status: c.res.status }, "request completed");
  };
}
