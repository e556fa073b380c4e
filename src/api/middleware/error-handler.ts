// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context, ErrorHandler } from "hono";
import type { Logger } from "pino";

import { InvalidRequestError, StoreUnavailableError } from "../../core/errors.js";
import type { AppEnv } from "../types.js";

export interface ErrorHandlerOptions {
  production: boolean;
  logger: Logger;
}

/**
 * Mapping:
 * - `InvalidRequestError`   -> 400 Bad Request
 * - `StoreUnavailableError` -> 503 Service Unavailable
 * - Everything else         -> 500 Internal Server Error
 *
 * SECURITY: in production only validation messages are returned verbatim;
 * they describe the caller's own input.  Everything else is replaced by a
 * generic message so SQL and hostnames never reach the client.
 */
export function createErrorHandler(options: ErrorHandlerOptions): ErrorHandler<AppEnv> {
  return (err: Error, c: Context<AppEnv>): Response => {
    const logger = c.get("logger") ?? options.logger;

    if (err instanceof InvalidRequestError) {
      return c.json({ error: err.message, type: "validation_error" }, 400);
    }

    if (err instanceof StoreUnavailableError) {
      logger.error({ err }, "store unavailable");
      return c.json(
        {
          error: options.production ? "Service temporarily unavailable" : err.message,
          type: "store_unavailable",
        },
        503,
      );
    }

    logger.error({ err }, "unhandled error");
    return c.json(
      { error: options.production ? "Internal server error" : err.message, type: "internal_error" },
      500,
    );
  };
}
