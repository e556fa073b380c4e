// ---------------------------------------------------------------------------
// Hono application factory for the read API.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { Logger } from "pino";

import type { CatalogueReader } from "../store/manuscript-store.js";
import { createRequestLogger } from "../logging/context.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { healthRoutes } from "./routes/health.js";
import { featuredRoutes, manuscriptRoutes } from "./routes/manuscripts.js";
import { repositoryRoutes } from "./routes/repositories.js";
import type { AppEnv } from "./types.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  reader: CatalogueReader;
  logger: Logger;
  /** Hide internal error messages from clients. */
  production: boolean;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Middleware stack (applied in order):
 * 1. Request ID (`X-Request-ID`).
 * 2. Request-scoped child logger.
 * 3. Route handlers.
 * 4. Global error handler.
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  app.get("/", (c) =>
    c.json({
      name: "compilatio",
      routes: ["/health", "/api/repositories", "/api/manuscripts", "/api/featured"],
    }),
  );

  app.route("/api/repositories", repositoryRoutes({ reader: deps.reader }));
  app.route("/api/manuscripts", manuscriptRoutes({ reader: deps.reader }));
  app.route("/api/featured", featuredRoutes({ reader: deps.reader }));
  app.route("/health", healthRoutes());

  app.notFound((c) => c.json({ error: "Not found", type: "not_found" }, 404));
  app.onError(createErrorHandler({ production: deps.production, logger: deps.logger }));

  return app;
}
