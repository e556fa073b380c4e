// ---------------------------------------------------------------------------
// Health check route.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../types.js";

const startedAt = Date.now();

/** `GET /health` -- Liveness probe; never touches the database. */
export function healthRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) =>
    c.json({
      status: "ok",
      uptime: Date.now() - startedAt,
      timestamp: new Date().toISOString(),
    }),
  );

  return app;
}
