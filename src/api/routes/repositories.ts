// ---------------------------------------------------------------------------
// Repository listing routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { CatalogueReader } from "../../store/manuscript-store.js";
import type { AppEnv } from "../types.js";
import { parseId } from "./params.js";

export interface RepositoryRouteDeps {
  reader: CatalogueReader;
}

/**
 * - `GET /repositories`      -- Every repository with its manuscript count.
 * - `GET /repositories/:id`  -- One repository with per-collection counts.
 */
export function repositoryRoutes(deps: RepositoryRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", async (c) => {
    const repositories = await deps.reader.listRepositories();
    return c.json({ repositories, total: repositories.length });
  });

  app.get("/:id", async (c) => {
    const id = parseId(c.req.param("id"));
    const repository = await deps.reader.getRepository(id);
    if (!repository) {
      return c.json({ error: "Repository not found", type: "not_found" }, 404);
    }
    return c.json({ repository });
  });

  return app;
}
