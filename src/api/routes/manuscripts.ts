// ---------------------------------------------------------------------------
// Manuscript browsing routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { CatalogueReader } from "../../store/manuscript-store.js";
import type { AppEnv } from "../types.js";
import { parseId, parseListQuery } from "./params.js";

export interface ManuscriptRouteDeps {
  reader: CatalogueReader;
}

/**
 * - `GET /manuscripts`      -- Paginated list; `repository_id`, `collection`,
 *                              `limit` (max 200, default 50) and `offset`.
 * - `GET /manuscripts/:id`  -- One manuscript with its repository names.
 */
export function manuscriptRoutes(deps: ManuscriptRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", async (c) => {
    const query = parseListQuery(c.req.query());
    const page = await deps.reader.listManuscripts(query);
    return c.json(page);
  });

  app.get("/:id", async (c) => {
    const id = parseId(c.req.param("id"));
    const manuscript = await deps.reader.getManuscript(id);
    if (!manuscript) {
      return c.json({ error: "Manuscript not found", type: "not_found" }, 404);
    }
    return c.json({ manuscript });
  });

  return app;
}

/** `GET /featured` -- A random manuscript that has a thumbnail. */
export function featuredRoutes(deps: ManuscriptRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", async (c) => {
    const manuscript = await deps.reader.getFeatured();
    if (!manuscript) {
      return c.json({ error: "No manuscripts available", type: "not_found" }, 404);
    }
    return c.json({ manuscript });
  });

  return app;
}
