// ---------------------------------------------------------------------------
// Integration tests for the read API over the in-memory store.
// ---------------------------------------------------------------------------

import { describe, it, expect, beforeEach } from "vitest";

import { createApp } from "../../../src/api/server.js";
import { StoreUnavailableError } from "../../../src/core/errors.js";
import type { ManuscriptRecord } from "../../../src/core/types.js";
import { createTestLogger } from "../../helpers/fixtures.js";
import { MemoryManuscriptStore } from "../../helpers/memory-store.js";

function manuscript(repositoryId: number, shelfmark: string, extra: Partial<ManuscriptRecord> = {}): ManuscriptRecord {
  return {
    repositoryId,
    shelfmark,
    collection: null,
    dateDisplay: null,
    dateStart: null,
    dateEnd: null,
    contents: null,
    provenance: null,
    language: null,
    folios: null,
    iiifManifestUrl: `https://iiif.example.org/${encodeURIComponent(shelfmark)}/manifest`,
    thumbnailUrl: null,
    sourceUrl: null,
    imageCount: null,
    ...extra,
  };
}

describe("read API", () => {
  let store: MemoryManuscriptStore;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    store = new MemoryManuscriptStore();
    const tl = await store.ensureRepository({
      shortName: "TL",
      name: "Test Library",
      logoUrl: null,
      catalogueUrl: "https://library.example.org/",
    });
    const al = await store.ensureRepository({
      shortName: "AL",
      name: "Another Library",
      logoUrl: null,
      catalogueUrl: null,
    });
    await store.upsertManuscript(manuscript(tl, "MS Add. 1", { collection: "Add" }));
    await store.upsertManuscript(
      manuscript(tl, "MS Add. 2", { collection: "Add", thumbnailUrl: "https://images.example.org/2.jpg" }),
    );
    await store.upsertManuscript(manuscript(al, "MS 3"));
    app = createApp({ reader: store, logger: createTestLogger(), production: false });
  });

  // ── Index and health ──────────────────────────────────────────────────

  it("describes its routes at the root", async () => {
    const res = await app.request("/");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      name: "compilatio",
      routes: ["/health", "/api/repositories", "/api/manuscripts", "/api/featured"],
    });
  });

  it("answers the health check without touching the store", async () => {
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("application/json");
    const body = await res.json();
    expect(body).toHaveProperty("status", "ok");
    expect(body).toHaveProperty("uptime");
    expect(body).toHaveProperty("timestamp");
  });

  it("returns a JSON 404 for unknown paths", async () => {
    const res = await app.request("/api/nothing");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found", type: "not_found" });
  });

  // ── Request ids ───────────────────────────────────────────────────────

  it("echoes a well-formed request id and replaces a malformed one", async () => {
    const kept = await app.request("/health", { headers: { "X-Request-ID": "req-123" } });
    expect(kept.headers.get("X-Request-ID")).toBe("req-123");

    const replaced = await app.request("/health", { headers: { "X-Request-ID": "bad id\n" } });
    const id = replaced.headers.get("X-Request-ID");
    expect(id).not.toBe("bad id\n");
    expect(id).toMatch(/^[0-9a-f-]{36}$/);
  });

  // ── Repositories ──────────────────────────────────────────────────────

  it("lists repositories by name with their counts", async () => {
    const res = await app.request("/api/repositories");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      repositories: [
        { id: 2, shortName: "AL", name: "Another Library", logoUrl: null, catalogueUrl: null, manuscriptCount: 1 },
        {
          id: 1,
          shortName: "TL",
          name: "Test Library",
          logoUrl: null,
          catalogueUrl: "https://library.example.org/",
          manuscriptCount: 2,
        },
      ],
      total: 2,
    });
  });

  it("returns one repository with its collections", async () => {
    const res = await app.request("/api/repositories/1");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      repository: { id: 1, shortName: "TL", manuscriptCount: 2, collections: [{ name: "Add", count: 2 }] },
    });
  });

  it("returns 404 for an unknown repository and 400 for a malformed id", async () => {
    const missing = await app.request("/api/repositories/99");
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Repository not found", type: "not_found" });

    const bad = await app.request("/api/repositories/abc");
    expect(bad.status).toBe(400);
    expect(await bad.json()).toEqual({ error: "Invalid id: abc", type: "validation_error" });
  });

  // ── Manuscripts ───────────────────────────────────────────────────────

  it("pages manuscripts with the default size", async () => {
    const res = await app.request("/api/manuscripts");
    expect(await res.json()).toMatchObject({ total: 3, limit: 50, offset: 0 });
  });

  it("filters and pages manuscripts", async () => {
    const res = await app.request("/api/manuscripts?repository_id=1&collection=Add&limit=1&offset=1");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      total: 2,
      limit: 1,
      offset: 1,
      items: [{ id: 2, shelfmark: "MS Add. 2", repositoryName: "Test Library", repositoryShortName: "TL" }],
    });
  });

  it("clamps an oversized page", async () => {
    const res = await app.request("/api/manuscripts?limit=5000");
    expect(await res.json()).toMatchObject({ limit: 200 });
  });

  it("rejects invalid query parameters", async () => {
    for (const query of ["limit=0", "limit=ten", "offset=-1", "offset=99999999999999999999", "repository_id=x"]) {
      const res = await app.request(`/api/manuscripts?${query}`);
      expect(res.status).toBe(400);
    }
    const res = await app.request("/api/manuscripts?limit=0");
    expect(await res.json()).toEqual({ error: "Invalid query parameter: limit", type: "validation_error" });
  });

  it("returns one manuscript or 404", async () => {
    const found = await app.request("/api/manuscripts/3");
    expect(await found.json()).toMatchObject({
      manuscript: { id: 3, shelfmark: "MS 3", repositoryShortName: "AL" },
    });

    const missing = await app.request("/api/manuscripts/42");
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "Manuscript not found", type: "not_found" });
  });

  it("features a manuscript that has a thumbnail", async () => {
    const res = await app.request("/api/featured");
    expect(await res.json()).toMatchObject({
      manuscript: { id: 2, thumbnailUrl: "https://images.example.org/2.jpg" },
    });
  });

  it("returns 404 when nothing can be featured", async () => {
    const empty = createApp({ reader: new MemoryManuscriptStore(), logger: createTestLogger(), production: false });
    const res = await empty.request("/api/featured");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "No manuscripts available", type: "not_found" });
  });

  // ── Store failures ────────────────────────────────────────────────────

  it("maps an unreachable store to 503", async () => {
    store.listRepositories = async () => {
      throw new StoreUnavailableError("query failed: connect ECONNREFUSED");
    };
    const res = await app.request("/api/repositories");
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: "query failed: connect ECONNREFUSED",
      type: "store_unavailable",
    });
  });

  it("hides internal messages in production", async () => {
    store.getFeatured = async () => {
      throw new Error("relation \"manuscripts\" does not exist");
    };
    const prod = createApp({ reader: store, logger: createTestLogger(), production: true });
    const res = await prod.request("/api/featured");
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Internal server error", type: "internal_error" });
  });
});
