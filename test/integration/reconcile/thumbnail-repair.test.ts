// ---------------------------------------------------------------------------
// Integration tests for the thumbnail corrective pass.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { CheckpointStore } from "../../../src/checkpoint/checkpoint-store.js";
import { AdapterConnectionError, AdapterNotFoundError } from "../../../src/core/errors.js";
import type { FetchOutcome, ManuscriptRecord } from "../../../src/core/types.js";
import { repairThumbnails } from "../../../src/reconcile/thumbnail-repair.js";
import { createTestLogger, makeSource, ScriptedAdapter, v2Manifest } from "../../helpers/fixtures.js";
import { MemoryManuscriptStore } from "../../helpers/memory-store.js";

const logger = createTestLogger();
const source = makeSource();

const manifestUrl = (n: number) => `https://iiif.example.org/ms-${n}/manifest`;
const PAGE_ONE = "https://images.example.org/page-1/full/200,/0/default.jpg";
/** Built from the manifest id; the image server answers it with a placeholder. */
const PLACEHOLDER = "https://images.example.org/ms-1/full/200,/0/default.jpg";

function answer(url: string): FetchOutcome {
  if (url === manifestUrl(4)) {
    return { ok: false, error: new AdapterNotFoundError(`HTTP 404 from ${url}`, "test-library", "iiif-collection") };
  }
  const canvases = url === manifestUrl(3) ? 0 : 2;
  return { ok: true, item: { manifestUrl: url, manifest: v2Manifest({ id: url, canvases }) } };
}

function row(repositoryId: number, n: number, thumbnailUrl: string | null): ManuscriptRecord {
  return {
    repositoryId,
    shelfmark: `MS ${n}`,
    collection: null,
    dateDisplay: null,
    dateStart: null,
    dateEnd: null,
    contents: null,
    provenance: null,
    language: null,
    folios: null,
    iiifManifestUrl: manifestUrl(n),
    thumbnailUrl,
    sourceUrl: null,
    imageCount: null,
  };
}

describe("repairThumbnails", () => {
  let dir: string;
  let store: MemoryManuscriptStore;
  let adapter: ScriptedAdapter;

  function checkpoint(): CheckpointStore {
    return new CheckpointStore({ directory: dir, sourceId: "test-library-thumbnails", logger });
  }

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "compilatio-thumbs-"));
    store = new MemoryManuscriptStore();
    adapter = new ScriptedAdapter([], (r) => answer(r.manifestUrl ?? ""));
    const repo = await store.ensureRepository(source.repository);
    await store.upsertManuscript(row(repo, 1, PLACEHOLDER));
    await store.upsertManuscript(row(repo, 2, PAGE_ONE));
    await store.upsertManuscript(row(repo, 3, null));
    await store.upsertManuscript(row(repo, 4, null));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reports what it would change on a dry run and writes nothing", async () => {
    const cp = checkpoint();
    const result = await repairThumbnails({ store, adapter, source, logger, execute: false, checkpoint: cp });

    expect(result).toEqual({
      examined: 4,
      updated: 1,
      unchanged: 1,
      missing: 1,
      failed: 1,
      alreadySettled: 0,
      dryRun: true,
      interrupted: false,
    });
    expect(store.manuscripts[0]?.thumbnailUrl).toBe(PLACEHOLDER);
    expect(fs.existsSync(cp.progressPath)).toBe(false);
    expect(adapter.fetched).toEqual(["MS 1", "MS 2", "MS 3", "MS 4"]);
  });

  it("replaces stale thumbnails and records every row when executed", async () => {
    const cp = checkpoint();
    await repairThumbnails({ store, adapter, source, logger, execute: true, checkpoint: cp });

    expect(store.manuscripts.map((m) => m.thumbnailUrl)).toEqual([PAGE_ONE, PAGE_ONE, null, null]);
    expect(cp.snapshot()).toMatchObject({
      phase: "done",
      totalDiscovered: 4,
      completed: ["1", "2"],
      failed: ["4"],
      skipped: ["3"],
      reasons: { "3": "no_thumbnail", "4": "fetch: HTTP 404 from https://iiif.example.org/ms-4/manifest" },
    });
  });

  it("only visits rows without a thumbnail when asked", async () => {
    const result = await repairThumbnails({ store, adapter, source, logger, execute: false, missingOnly: true });
    expect(result).toMatchObject({ examined: 2, missing: 1, failed: 1 });
    expect(adapter.fetched).toEqual(["MS 3", "MS 4"]);
  });

  it("stops on abort and resumes past the settled rows", async () => {
    const controller = new AbortController();
    const first = new ScriptedAdapter([], (r) => {
      if (r.manifestUrl === manifestUrl(2)) controller.abort();
      return answer(r.manifestUrl ?? "");
    });
    const interrupted = await repairThumbnails({
      store,
      adapter: first,
      source,
      logger,
      execute: true,
      checkpoint: checkpoint(),
      signal: controller.signal,
    });
    expect(interrupted).toMatchObject({ examined: 2, updated: 1, unchanged: 1, interrupted: true });

    const cp = checkpoint();
    const resumed = await repairThumbnails({ store, adapter, source, logger, execute: true, checkpoint: cp, resume: true });

    expect(resumed).toMatchObject({ alreadySettled: 2, examined: 2, missing: 1, failed: 1, interrupted: false });
    expect(adapter.fetched).toEqual(["MS 3", "MS 4"]);
    expect(cp.snapshot().phase).toBe("done");
  });

  it("retries a transient fetch failure", async () => {
    const flaky = new ScriptedAdapter([], (r, call) =>
      r.manifestUrl === manifestUrl(1) && call === 1
        ? { ok: false, error: new AdapterConnectionError("HTTP 503", "test-library", "iiif-collection") }
        : answer(r.manifestUrl ?? ""),
    );
    const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);

    const result = await repairThumbnails({
      store,
      adapter: flaky,
      source,
      logger,
      execute: true,
      limit: 1,
      retry: { maxRetries: 1, baseDelayMs: 10 },
      sleep,
    });

    expect(result).toMatchObject({ examined: 1, updated: 1, failed: 0 });
    expect(flaky.fetched).toEqual(["MS 1", "MS 1"]);
    expect(sleep).toHaveBeenCalledWith(10);
    expect(store.manuscripts[0]?.thumbnailUrl).toBe(PAGE_ONE);
  });

  it("does nothing before the repository exists", async () => {
    const result = await repairThumbnails({
      store: new MemoryManuscriptStore(),
      adapter,
      source,
      logger,
      execute: true,
    });
    expect(result.examined).toBe(0);
    expect(adapter.fetched).toEqual([]);
  });
});
