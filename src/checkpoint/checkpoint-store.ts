// ---------------------------------------------------------------------------
// File-backed checkpoint store.
//
// One progress file and one discovery cache per source:
//   <dir>/<sourceId>.progress.json
//   <dir>/<sourceId>.discovery.json
// Every mutation is written synchronously (temp file + rename) before the
// call returns, so a killed process loses at most the in-flight item.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import lockfile from "proper-lockfile";
import { z } from "zod";
import { CheckpointError, errorMessage } from "../core/errors.js";
import { ImportPhase, type DiscoveryRecord } from "../core/types.js";

// ── Persisted shapes ────────────────────────────────────────────────────────

const LOCK_STALE_MS = 60_000;

export interface CheckpointState {
  sourceId: string;
  phase: ImportPhase;
  totalDiscovered: number;
  completed: string[];
  failed: string[];
  skipped: string[];
  /** Last failure or skip reason per item id. */
  reasons: Record<string, string>;
  lastUpdated: string;
}

const CheckpointStateSchema = z.object({
  sourceId: z.string(),
  phase: z.enum([ImportPhase.DISCOVERY, ImportPhase.IMPORT, ImportPhase.DONE]),
  totalDiscovered: z.number().int().nonnegative(),
  completed: z.array(z.string()),
  failed: z.array(z.string()),
  skipped: z.array(z.string()).default([]),
  reasons: z.record(z.string()).default({}),
  lastUpdated: z.string(),
});

const nullableString = z.string().nullable().optional();
const nullableInt = z.number().int().nullable().optional();

export const DiscoveryRecordSchema = z.object({
  id: z.string().min(1),
  manifestUrl: z.string().optional(),
  label: z.string().optional(),
  sourceUrl: z.string().optional(),
  exclusion: z.string().optional(),
  payload: z.unknown(),
  hints: z
    .object({
      shelfmark: z.string().optional(),
      collection: nullableString,
      dateDisplay: nullableString,
      dateStart: nullableInt,
      dateEnd: nullableInt,
      contents: nullableString,
      provenance: nullableString,
      language: nullableString,
      folios: nullableString,
      thumbnailUrl: nullableString,
      sourceUrl: nullableString,
      imageCount: nullableInt,
    })
    .optional(),
});

const DiscoveryCacheSchema = z.object({
  sourceId: z.string(),
  discoveredAt: z.string(),
  items: z.array(DiscoveryRecordSchema),
});

// ── Store ───────────────────────────────────────────────────────────────────

export interface CheckpointStoreOptions {
  directory: string;
  sourceId: string;
  logger: Logger;
  now?: () => Date;
}

export class CheckpointStore {
  public readonly sourceId: string;
  public readonly progressPath: string;
  public readonly discoveryPath: string;

  private readonly directory: string;
  private readonly lockPath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private phase: ImportPhase = ImportPhase.DISCOVERY;
  private totalDiscovered = 0;
  private completed = new Set<string>();
  private failed = new Set<string>();
  private skipped = new Set<string>();
  private reasons = new Map<string, string>();
  private lastUpdated: string;

  private releaseLock: (() => Promise<void>) | null = null;
  private compromised: Error | null = null;

  constructor(options: CheckpointStoreOptions) {
    this.sourceId = options.sourceId;
    this.directory = path.resolve(options.directory);
    this.progressPath = path.join(this.directory, `${options.sourceId}.progress.json`);
    this.discoveryPath = path.join(this.directory, `${options.sourceId}.discovery.json`);
    this.lockPath = `${this.progressPath}.lock`;
    this.logger = options.logger.child({ module: "checkpoint", sourceId: options.sourceId });
    this.now = options.now ?? (() => new Date());
    this.lastUpdated = this.now().toISOString();
  }

  // ── Reading ─────────────────────────────────────────────────────────────

  /** Read the progress file into memory.  A missing file is a fresh state. */
  load(): CheckpointState {
    const raw = this.readJson(this.progressPath);
    if (raw === undefined) {
      this.clear();
      return this.snapshot();
    }

    const parsed = CheckpointStateSchema.safeParse(raw);
    if (!parsed.success || parsed.data.sourceId !== this.sourceId) {
      throw new CheckpointError(
        this.progressPath,
        `Checkpoint file does not belong to source "${this.sourceId}" or is malformed`,
      );
    }

    const state = parsed.data;
    this.phase = state.phase;
    this.totalDiscovered = state.totalDiscovered;
    this.completed = new Set(state.completed);
    this.failed = new Set(state.failed.filter((id) => !this.completed.has(id)));
    this.skipped = new Set(state.skipped);
    this.reasons = new Map(Object.entries(state.reasons));
    this.lastUpdated = state.lastUpdated;
    return this.snapshot();
  }

  /** The cached discovery list, or `null` when no valid cache exists. */
  loadDiscovery(): DiscoveryRecord[] | null {
    let raw: unknown;
    try {
      raw = this.readJson(this.discoveryPath);
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, "Ignoring unreadable discovery cache");
      return null;
    }
    if (raw === undefined) return null;

    const parsed = DiscoveryCacheSchema.safeParse(raw);
    if (!parsed.success || parsed.data.sourceId !== this.sourceId) {
      this.logger.warn({ path: this.discoveryPath }, "Ignoring malformed discovery cache");
      return null;
    }
    return parsed.data.items;
  }

  snapshot(): CheckpointState {
    return {
      sourceId: this.sourceId,
      phase: this.phase,
      totalDiscovered: this.totalDiscovered,
      completed: [...this.completed],
      failed: [...this.failed],
      skipped: [...this.skipped],
      reasons: Object.fromEntries(this.reasons),
      lastUpdated: this.lastUpdated,
    };
  }

  isSettled(id: string): boolean {
    return this.completed.has(id) || this.failed.has(id) || this.skipped.has(id);
  }

  // ── Mutations ───────────────────────────────────────────────────────────

  /** Write the discovery cache without touching progress. */
  saveDiscovery(items: readonly DiscoveryRecord[]): void {
    this.writeJson(this.discoveryPath, {
      sourceId: this.sourceId,
      discoveredAt: this.now().toISOString(),
      items,
    });
  }

  /** Cache the discovery list and move to the import phase. */
  recordDiscovery(items: readonly DiscoveryRecord[]): void {
    this.saveDiscovery(items);
    this.totalDiscovered = items.length;
    this.phase = ImportPhase.IMPORT;
    this.persist();
  }

  markCompleted(id: string): void {
    this.completed.add(id);
    this.failed.delete(id);
    this.skipped.delete(id);
    this.reasons.delete(id);
    this.persist();
  }

  markFailed(id: string, reason = "error"): void {
    if (this.completed.has(id)) return;
    this.failed.add(id);
    this.skipped.delete(id);
    this.reasons.set(id, reason);
    this.persist();
  }

  markSkipped(id: string, reason: string): void {
    if (this.completed.has(id)) return;
    this.skipped.add(id);
    this.failed.delete(id);
    this.reasons.set(id, reason);
    this.persist();
  }

  markDone(): void {
    this.phase = ImportPhase.DONE;
    this.persist();
  }

  /** Forget all per-item outcomes.  The discovery cache is kept. */
  reset(): void {
    this.clear();
    this.persist();
  }

  // ── Locking ─────────────────────────────────────────────────────────────

  /** Take the per-source lock; fails when another process holds it. */
  async acquireLock(): Promise<void> {
    if (this.releaseLock) return;
    fs.mkdirSync(this.directory, { recursive: true });
    try {
      this.releaseLock = await lockfile.lock(this.progressPath, {
        lockfilePath: this.lockPath,
        realpath: false,
        stale: LOCK_STALE_MS,
        retries: 0,
        onCompromised: (err) => {
          this.compromised = err;
          this.logger.error({ err }, "Checkpoint lock compromised");
        },
      });
    } catch (err) {
      throw new CheckpointError(
        this.lockPath,
        `Another import for "${this.sourceId}" holds the checkpoint lock`,
        { cause: err },
      );
    }
  }

  async release(): Promise<void> {
    const release = this.releaseLock;
    this.releaseLock = null;
    if (release) await release();
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private clear(): void {
    this.phase = ImportPhase.DISCOVERY;
    this.totalDiscovered = 0;
    this.completed = new Set();
    this.failed = new Set();
    this.skipped = new Set();
    this.reasons = new Map();
  }

  private persist(): void {
    if (this.compromised) {
      throw new CheckpointError(this.lockPath, "Checkpoint lock was compromised", {
        cause: this.compromised,
      });
    }
    this.lastUpdated = this.now().toISOString();
    this.writeJson(this.progressPath, this.snapshot());
  }

  private readJson(file: string): unknown {
    let text: string;
    try {
      text = fs.readFileSync(file, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw new CheckpointError(file, `Cannot read ${file}`, { cause: err });
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new CheckpointError(file, `Invalid JSON in ${file}`, { cause: err });
    }
  }

  private writeJson(file: string, value: unknown): void {
    const tmp = `${file}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(this.directory, { recursive: true });
      fs.writeFileSync(tmp, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
      fs.renameSync(tmp, file);
    } catch (err) {
      throw new CheckpointError(file, `Cannot write ${file}`, { cause: err });
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
