// ---------------------------------------------------------------------------
// Import orchestrator: discovery -> import -> done for one source.
//
// Items are processed strictly one at a time in discovery order.  The
// checkpoint is written after the store write for every item, so an
// interrupted run resumes exactly where it stopped.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { DiscoveryRecord, RawItem, SourceAdapter, SourceDefinition } from "../core/types.js";
import { ImportPhase } from "../core/types.js";
import type { CheckpointStore } from "../checkpoint/checkpoint-store.js";
import { DiscoveryError, errorMessage } from "../core/errors.js";
import { normalizeManifest } from "../domain/manifest/normalize-manifest.js";
import { buildCandidate } from "../reconcile/candidate.js";
import { reconcile, SkipReason } from "../reconcile/reconciler.js";
import type { ManuscriptStore } from "../store/manuscript-store.js";
import { isTransientError, withRetry } from "./retry.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface RetryPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
}

/** Everything a run needs, passed explicitly. */
export interface ImportContext {
  source: SourceDefinition;
  adapter: SourceAdapter;
  store: ManuscriptStore;
  checkpoint: CheckpointStore;
  logger: Logger;
  /** Pause between items. */
  delayMs: number;
  retry: RetryPolicy;
  /** Items processed by a `test` run. */
  testModeCap: number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RunOptions {
  /** Write to the store and the checkpoint.  Otherwise a dry run. */
  execute?: boolean;
  /** Continue from the checkpoint instead of starting over. */
  resume?: boolean;
  /** Process only the first few items. */
  test?: boolean;
  /** Process at most this many unsettled items. */
  limit?: number;
  /** Stop after discovery has been cached. */
  discoverOnly?: boolean;
  /** Use the cached discovery list; fail when there is none. */
  skipDiscovery?: boolean;
  /** Log every item at info level. */
  verbose?: boolean;
  signal?: AbortSignal;
}

export interface RunSummary {
  sourceId: string;
  discovered: number;
  processed: number;
  inserted: number;
  updated: number;
  completed: number;
  failed: number;
  skipped: number;
  /** Items left alone because an earlier run settled them. */
  alreadySettled: number;
  /** Inserts whose manifest is already stored under another shelfmark. */
  duplicates: number;
  dryRun: boolean;
  interrupted: boolean;
  phase: ImportPhase;
}

type ItemOutcome =
  | { kind: "written"; action: "insert" | "update"; duplicate: boolean }
  | { kind: "skipped"; reason: string }
  | { kind: "failed"; reason: string }
  | { kind: "interrupted" };

// ── ImportOrchestrator ─────────────────────────────────────────────────────

export class ImportOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly ctx: ImportContext) {
    this.logger = ctx.logger.child({ module: "orchestrator", sourceId: ctx.source.id });
  }

  async run(options: RunOptions = {}): Promise<RunSummary> {
    const execute = options.execute ?? false;
    const { checkpoint, source } = this.ctx;
    const signal = options.signal;

    const summary: RunSummary = {
      sourceId: source.id,
      discovered: 0,
      processed: 0,
      inserted: 0,
      updated: 0,
      completed: 0,
      failed: 0,
      skipped: 0,
      alreadySettled: 0,
      duplicates: 0,
      dryRun: !execute,
      interrupted: false,
      phase: ImportPhase.DISCOVERY,
    };

    // Reading the checkpoint first surfaces a corrupt file before any work.
    const state = checkpoint.load();

    // 1. Discovery
    let items: DiscoveryRecord[] | null = null;
    if (options.resume || options.skipDiscovery) {
      items = checkpoint.loadDiscovery();
      if (items !== null) {
        this.logger.info({ items: items.length }, "Using cached discovery");
      }
    }
    const fromCache = items !== null;
    if (items === null) {
      if (options.skipDiscovery) {
        throw new DiscoveryError(source.id, "No discovery cache found; run discovery first");
      }
      items = await this.discover(signal);
    }
    summary.discovered = items.length;

    if (execute) {
      if (!options.resume) checkpoint.reset();
      // A cache left by a dry run has not been recorded as this run's total.
      const unrecorded =
        state.phase === ImportPhase.DISCOVERY || state.totalDiscovered !== items.length;
      if (!fromCache || !options.resume || unrecorded) checkpoint.recordDiscovery(items);
    } else if (!fromCache) {
      checkpoint.saveDiscovery(items);
    }
    summary.phase = execute ? ImportPhase.IMPORT : ImportPhase.DISCOVERY;

    if (options.discoverOnly) {
      this.logger.info({ discovered: items.length }, "Discovery complete");
      return summary;
    }

    // 2. Repository
    const repositoryId = execute
      ? await this.ctx.store.ensureRepository(source.repository)
      : await this.ctx.store.findRepositoryId(source.repository.shortName);

    // 3. Import
    const pending: DiscoveryRecord[] = [];
    for (const item of items) {
      if (options.resume && checkpoint.isSettled(item.id)) summary.alreadySettled++;
      else pending.push(item);
    }
    const queue = pending.slice(0, this.capFor(options));
    this.logger.info(
      {
        discovered: items.length,
        alreadySettled: summary.alreadySettled,
        toProcess: queue.length,
        dryRun: !execute,
      },
      "Starting import",
    );

    for (const [index, item] of queue.entries()) {
      if (signal?.aborted) {
        summary.interrupted = true;
        break;
      }

      const outcome = await this.processItem(item, repositoryId, execute, signal);
      if (outcome.kind === "interrupted") {
        summary.interrupted = true;
        break;
      }
      summary.processed++;
      this.tally(summary, item, outcome, execute, options.verbose ?? false);

      if (index < queue.length - 1) {
        await this.ctx.sleep(this.ctx.delayMs, signal);
      }
    }

    // 4. Done
    if (execute && !summary.interrupted && items.every((i) => checkpoint.isSettled(i.id))) {
      checkpoint.markDone();
    }
    if (execute) summary.phase = checkpoint.snapshot().phase;
    if (summary.interrupted) {
      this.logger.warn({ processed: summary.processed }, "Import interrupted; resume to continue");
    }
    return summary;
  }

  // ── Discovery ────────────────────────────────────────────────────────────

  private async discover(signal?: AbortSignal): Promise<DiscoveryRecord[]> {
    const items: DiscoveryRecord[] = [];
    const seen = new Set<string>();
    try {
      for await (const record of this.ctx.adapter.discover(signal)) {
        if (seen.has(record.id)) {
          this.logger.debug({ id: record.id }, "Dropping repeated discovery id");
          continue;
        }
        seen.add(record.id);
        items.push(record);
      }
    } catch (err) {
      if (err instanceof DiscoveryError) throw err;
      throw new DiscoveryError(this.ctx.source.id, `Discovery failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    // A partial list must never replace the cache.
    if (signal?.aborted) {
      throw new DiscoveryError(this.ctx.source.id, "Discovery interrupted");
    }
    this.logger.info({ discovered: items.length }, "Discovery complete");
    return items;
  }

  // ── Per item ─────────────────────────────────────────────────────────────

  private async processItem(
    item: DiscoveryRecord,
    repositoryId: number | null,
    execute: boolean,
    signal?: AbortSignal,
  ): Promise<ItemOutcome> {
    const { source, store } = this.ctx;

    if (item.exclusion) return { kind: "skipped", reason: item.exclusion };
    if (!item.manifestUrl && item.payload === undefined) {
      return { kind: "skipped", reason: SkipReason.MISSING_MANIFEST_URL };
    }

    let raw: RawItem;
    try {
      raw = await this.fetchWithRetry(item, signal);
    } catch (err) {
      if (signal?.aborted) return { kind: "interrupted" };
      return { kind: "failed", reason: `fetch: ${errorMessage(err)}` };
    }

    let candidate: ReturnType<typeof buildCandidate>;
    try {
      const normalized = normalizeManifest(raw.manifest, { labelSynonyms: source.labelSynonyms });
      if (!normalized.ok) {
        return { kind: "failed", reason: `manifest: ${normalized.error.message}` };
      }
      candidate = buildCandidate(item, normalized.record, source, raw.manifestUrl);
    } catch (err) {
      return { kind: "failed", reason: `manifest: ${errorMessage(err)}` };
    }

    const { fields, isFallback } = candidate;
    if (isFallback) {
      this.logger.warn({ id: item.id, shelfmark: fields.shelfmark }, "Using fallback shelfmark");
    }

    try {
      const decision = await reconcile(fields, repositoryId, store);
      if (decision.action === "skip") return { kind: "skipped", reason: decision.reason };

      if (decision.action === "insert" && decision.duplicateOf !== null) {
        this.logger.warn(
          { id: item.id, shelfmark: fields.shelfmark, duplicateOf: decision.duplicateOf },
          "Reconciliation duplicate: manifest already stored under another shelfmark",
        );
      }
      const duplicate = decision.action === "insert" && decision.duplicateOf !== null;

      if (!execute || repositoryId === null) {
        return { kind: "written", action: decision.action, duplicate };
      }

      const { shelfmark, iiifManifestUrl } = fields;
      if (shelfmark === null || iiifManifestUrl === null) {
        return { kind: "skipped", reason: SkipReason.MISSING_SHELFMARK };
      }
      const result = await store.upsertManuscript({
        ...fields,
        shelfmark,
        iiifManifestUrl,
        repositoryId,
      });
      return { kind: "written", action: result.action, duplicate };
    } catch (err) {
      return { kind: "failed", reason: `store: ${errorMessage(err)}` };
    }
  }

  private async fetchWithRetry(item: DiscoveryRecord, signal?: AbortSignal): Promise<RawItem> {
    return withRetry(
      async () => {
        const outcome = await this.ctx.adapter.fetch(item, signal);
        if (!outcome.ok) throw outcome.error;
        return outcome.item;
      },
      {
        maxRetries: this.ctx.retry.maxRetries,
        baseDelayMs: this.ctx.retry.baseDelayMs,
        shouldRetry: (err) => !signal?.aborted && isTransientError(err),
        onRetry: (err, attempt, delayMs) =>
          this.logger.warn(
            { id: item.id, attempt, delayMs, error: errorMessage(err) },
            "Retrying fetch",
          ),
        sleep: (ms) => this.ctx.sleep(ms, signal),
      },
    );
  }

  // ── Bookkeeping ──────────────────────────────────────────────────────────

  private capFor(options: RunOptions): number {
    const caps = [Number.POSITIVE_INFINITY];
    if (options.test) caps.push(this.ctx.testModeCap);
    if (options.limit !== undefined) caps.push(options.limit);
    return Math.min(...caps);
  }

  private tally(
    summary: RunSummary,
    item: DiscoveryRecord,
    outcome: Exclude<ItemOutcome, { kind: "interrupted" }>,
    execute: boolean,
    verbose: boolean,
  ): void {
    const { checkpoint } = this.ctx;
    const level = verbose ? "info" : "debug";

    switch (outcome.kind) {
      case "written":
        if (outcome.action === "insert") summary.inserted++;
        else summary.updated++;
        summary.completed++;
        if (outcome.duplicate) summary.duplicates++;
        if (execute) checkpoint.markCompleted(item.id);
        this.logger[level]({ id: item.id, action: outcome.action }, "Item imported");
        break;
      case "skipped":
        summary.skipped++;
        if (execute) checkpoint.markSkipped(item.id, outcome.reason);
        this.logger[level]({ id: item.id, reason: outcome.reason }, "Item skipped");
        break;
      case "failed":
        summary.failed++;
        if (execute) checkpoint.markFailed(item.id, outcome.reason);
        this.logger.warn({ id: item.id, reason: outcome.reason }, "Item failed");
        break;
    }
  }
}
