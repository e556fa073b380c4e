// ---------------------------------------------------------------------------
// Corrective pass for stored thumbnails.
//
// Early imports built thumbnail URLs from the manifest id instead of an
// image id, and some IIIF servers answer such URLs with a placeholder
// image.  Each stored row's manifest is fetched again, the thumbnail is
// chosen as the importer now chooses it, and the row is updated when the
// two differ.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { CheckpointStore } from "../checkpoint/checkpoint-store.js";
import type { SourceDefinition } from "../core/types.js";
import { errorMessage } from "../core/errors.js";
import { normalizeManifest } from "../domain/manifest/normalize-manifest.js";
import type { ManuscriptStore, ThumbnailRef } from "../store/manuscript-store.js";
import { refetchManifest, type RefetchOptions } from "./refetch.js";

export const NO_THUMBNAIL = "no_thumbnail";

export interface ThumbnailRepairOptions extends RefetchOptions {
  store: ManuscriptStore;
  source: SourceDefinition;
  logger: Logger;
  execute: boolean;
  /** Per-row progress; written on execute runs only. */
  checkpoint?: CheckpointStore;
  /** Skip rows the checkpoint already settled. */
  resume?: boolean;
  /** Only rows that have no thumbnail yet. */
  missingOnly?: boolean;
  limit?: number;
  delayMs?: number;
  signal?: AbortSignal;
}

export interface ThumbnailRepair {
  examined: number;
  updated: number;
  unchanged: number;
  /** The manifest offers no usable thumbnail. */
  missing: number;
  failed: number;
  alreadySettled: number;
  dryRun: boolean;
  interrupted: boolean;
}

type RowOutcome =
  | { kind: "updated"; thumbnailUrl: string }
  | { kind: "unchanged" }
  | { kind: "missing" }
  | { kind: "failed"; reason: string };

export async function repairThumbnails(options: ThumbnailRepairOptions): Promise<ThumbnailRepair> {
  const { store, source, execute, signal } = options;
  const logger = options.logger.child({ module: "thumbnail-repair", sourceId: source.id });
  const checkpoint = execute ? options.checkpoint : undefined;

  const result: ThumbnailRepair = {
    examined: 0,
    updated: 0,
    unchanged: 0,
    missing: 0,
    failed: 0,
    alreadySettled: 0,
    dryRun: !execute,
    interrupted: false,
  };

  const repositoryId = await store.findRepositoryId(source.repository.shortName);
  if (repositoryId === null) {
    logger.info("Repository not imported yet; nothing to repair");
    return result;
  }

  const rows = await store.listThumbnails(repositoryId, options.missingOnly ?? false);
  const key = (row: ThumbnailRef): string => String(row.id);

  if (checkpoint) {
    checkpoint.load();
    if (!options.resume) checkpoint.reset();
    checkpoint.recordDiscovery(
      rows.map((row) => ({ id: key(row), manifestUrl: row.iiifManifestUrl, label: row.shelfmark })),
    );
  }

  let pending = rows;
  if (checkpoint && options.resume) {
    pending = rows.filter((row) => !checkpoint.isSettled(key(row)));
    result.alreadySettled = rows.length - pending.length;
  }
  if (options.limit !== undefined) pending = pending.slice(0, options.limit);
  logger.info(
    { rows: rows.length, alreadySettled: result.alreadySettled, toProcess: pending.length, dryRun: !execute },
    "Repairing thumbnails",
  );

  for (const [index, row] of pending.entries()) {
    if (signal?.aborted) {
      result.interrupted = true;
      break;
    }

    result.examined++;
    const outcome = await repairRow(row, options, logger);
    switch (outcome.kind) {
      case "updated":
        result.updated++;
        checkpoint?.markCompleted(key(row));
        logger.info(
          { id: row.id, shelfmark: row.shelfmark, from: row.thumbnailUrl, to: outcome.thumbnailUrl },
          "Replaced thumbnail",
        );
        break;
      case "unchanged":
        result.unchanged++;
        checkpoint?.markCompleted(key(row));
        break;
      case "missing":
        result.missing++;
        checkpoint?.markSkipped(key(row), NO_THUMBNAIL);
        logger.debug({ id: row.id, shelfmark: row.shelfmark }, "No thumbnail in manifest");
        break;
      case "failed":
        result.failed++;
        checkpoint?.markFailed(key(row), outcome.reason);
        logger.warn({ id: row.id, reason: outcome.reason }, "Could not repair thumbnail");
        break;
    }

    if (options.sleep && options.delayMs && index < pending.length - 1) {
      await options.sleep(options.delayMs);
    }
  }

  if (checkpoint && !result.interrupted && rows.every((row) => checkpoint.isSettled(key(row)))) {
    checkpoint.markDone();
  }
  if (result.interrupted) {
    logger.warn({ examined: result.examined }, "Thumbnail repair interrupted; resume to continue");
  }
  return result;
}

async function repairRow(
  row: ThumbnailRef,
  options: ThumbnailRepairOptions,
  logger: Logger,
): Promise<RowOutcome> {
  let manifest: unknown;
  try {
    manifest = (await refetchManifest(row, options, logger)).manifest;
  } catch (err) {
    return { kind: "failed", reason: `fetch: ${errorMessage(err)}` };
  }

  const normalized = normalizeManifest(manifest, { labelSynonyms: options.source.labelSynonyms });
  if (!normalized.ok) return { kind: "failed", reason: `manifest: ${normalized.error.message}` };

  const thumbnailUrl = normalized.record.thumbnailUrl;
  if (thumbnailUrl === null) return { kind: "missing" };
  if (thumbnailUrl === row.thumbnailUrl) return { kind: "unchanged" };

  if (options.execute) {
    try {
      await options.store.updateThumbnail(row.id, thumbnailUrl);
    } catch (err) {
      return { kind: "failed", reason: `store: ${errorMessage(err)}` };
    }
  }
  return { kind: "updated", thumbnailUrl };
}
