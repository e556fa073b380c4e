// ---------------------------------------------------------------------------
// Corrective pass for placeholder shelfmarks.
//
// Rows stored under a source-internal identifier (e.g. "MS bx123cd4567")
// are re-read from their manifests.  When a proper shelfmark can be found
// the row is renamed, or deleted if the proper row already exists with the
// same manifest.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { RawItem, SourceAdapter, SourceDefinition } from "../core/types.js";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import { normalizeManifest } from "../domain/manifest/normalize-manifest.js";
import { deriveCollection } from "../domain/shelfmark/collection.js";
import { isFallbackShelfmark, resolveShelfmark } from "../domain/shelfmark/shelfmark.js";
import type { ManuscriptRef, ManuscriptStore } from "../store/manuscript-store.js";
import { refetchManifest, type RefetchRetry } from "./refetch.js";

export interface FallbackResolverOptions {
  store: ManuscriptStore;
  adapter: SourceAdapter;
  source: SourceDefinition;
  logger: Logger;
  execute: boolean;
  limit?: number;
  delayMs?: number;
  retry?: RefetchRetry;
  sleep?: (ms: number) => Promise<void>;
}

export interface FallbackResolution {
  examined: number;
  renamed: number;
  deleted: number;
  /** No proper shelfmark in the manifest. */
  unresolved: number;
  /** The proper shelfmark is stored with a different manifest. */
  conflicts: number;
  failed: number;
  dryRun: boolean;
}

type RowOutcome =
  | { kind: "renamed"; shelfmark: string }
  | { kind: "deleted"; keptId: number }
  | { kind: "unresolved" }
  | { kind: "conflict"; shelfmark: string; existingId: number }
  | { kind: "failed"; reason: string };

export async function resolveFallbackShelfmarks(
  options: FallbackResolverOptions,
): Promise<FallbackResolution> {
  const { store, source } = options;
  const logger = options.logger.child({ module: "fallback-resolver", sourceId: source.id });
  const pattern = source.shelfmark.fallbackPattern;
  if (!pattern) {
    throw new ConfigurationError(`Source "${source.id}" declares no shelfmark.fallbackPattern`);
  }

  const result: FallbackResolution = {
    examined: 0,
    renamed: 0,
    deleted: 0,
    unresolved: 0,
    conflicts: 0,
    failed: 0,
    dryRun: !options.execute,
  };

  const repositoryId = await store.findRepositoryId(source.repository.shortName);
  if (repositoryId === null) {
    logger.info("Repository not imported yet; nothing to resolve");
    return result;
  }

  let rows = await store.findByShelfmarkPattern(repositoryId, pattern);
  if (options.limit !== undefined) rows = rows.slice(0, options.limit);
  logger.info({ rows: rows.length }, "Found rows with fallback shelfmarks");

  for (const [index, row] of rows.entries()) {
    result.examined++;
    const outcome = await resolveRow(row, repositoryId, options, logger);
    switch (outcome.kind) {
      case "renamed":
        result.renamed++;
        logger.info({ id: row.id, from: row.shelfmark, to: outcome.shelfmark }, "Renamed fallback shelfmark");
        break;
      case "deleted":
        result.deleted++;
        logger.info({ id: row.id, shelfmark: row.shelfmark, keptId: outcome.keptId }, "Removed fallback duplicate");
        break;
      case "unresolved":
        result.unresolved++;
        logger.debug({ id: row.id, shelfmark: row.shelfmark }, "No proper shelfmark in manifest");
        break;
      case "conflict":
        result.conflicts++;
        logger.warn(
          { id: row.id, shelfmark: outcome.shelfmark, existingId: outcome.existingId },
          "Proper shelfmark already stored with a different manifest",
        );
        break;
      case "failed":
        result.failed++;
        logger.warn({ id: row.id, reason: outcome.reason }, "Could not resolve fallback shelfmark");
        break;
    }

    if (options.sleep && options.delayMs && index < rows.length - 1) {
      await options.sleep(options.delayMs);
    }
  }

  return result;
}

async function resolveRow(
  row: ManuscriptRef,
  repositoryId: number,
  options: FallbackResolverOptions,
  logger: Logger,
): Promise<RowOutcome> {
  const { source, store, execute } = options;

  let raw: RawItem;
  try {
    raw = await refetchManifest(row, options, logger);
  } catch (err) {
    return { kind: "failed", reason: errorMessage(err) };
  }

  const normalized = normalizeManifest(raw.manifest, { labelSynonyms: source.labelSynonyms });
  if (!normalized.ok) return { kind: "failed", reason: normalized.error.message };

  const { shelfmark } = resolveShelfmark(
    {
      metadata: normalized.record.shelfmark,
      label: normalized.record.label,
      discoveryId: row.shelfmark,
    },
    { ...source.shelfmark, allowFallback: false },
  );
  if (shelfmark === null || isFallbackShelfmark(shelfmark, source.shelfmark)) {
    return { kind: "unresolved" };
  }

  try {
    const existingId = await store.findManuscript(repositoryId, shelfmark);
    if (existingId !== null) {
      const sameManifest = await store.findByManifestUrl(repositoryId, row.iiifManifestUrl);
      if (!sameManifest.some((r) => r.id === existingId)) {
        return { kind: "conflict", shelfmark, existingId };
      }
      if (execute) await store.deleteManuscript(row.id);
      return { kind: "deleted", keptId: existingId };
    }

    if (execute) {
      await store.renameShelfmark(row.id, shelfmark, deriveCollection(shelfmark, source.collection));
    }
    return { kind: "renamed", shelfmark };
  } catch (err) {
    return { kind: "failed", reason: errorMessage(err) };
  }
}
