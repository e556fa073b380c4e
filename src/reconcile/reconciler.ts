// ---------------------------------------------------------------------------
// Reconciliation engine: decide insert / update / skip for one candidate.
// ---------------------------------------------------------------------------

import type { ManuscriptLookup } from "../store/manuscript-store.js";

export const SkipReason = {
  MISSING_MANIFEST_URL: "missing_manifest_url",
  MISSING_SHELFMARK: "missing_shelfmark",
  NOT_FULLY_DIGITIZED: "not_fully_digitized",
} as const;
export type SkipReason = (typeof SkipReason)[keyof typeof SkipReason];

export interface ReconcileCandidate {
  shelfmark: string | null;
  iiifManifestUrl: string | null;
  /** Policy exclusion carried from discovery, e.g. `not_fully_digitized`. */
  exclusion?: string | null;
}

export type ReconcileDecision =
  | {
      action: "insert";
      /** Another row in the repository already points at the same manifest. */
      duplicateOf: number | null;
    }
  | { action: "update"; existingId: number }
  | { action: "skip"; reason: string };

/**
 * Validity gate, then a natural-key lookup.  `repositoryId` is `null` when
 * the repository does not exist yet (a dry run against an empty store), in
 * which case every valid candidate is a would-insert.
 */
export async function reconcile(
  candidate: ReconcileCandidate,
  repositoryId: number | null,
  store: ManuscriptLookup,
): Promise<ReconcileDecision> {
  if (candidate.exclusion) {
    return { action: "skip", reason: candidate.exclusion };
  }
  const manifestUrl = candidate.iiifManifestUrl?.trim() ?? "";
  if (manifestUrl.length === 0) {
    return { action: "skip", reason: SkipReason.MISSING_MANIFEST_URL };
  }
  const shelfmark = candidate.shelfmark?.trim() ?? "";
  if (shelfmark.length === 0) {
    return { action: "skip", reason: SkipReason.MISSING_SHELFMARK };
  }

  if (repositoryId === null) {
    return { action: "insert", duplicateOf: null };
  }

  const existingId = await store.findManuscript(repositoryId, shelfmark);
  if (existingId !== null) {
    return { action: "update", existingId };
  }

  const sameManifest = await store.findByManifestUrl(repositoryId, manifestUrl);
  const other = sameManifest.find((row) => row.shelfmark !== shelfmark);
  return { action: "insert", duplicateOf: other ? other.id : null };
}
