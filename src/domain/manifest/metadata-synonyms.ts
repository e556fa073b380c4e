// ---------------------------------------------------------------------------
// Mapping of source metadata labels onto canonical manuscript fields.
// ---------------------------------------------------------------------------

import { CanonicalField } from "../../core/types.js";
import type { MetadataEntry } from "./parse-manifest.js";

export type SynonymTable = Record<CanonicalField, string[]>;

/** Labels seen across IIIF producers.  Earlier entries win. */
export const DEFAULT_SYNONYMS: SynonymTable = {
  [CanonicalField.SHELFMARK]: [
    "Shelfmark",
    "Classmark",
    "Shelf Mark",
    "Call Number",
    "Identifier",
  ],
  [CanonicalField.DATE]: [
    "Date",
    "Date of Creation",
    "Date Range",
    "Dates",
    "Origin Date",
  ],
  [CanonicalField.CONTENTS]: [
    "Title",
    "Contents",
    "Description",
    "Scope and Content",
    "Summary",
  ],
  [CanonicalField.LANGUAGE]: ["Language", "Language(s)", "Languages"],
  [CanonicalField.PROVENANCE]: [
    "Provenance",
    "Origin",
    "Origin Place",
    "Place of Origin",
  ],
  [CanonicalField.FOLIOS]: [
    "Extent",
    "Physical Description",
    "Physical Extent",
    "Folios",
  ],
};

const FIELDS = Object.values(CanonicalField);

function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, " ").replace(/:$/, "").toLowerCase();
}

/** Prepend per-source synonyms to the defaults. */
export function mergeSynonyms(
  overrides: Partial<Record<CanonicalField, string[]>> = {},
): SynonymTable {
  const merged = { ...DEFAULT_SYNONYMS };
  for (const field of FIELDS) {
    const extra = overrides[field];
    if (extra && extra.length > 0) {
      merged[field] = [...extra, ...DEFAULT_SYNONYMS[field]];
    }
  }
  return merged;
}

/**
 * Pick one value per canonical field.  For each field the synonym order
 * decides; among entries with the same label the first one wins.  Labels
 * that match no synonym are dropped.
 */
export function mapMetadata(
  metadata: MetadataEntry[],
  table: SynonymTable = DEFAULT_SYNONYMS,
): Partial<Record<CanonicalField, string>> {
  const byLabel = new Map<string, string>();
  for (const entry of metadata) {
    const key = normalizeLabel(entry.label);
    if (!byLabel.has(key)) byLabel.set(key, entry.value);
  }

  const mapped: Partial<Record<CanonicalField, string>> = {};
  for (const field of FIELDS) {
    for (const synonym of table[field]) {
      const value = byLabel.get(normalizeLabel(synonym));
      if (value !== undefined) {
        mapped[field] = value;
        break;
      }
    }
  }
  return mapped;
}
