// ---------------------------------------------------------------------------
// Manifest normalizer: IIIF manifest document → canonical manuscript fields.
// Pure; performs no I/O.
// ---------------------------------------------------------------------------

import { errorMessage, ManifestParseError } from "../../core/errors.js";
import type { CanonicalField } from "../../core/types.js";
import { parseDateRange } from "../dates/date-range.js";
import { mapMetadata, mergeSynonyms } from "./metadata-synonyms.js";
import { parseManifest, type IiifVersion, type ParsedManifest } from "./parse-manifest.js";
import { selectThumbnail } from "./thumbnail.js";

export const CONTENTS_MAX_LENGTH = 1000;

export interface NormalizedManuscript {
  manifestId: string;
  version: IiifVersion;
  label: string | null;
  shelfmark: string | null;
  dateDisplay: string | null;
  dateStart: number | null;
  dateEnd: number | null;
  contents: string | null;
  provenance: string | null;
  language: string | null;
  folios: string | null;
  thumbnailUrl: string | null;
  imageCount: number;
}

export type NormalizeResult =
  | { ok: true; record: NormalizedManuscript }
  | { ok: false; error: ManifestParseError };

export interface NormalizeOptions {
  /** Source-specific labels, consulted ahead of the default synonyms. */
  labelSynonyms?: Partial<Record<CanonicalField, string[]>>;
}

export function truncate(text: string, max = CONTENTS_MAX_LENGTH): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Normalize one manifest.  Never throws: structural problems, and anything
 * unexpected raised while reading the document, come back as
 * `{ ok: false, error }`.
 */
export function normalizeManifest(
  doc: unknown,
  options: NormalizeOptions = {},
): NormalizeResult {
  try {
    return { ok: true, record: normalizeParsed(parseManifest(doc), options) };
  } catch (err) {
    if (err instanceof ManifestParseError) return { ok: false, error: err };
    const error = new ManifestParseError("document", `Unreadable manifest: ${errorMessage(err)}`, {
      cause: err,
    });
    return { ok: false, error };
  }
}

function normalizeParsed(parsed: ParsedManifest, options: NormalizeOptions): NormalizedManuscript {
  const fields = mapMetadata(parsed.metadata, mergeSynonyms(options.labelSynonyms));
  const dateDisplay = fields.date ?? null;
  const { start, end } = parseDateRange(dateDisplay);
  const contents = fields.contents ?? parsed.label;

  return {
    manifestId: parsed.id,
    version: parsed.version,
    label: parsed.label,
    shelfmark: fields.shelfmark ?? null,
    dateDisplay,
    dateStart: start,
    dateEnd: end,
    contents: contents ? truncate(contents) : null,
    provenance: fields.provenance ?? null,
    language: fields.language ?? null,
    folios: fields.folios ?? null,
    thumbnailUrl: selectThumbnail(parsed),
    imageCount: parsed.canvases.length,
  };
}
