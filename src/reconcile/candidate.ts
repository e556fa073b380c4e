// ---------------------------------------------------------------------------
// Assemble the field values for one item from its discovery record and its
// normalized manifest.
// ---------------------------------------------------------------------------

import type { DiscoveryRecord, ManuscriptFields, SourceDefinition } from "../core/types.js";
import { parseDateRange } from "../domain/dates/date-range.js";
import type { NormalizedManuscript } from "../domain/manifest/normalize-manifest.js";
import { truncate } from "../domain/manifest/normalize-manifest.js";
import { deriveCollection } from "../domain/shelfmark/collection.js";
import { resolveShelfmark } from "../domain/shelfmark/shelfmark.js";

export interface CandidateFields
  extends Omit<ManuscriptFields, "shelfmark" | "iiifManifestUrl"> {
  shelfmark: string | null;
  iiifManifestUrl: string | null;
}

export interface Candidate {
  fields: CandidateFields;
  /** The shelfmark is a placeholder built from the discovery id. */
  isFallback: boolean;
}

function pick<T>(hint: T | null | undefined, fromManifest: T | null | undefined): T | null {
  return hint ?? fromManifest ?? null;
}

/**
 * Discovery hints come from the holding library's own catalogue and take
 * precedence over manifest metadata.  Dates travel together: when a hint
 * supplies the display string, the years come from the hint too.
 */
export function buildCandidate(
  item: DiscoveryRecord,
  manuscript: NormalizedManuscript | null,
  source: SourceDefinition,
  manifestUrl: string | null = item.manifestUrl ?? null,
): Candidate {
  const hints = item.hints ?? {};

  const { shelfmark, isFallback } = resolveShelfmark(
    {
      hint: hints.shelfmark,
      metadata: manuscript?.shelfmark,
      label: manuscript?.label ?? item.label,
      discoveryId: item.id,
    },
    source.shelfmark,
  );

  let dateDisplay = manuscript?.dateDisplay ?? null;
  let dateStart = manuscript?.dateStart ?? null;
  let dateEnd = manuscript?.dateEnd ?? null;
  if (hints.dateDisplay) {
    const parsed = parseDateRange(hints.dateDisplay);
    dateDisplay = hints.dateDisplay;
    dateStart = hints.dateStart ?? parsed.start;
    dateEnd = hints.dateEnd ?? parsed.end;
  }

  const contents = pick(hints.contents, manuscript?.contents);

  return {
    isFallback,
    fields: {
      shelfmark,
      collection: hints.collection ?? deriveCollection(shelfmark, source.collection),
      dateDisplay,
      dateStart,
      dateEnd,
      contents: contents === null ? null : truncate(contents),
      provenance: pick(hints.provenance, manuscript?.provenance),
      language: pick(hints.language, manuscript?.language),
      folios: pick(hints.folios, manuscript?.folios),
      iiifManifestUrl: manifestUrl,
      thumbnailUrl: pick(hints.thumbnailUrl, manuscript?.thumbnailUrl),
      sourceUrl: item.sourceUrl ?? hints.sourceUrl ?? null,
      imageCount: pick(manuscript?.imageCount, hints.imageCount),
    },
  };
}
