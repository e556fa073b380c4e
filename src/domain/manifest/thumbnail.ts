// ---------------------------------------------------------------------------
// Thumbnail selection for a parsed manifest.
// ---------------------------------------------------------------------------

import type { ParsedManifest } from "./parse-manifest.js";

export const THUMBNAIL_SIZE = "200,";

/** IIIF Image API request for a small rendition of `serviceId`. */
export function imageServiceThumbnail(serviceId: string): string {
  return `${serviceId.replace(/\/+$/, "")}/full/${THUMBNAIL_SIZE}/0/default.jpg`;
}

/** Percent-decode `segment`, keeping it as is when the escapes are malformed. */
function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) return segment;
    throw err;
  }
}

function lastSegment(url: string): string {
  const path = url.split(/[?#]/)[0] ?? "";
  const segments = path.split("/").filter((s) => s.length > 0);
  return segments[segments.length - 1] ?? "";
}

/**
 * Image identifier of a thumbnail candidate: the segment before the IIIF
 * `/region/size/rotation/quality.format` suffix when present, else the last
 * path segment without its extension.
 */
export function imageIdentifier(url: string): string {
  const path = url.split(/[?#]/)[0] ?? "";
  const iiif = /\/([^/]+)\/(?:full|square|[\d.,pct:]+)\/[^/]+\/!?\d+\/[^/]+$/.exec(path);
  if (iiif) return safeDecode(iiif[1] ?? "");
  return safeDecode(lastSegment(path).replace(/\.[a-z0-9]+$/i, ""));
}

/** Identifier part of a manifest id: `.../MS-ADD-01234/manifest.json` → `MS-ADD-01234`. */
export function manifestIdentifier(manifestId: string): string {
  const segment = lastSegment(manifestId).replace(/\.json$/i, "");
  if (segment === "manifest") {
    const path = manifestId.split(/[?#]/)[0] ?? "";
    const segments = path.split("/").filter((s) => s.length > 0);
    const parent = segments[segments.length - 2];
    return safeDecode(parent === "iiif" ? (segments[segments.length - 3] ?? "") : (parent ?? ""));
  }
  return safeDecode(segment);
}

/**
 * Choose a thumbnail: the manifest's own `thumbnail`, then the first
 * canvas's thumbnail, image service and image.  A candidate whose image
 * identifier equals the manifest identifier is a URL built from the wrong
 * id and is rejected.
 */
export function selectThumbnail(manifest: ParsedManifest): string | null {
  const forbidden = manifestIdentifier(manifest.id);
  const first = manifest.canvases[0];
  const candidates = [
    manifest.thumbnail,
    first?.thumbnail ?? null,
    first?.imageService ? imageServiceThumbnail(first.imageService) : null,
    first?.image ?? null,
  ];

  for (const candidate of candidates) {
    if (!candidate) continue;
    if (forbidden.length > 0 && imageIdentifier(candidate) === forbidden) continue;
    return candidate;
  }
  return null;
}
