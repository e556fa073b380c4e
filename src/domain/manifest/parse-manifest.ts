// ---------------------------------------------------------------------------
// Resolve IIIF Presentation v2 and v3 manifests into one internal shape.
// Version detection happens here, once; nothing downstream branches on it.
// ---------------------------------------------------------------------------

import { ManifestParseError } from "../../core/errors.js";
import { asArray, getString, isRecord, type JsonObject } from "../../utils/json.js";
import { collapseText } from "./language-map.js";

export type IiifVersion = 2 | 3;

export interface MetadataEntry {
  label: string;
  value: string;
}

export interface ParsedCanvas {
  id: string | null;
  /** Canvas-level thumbnail resource id (v3, and some v2 producers). */
  thumbnail: string | null;
  /** Base URL of the first painted image's IIIF Image service. */
  imageService: string | null;
  /** Direct URL of the first painted image. */
  image: string | null;
}

export interface ParsedManifest {
  version: IiifVersion;
  id: string;
  label: string | null;
  metadata: MetadataEntry[];
  thumbnail: string | null;
  canvases: ParsedCanvas[];
}

/** `@id` (v2) or `id` (v3) of a resource, or a bare string reference. */
export function resourceId(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      const id = resourceId(item);
      if (id) return id;
    }
    return null;
  }
  if (isRecord(value)) {
    return getString(value, "@id") ?? getString(value, "id") ?? null;
  }
  return null;
}

function serviceId(resource: JsonObject): string | null {
  const id = resourceId(resource["service"]);
  return id ? id.replace(/\/+$/, "") : null;
}

function parseMetadata(value: unknown): MetadataEntry[] {
  const entries: MetadataEntry[] = [];
  for (const item of asArray(value)) {
    if (!isRecord(item)) continue;
    const label = collapseText(item["label"], "first");
    const text = collapseText(item["value"], "join");
    if (label && text) entries.push({ label, value: text });
  }
  return entries;
}

function parseV2Canvas(canvas: JsonObject): ParsedCanvas {
  const parsed: ParsedCanvas = {
    id: resourceId(canvas),
    thumbnail: resourceId(canvas["thumbnail"]),
    imageService: null,
    image: null,
  };
  const annotation = asArray(canvas["images"]).find(isRecord);
  const resource = annotation?.["resource"];
  if (isRecord(resource)) {
    parsed.imageService = serviceId(resource);
    parsed.image = resourceId(resource);
  }
  return parsed;
}

function parseV3Canvas(canvas: JsonObject): ParsedCanvas {
  const parsed: ParsedCanvas = {
    id: resourceId(canvas),
    thumbnail: resourceId(canvas["thumbnail"]),
    imageService: null,
    image: null,
  };
  const page = asArray(canvas["items"]).find(isRecord);
  const annotation = asArray(page?.["items"]).find(isRecord);
  const body = asArray(annotation?.["body"]).find(isRecord);
  if (body) {
    parsed.imageService = serviceId(body);
    parsed.image = resourceId(body);
  }
  return parsed;
}

/**
 * Resolve a manifest document.  `items` marks v3 and `sequences` v2; a
 * document with neither is read as v2 with no canvases.
 *
 * @throws ManifestParseError when the document is not an object or has no id.
 */
export function parseManifest(doc: unknown): ParsedManifest {
  if (!isRecord(doc)) {
    throw new ManifestParseError("document", "manifest is not a JSON object");
  }

  const id = getString(doc, "@id") ?? getString(doc, "id");
  if (!id) {
    throw new ManifestParseError("id", "missing_id");
  }

  let version: IiifVersion;
  let canvases: ParsedCanvas[];
  const items = doc["items"];
  if (Array.isArray(items)) {
    version = 3;
    canvases = items
      .filter(isRecord)
      .filter((item) => item["type"] === undefined || item["type"] === "Canvas")
      .map(parseV3Canvas);
  } else {
    version = 2;
    const sequence = asArray(doc["sequences"]).find(isRecord);
    canvases = asArray(sequence?.["canvases"]).filter(isRecord).map(parseV2Canvas);
  }

  return {
    version,
    id,
    label: collapseText(doc["label"], "first"),
    metadata: parseMetadata(doc["metadata"]),
    thumbnail: resourceId(doc["thumbnail"]),
    canvases,
  };
}
