// ---------------------------------------------------------------------------
// TEI manuscript description parser.
//
// Reads the first <msDesc> of a TEI P5 catalogue file (namespace prefixes
// removed) into the canonical fields the importer needs.
// ---------------------------------------------------------------------------

import { XMLParser, XMLValidator } from "fast-xml-parser";

import { ManifestParseError } from "../../core/errors.js";
import { asArray, isRecord, type JsonObject } from "../../utils/json.js";

const MAX_TITLES = 5;

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  // SECURITY: catalogue files are third-party input; never expand entities.
  processEntities: false,
  isArray: (name) =>
    name === "msItem" ||
    name === "title" ||
    name === "idno" ||
    name === "bibl" ||
    name === "ref",
});

export interface TeiManuscript {
  shelfmark: string | null;
  /** Capture of `surrogatePattern` over the first matching surrogate ref. */
  surrogateId: string | null;
  /** The surrogate ref target the id came from. */
  sourceUrl: string | null;
  fullyDigitized: boolean;
  contents: string | null;
  language: string | null;
  folios: string | null;
  dateDisplay: string | null;
  dateStart: number | null;
  dateEnd: number | null;
  provenance: string | null;
}

// ── Tree helpers ────────────────────────────────────────────────────────────

/** All text below `node`, whitespace collapsed. */
export function textOf(node: unknown): string {
  const parts: string[] = [];
  const walk = (value: unknown): void => {
    if (typeof value === "string" || typeof value === "number") {
      parts.push(String(value));
    } else if (Array.isArray(value)) {
      value.forEach(walk);
    } else if (isRecord(value)) {
      for (const [key, child] of Object.entries(value)) {
        if (!key.startsWith("@_")) walk(child);
      }
    }
  };
  walk(node);
  return parts.join(" ").replace(/\s+/g, " ").trim();
}

/** First descendant element named `name`, depth-first, shallowest first per level. */
function findFirst(node: unknown, name: string): JsonObject | string | null {
  if (Array.isArray(node)) {
    for (const item of node) {
      const found = findFirst(item, name);
      if (found !== null) return found;
    }
    return null;
  }
  if (!isRecord(node)) return null;

  if (name in node) {
    const first = asArray(node[name])[0];
    if (isRecord(first) || typeof first === "string") return first;
  }
  for (const [key, child] of Object.entries(node)) {
    if (key.startsWith("@_") || key === name) continue;
    const found = findFirst(child, name);
    if (found !== null) return found;
  }
  return null;
}

/** Every descendant element named `name`, in document order. */
function findAll(node: unknown, name: string): Array<JsonObject | string> {
  const out: Array<JsonObject | string> = [];
  const walk = (value: unknown): void => {
    if (Array.isArray(value)) {
      value.forEach(walk);
      return;
    }
    if (!isRecord(value)) return;
    for (const [key, child] of Object.entries(value)) {
      if (key.startsWith("@_")) continue;
      if (key === name) {
        for (const item of asArray(child)) {
          if (isRecord(item) || typeof item === "string") out.push(item);
        }
      }
      walk(child);
    }
  };
  walk(node);
  return out;
}

function attr(node: JsonObject | string | null, name: string): string {
  if (!isRecord(node)) return "";
  const value = node[`@_${name}`];
  return typeof value === "string" ? value.trim() : "";
}

function child(node: JsonObject | string | null, name: string): JsonObject | string | null {
  if (!isRecord(node)) return null;
  const first = asArray(node[name])[0];
  return isRecord(first) || typeof first === "string" ? first : null;
}

function nonEmpty(text: string): string | null {
  return text.length > 0 ? text : null;
}

function yearOf(value: string): number | null {
  const year = Number.parseInt(value.slice(0, 4), 10);
  return Number.isNaN(year) ? null : year;
}

// ── Field extraction ────────────────────────────────────────────────────────

/**
 * Fully digitized unless the surrogates say otherwise.  Explicit
 * `bibl`/`ref` types win over free text; a surrogate link with no marker at
 * all counts as full.
 */
export function isFullyDigitized(
  msDesc: JsonObject,
  surrogatePattern: RegExp,
): boolean {
  const surrogates = findFirst(msDesc, "surrogates");
  if (surrogates === null) return false;

  for (const bibl of findAll(surrogates, "bibl")) {
    const type = attr(bibl, "type").toLowerCase();
    const subtype = attr(bibl, "subtype").toLowerCase();
    if (!type.includes("digital")) continue;
    if (subtype.includes("full")) return true;
    if (subtype.includes("partial")) return false;
  }

  const refs = findAll(surrogates, "ref");
  for (const ref of refs) {
    const type = attr(ref, "type").toLowerCase();
    if (type.includes("full")) return true;
    if (type.includes("partial")) return false;
  }

  const text = textOf(surrogates).toLowerCase();
  if (text.includes("partial")) return false;
  if (text.includes("full") || text.includes("complete")) return true;

  return refs.some((ref) => surrogatePattern.test(attr(ref, "target")));
}

function extractShelfmark(msDesc: JsonObject): string | null {
  const identifier = child(msDesc, "msIdentifier");
  if (!isRecord(identifier)) return null;
  for (const idno of asArray(identifier["idno"])) {
    if (isRecord(idno) && attr(idno, "type") === "shelfmark") {
      return nonEmpty(textOf(idno));
    }
  }
  return null;
}

function extractSurrogate(
  msDesc: JsonObject,
  surrogatePattern: RegExp,
): { surrogateId: string | null; sourceUrl: string | null } {
  const surrogates = findFirst(msDesc, "surrogates");
  for (const ref of findAll(surrogates, "ref")) {
    const target = attr(ref, "target");
    const match = surrogatePattern.exec(target);
    if (match?.[1]) return { surrogateId: match[1], sourceUrl: target };
  }
  return { surrogateId: null, sourceUrl: null };
}

function extractContents(msContents: JsonObject | string | null): string | null {
  const summary = child(msContents, "summary");
  if (summary !== null) {
    const text = textOf(summary);
    if (text) return text;
  }
  const titles: string[] = [];
  for (const item of findAll(msContents, "msItem")) {
    if (!isRecord(item)) continue;
    for (const title of asArray(item["title"])) {
      const text = textOf(title);
      if (text) titles.push(text);
    }
  }
  return titles.length > 0 ? titles.slice(0, MAX_TITLES).join("; ") : null;
}

function extractDate(origin: JsonObject | string | null): Pick<
  TeiManuscript,
  "dateDisplay" | "dateStart" | "dateEnd"
> {
  const origDate = child(origin, "origDate");
  if (origDate === null) return { dateDisplay: null, dateStart: null, dateEnd: null };

  const text = textOf(origDate);
  const notBefore = attr(origDate, "notBefore");
  const notAfter = attr(origDate, "notAfter");

  let dateDisplay: string | null = null;
  if (text) dateDisplay = text;
  else if (notBefore && notAfter) dateDisplay = `${notBefore}–${notAfter}`;
  else if (notBefore) dateDisplay = `after ${notBefore}`;
  else if (notAfter) dateDisplay = `before ${notAfter}`;

  return {
    dateDisplay,
    dateStart: notBefore ? yearOf(notBefore) : null,
    dateEnd: notAfter ? yearOf(notAfter) : null,
  };
}

function extractProvenance(origin: JsonObject | string | null): string | null {
  const place = child(origin, "origPlace");
  if (place === null) return null;
  const country = child(place, "country");
  const countryText = country === null ? "" : textOf(country);
  return nonEmpty(countryText) ?? nonEmpty(textOf(place));
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Parse one TEI file.  Returns `null` when the document has no `<msDesc>`;
 * throws {@link ManifestParseError} for malformed XML.
 */
export function parseTeiDocument(
  xml: string,
  surrogatePattern: RegExp,
): TeiManuscript | null {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new ManifestParseError(
      "document",
      `Malformed XML at line ${valid.err.line}: ${valid.err.msg}`,
    );
  }

  const doc: unknown = xmlParser.parse(xml);
  const msDesc = findFirst(doc, "msDesc");
  if (!isRecord(msDesc)) return null;

  const msContents = child(msDesc, "msContents");
  const textLang = child(msContents, "textLang");
  const supportDesc = findFirst(child(msDesc, "physDesc"), "supportDesc");
  const extent = child(supportDesc, "extent");
  const origin = findFirst(child(msDesc, "history"), "origin");

  return {
    shelfmark: extractShelfmark(msDesc),
    ...extractSurrogate(msDesc, surrogatePattern),
    fullyDigitized: isFullyDigitized(msDesc, surrogatePattern),
    contents: extractContents(msContents),
    language: nonEmpty(attr(textLang, "mainLang")),
    folios: extent === null ? null : nonEmpty(textOf(extent)),
    ...extractDate(origin),
    provenance: extractProvenance(origin),
  };
}
