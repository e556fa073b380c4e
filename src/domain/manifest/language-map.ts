// ---------------------------------------------------------------------------
// Collapse IIIF text values (plain strings, JSON-LD value objects, v3
// language maps, and arrays of any of these) into plain strings.
// ---------------------------------------------------------------------------

import * as cheerio from "cheerio";

import { isRecord } from "../../utils/json.js";

/** Remove markup, decode entities and collapse runs of whitespace. */
export function stripHtml(text: string): string {
  if (!/[<&]/.test(text)) return text.replace(/\s+/g, " ").trim();
  const $ = cheerio.load(text, null, false);
  $("br").replaceWith(" ");
  return $.root().text().replace(/\s+/g, " ").trim();
}

function collapseAll(value: unknown): string[] {
  if (typeof value === "string") {
    const text = stripHtml(value);
    return text.length > 0 ? [text] : [];
  }
  if (typeof value === "number") return [String(value)];
  if (Array.isArray(value)) return value.flatMap(collapseAll);
  if (!isRecord(value)) return [];

  if ("@value" in value) return collapseAll(value["@value"]);

  // v3 language map: first language that has any content.
  for (const entry of Object.values(value)) {
    const texts = collapseAll(entry);
    if (texts.length > 0) return texts;
  }
  return [];
}

/**
 * Collapse a IIIF text value into one string.
 *
 * - `"X"`, `{ "@value": "X" }`, `{ "en": ["X"] }` all yield `"X"`.
 * - `mode: "first"` keeps only the first text (labels);
 *   `mode: "join"` joins every text with `"; "` (metadata values).
 */
export function collapseText(
  value: unknown,
  mode: "first" | "join" = "first",
): string | null {
  const texts = collapseAll(value);
  if (texts.length === 0) return null;
  return mode === "join" ? texts.join("; ") : (texts[0] ?? null);
}
