// ---------------------------------------------------------------------------
// Collection inference from shelfmarks.
// ---------------------------------------------------------------------------

import type { CollectionRules } from "../../core/types.js";
import { compilePattern } from "../../utils/json.js";

/** Used when a source configures no collection rules at all. */
export const DEFAULT_COLLECTION_RULES: CollectionRules = {
  stripPrefixes: ["MS"],
  patterns: [],
  fallback: "first-token",
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Remove the first matching prefix.  A prefix ending in a letter or digit
 * only matches as a whole token, so `MS` strips `MS 12` and `MS.12` but
 * leaves `MSS 12` alone.
 */
export function stripPrefix(text: string, prefixes: readonly string[]): string {
  for (const prefix of prefixes) {
    if (prefix.trim().length === 0) continue;
    const boundary = /[A-Za-z0-9]$/.test(prefix) ? "(?![A-Za-z0-9])" : "";
    const re = new RegExp(`^${escapeRegExp(prefix)}${boundary}\\.?\\s*`, "i");
    if (re.test(text)) return text.replace(re, "").trim();
  }
  return text.trim();
}

/** Leading alphabetic run of the first token: `Ff.1.23` → `Ff`, `049` → null. */
function firstToken(text: string): string | null {
  const token = text.split(/\s+/)[0] ?? "";
  const m = /^[A-Za-z][A-Za-z'-]*/.exec(token);
  return m ? m[0].replace(/[-']+$/, "") : null;
}

/**
 * Derive the collection a shelfmark belongs to.  Total and deterministic:
 * unknown shapes and invalid rule patterns never throw.
 *
 * `fixed` wins outright; otherwise prefixes are stripped, the ordered
 * patterns are tried case-insensitively against the remainder (the
 * collection label may refer to capture groups as `$1`), and finally the
 * fallback applies: `first-token`, `none`, or a literal label.
 */
export function deriveCollection(
  shelfmark: string | null | undefined,
  rules: CollectionRules = DEFAULT_COLLECTION_RULES,
): string | null {
  if (rules.fixed) return rules.fixed;
  if (!shelfmark || shelfmark.trim().length === 0) return null;

  const stripped = stripPrefix(shelfmark.replace(/\s+/g, " "), rules.stripPrefixes);

  for (const { match, collection } of rules.patterns) {
    const re = compilePattern(match, "i");
    if (!re) continue;
    const m = re.exec(stripped);
    if (!m) continue;
    const label = collection
      .replace(/\$(\d)/g, (_whole, n: string) => m[Number(n)] ?? "")
      .trim();
    if (label.length > 0) return label;
  }

  switch (rules.fallback) {
    case "first-token":
      return firstToken(stripped);
    case "none":
      return null;
    default:
      return rules.fallback;
  }
}
