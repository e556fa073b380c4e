// ---------------------------------------------------------------------------
// Shelfmark resolution and fallback-identifier detection.
// ---------------------------------------------------------------------------

import type { ShelfmarkRules } from "../../core/types.js";
import { compilePattern, fillTemplate } from "../../utils/json.js";
import { stripPrefix } from "./collection.js";

export const DEFAULT_SHELFMARK_RULES: ShelfmarkRules = {
  stripPrefixes: [],
  labelFormat: "{match}",
  allowFallback: false,
};

export interface ShelfmarkCandidates {
  /** Shelfmark known at discovery time (TEI idno, snapshot link text...). */
  hint?: string | null;
  /** Value of the manifest's shelfmark metadata entry. */
  metadata?: string | null;
  label?: string | null;
  /** Discovery id, used only to build a fallback identifier. */
  discoveryId: string;
}

export interface ResolvedShelfmark {
  shelfmark: string | null;
  /** The shelfmark was built from a source-internal id, not catalogued. */
  isFallback: boolean;
}

function clean(value: string | null | undefined, rules: ShelfmarkRules): string | null {
  if (!value) return null;
  const text = stripPrefix(value.replace(/\s+/g, " ").trim(), rules.stripPrefixes)
    .replace(/[.,;:]+$/, "")
    .trim();
  return text.length > 0 ? text : null;
}

/** Apply `labelPattern` to a manifest label. */
export function shelfmarkFromLabel(
  label: string | null | undefined,
  rules: ShelfmarkRules,
): string | null {
  if (!label) return null;
  const re = compilePattern(rules.labelPattern, "i");
  if (!re) return null;
  const m = re.exec(label);
  if (!m) return null;
  return clean(fillTemplate(rules.labelFormat, { match: m[1] ?? m[0] }), {
    ...rules,
    stripPrefixes: [],
  });
}

/** Whether `shelfmark` has the shape of a source's placeholder identifier. */
export function isFallbackShelfmark(
  shelfmark: string,
  rules: ShelfmarkRules,
): boolean {
  const re = compilePattern(rules.fallbackPattern);
  return re !== null && re.test(shelfmark);
}

/**
 * Pick the shelfmark for an item: discovery hint, then manifest metadata,
 * then the label pattern.  A placeholder built from the discovery id is
 * used only when the source opts in with `allowFallback`.
 */
export function resolveShelfmark(
  candidates: ShelfmarkCandidates,
  rules: ShelfmarkRules = DEFAULT_SHELFMARK_RULES,
): ResolvedShelfmark {
  const found =
    clean(candidates.hint, rules) ??
    clean(candidates.metadata, rules) ??
    (rules.labelPattern ? shelfmarkFromLabel(candidates.label, rules) : null);
  if (found) return { shelfmark: found, isFallback: false };

  if (rules.allowFallback && rules.fallbackTemplate) {
    return {
      shelfmark: fillTemplate(rules.fallbackTemplate, { id: candidates.discoveryId }),
      isFallback: true,
    };
  }
  return { shelfmark: null, isFallback: false };
}
