// ---------------------------------------------------------------------------
// Narrowing helpers for untyped JSON documents.
// ---------------------------------------------------------------------------

export type JsonObject = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Wrap a scalar in an array; `undefined`/`null` become `[]`. */
export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/** A non-empty trimmed string, or `undefined`. */
export function getString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * Follow a dot-separated path (`meta.pages.total_pages`) through nested
 * objects.  Numeric segments index into arrays.
 */
export function getPath(value: unknown, path: string): unknown {
  let current: unknown = value;
  for (const segment of path.split(".").filter((s) => s.length > 0)) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isRecord(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/** Replace `{name}` placeholders; unknown names are left in place. */
export function fillTemplate(
  template: string,
  values: Record<string, string>,
): string {
  return template.replace(/\{([a-zA-Z_]+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? String(values[name]) : match,
  );
}

/** Compile a configured regex; `null` when the pattern is invalid. */
export function compilePattern(
  pattern: string | undefined,
  flags = "",
): RegExp | null {
  if (pattern === undefined || pattern.length === 0) return null;
  try {
    return new RegExp(pattern, flags);
  } catch {
    return null;
  }
}
