// ---------------------------------------------------------------------------
// Source registry loader.
// Reads YAML files from a directory, validates with Zod, and returns typed
// SourceDefinition[] objects ready for use by the adapter layer.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { z } from "zod";
import { parse } from "yaml";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import type { SourceDefinition } from "../core/types.js";

export const DEFAULT_USER_AGENT =
  "Compilatio/1.0 (Academic manuscript research; IIIF aggregator)";

// ── Zod schemas ─────────────────────────────────────────────────────────────

const RepositorySchema = z.object({
  shortName: z.string().min(1),
  name: z.string().min(1),
  logoUrl: z.string().url().nullable().default(null),
  catalogueUrl: z.string().url().nullable().default(null),
});

function adapterBase(timeoutMs: number) {
  return {
    timeoutMs: z.number().int().positive().default(timeoutMs),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  };
}

export function buildAdapterSchema(timeoutMs: number) {
  const base = adapterBase(timeoutMs);
  return z.discriminatedUnion("kind", [
    z.object({
      ...base,
      kind: z.literal("iiif-collection"),
      collectionUrls: z.array(z.string().url()).min(1),
      maxDepth: z.number().int().nonnegative().default(5),
      include: z.string().optional(),
      exclude: z.string().optional(),
      forceHttps: z.boolean().default(true),
      sourceUrlTemplate: z.string().optional(),
    }),
    z.object({
      ...base,
      kind: z.literal("json-search"),
      searchUrl: z.string().url(),
      pageParam: z.string().min(1).default("page"),
      perPageParam: z.string().min(1).default("per_page"),
      perPage: z.number().int().positive().default(100),
      startPage: z.number().int().nonnegative().default(1),
      maxPages: z.number().int().positive().default(1_000),
      recordsPath: z.string().min(1),
      totalPagesPath: z.string().optional(),
      idField: z.string().min(1),
      manifestField: z.string().optional(),
      manifestUrlTemplate: z.string().optional(),
      shelfmarkField: z.string().optional(),
      labelField: z.string().optional(),
      sourceUrlTemplate: z.string().optional(),
    }),
    z.object({
      ...base,
      kind: z.literal("id-probe"),
      series: z
        .array(
          z.object({
            template: z.string().min(1),
            start: z.number().int().nonnegative(),
            end: z.number().int().nonnegative(),
            padWidth: z.number().int().nonnegative().default(0),
          }),
        )
        .min(1),
      manifestUrlTemplate: z.string().min(1),
      sourceUrlTemplate: z.string().optional(),
      idIsShelfmark: z.boolean().default(true),
    }),
    z.object({
      ...base,
      kind: z.literal("tei-corpus"),
      directory: z.string().min(1),
      surrogatePattern: z.string().min(1),
      manifestUrlTemplate: z.string().min(1),
      requireFullDigitization: z.boolean().default(true),
    }),
    z.object({
      ...base,
      kind: z.literal("html-snapshot"),
      directory: z.string().min(1),
      linkSelector: z.string().min(1).default("a[href]"),
      idPattern: z.string().min(1),
      shelfmarkPattern: z.string().optional(),
      shelfmarkFormat: z.string().min(1).default("{match}"),
      manifestUrlTemplate: z.string().min(1),
      sourceUrlTemplate: z.string().optional(),
      titleStripPatterns: z.array(z.string()).default([]),
    }),
  ]);
}

const CollectionSchema = z.object({
  fixed: z.string().min(1).optional(),
  stripPrefixes: z.array(z.string()).default([]),
  patterns: z
    .array(z.object({ match: z.string().min(1), collection: z.string().min(1) }))
    .default([]),
  fallback: z.string().min(1).default("first-token"),
});

const ShelfmarkSchema = z.object({
  stripPrefixes: z.array(z.string()).default([]),
  labelPattern: z.string().optional(),
  labelFormat: z.string().min(1).default("{match}"),
  fallbackPattern: z.string().optional(),
  fallbackTemplate: z.string().optional(),
  allowFallback: z.boolean().default(false),
});

const SynonymList = z.array(z.string().min(1)).optional();

const LabelSynonymsSchema = z.object({
  shelfmark: SynonymList,
  date: SynonymList,
  contents: SynonymList,
  language: SynonymList,
  provenance: SynonymList,
  folios: SynonymList,
});

export function buildSourceSchema(timeoutMs: number) {
  return z.object({
    id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/),
    enabled: z.boolean().default(true),
    repository: RepositorySchema,
    adapter: buildAdapterSchema(timeoutMs),
    delayMs: z.number().int().nonnegative().optional(),
    collection: CollectionSchema.default({}),
    shelfmark: ShelfmarkSchema.default({}),
    labelSynonyms: LabelSynonymsSchema.default({}),
  });
}

// ── Environment-variable placeholder resolver ───────────────────────────────

const ENV_PLACEHOLDER = /\$\{([A-Z_][A-Z0-9_]*)}/g;

/**
 * Recursively walk a parsed YAML value and replace `${ENV_VAR}` placeholders
 * in strings with the matching `process.env` value.  Throws if a referenced
 * variable is not defined.
 */
export function resolveEnvPlaceholders(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_PLACEHOLDER, (_match, varName: string) => {
      const envValue = env[varName];
      if (envValue === undefined) {
        throw new ConfigurationError(
          `Environment variable "${varName}" is referenced in a source config but is not defined`,
        );
      }
      return envValue;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholders(item, env));
  }
  if (value !== null && typeof value === "object") {
    const resolved: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      resolved[k] = resolveEnvPlaceholders(v, env);
    }
    return resolved;
  }
  return value;
}

// ── Public API ──────────────────────────────────────────────────────────────

export interface LoadSourceRegistryOptions {
  /** Default per-request timeout for adapters that do not set one. */
  timeoutMs: number;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
}

/**
 * Validate one parsed YAML document.  Relative adapter directories are
 * resolved against `baseDir`.
 */
export function parseSourceDefinition(
  raw: unknown,
  options: { timeoutMs: number; baseDir: string; env?: NodeJS.ProcessEnv },
): SourceDefinition {
  const resolved = resolveEnvPlaceholders(raw, options.env);
  const source: SourceDefinition = buildSourceSchema(options.timeoutMs).parse(
    resolved,
  );
  const adapter = source.adapter;
  if (adapter.kind === "tei-corpus" || adapter.kind === "html-snapshot") {
    adapter.directory = path.resolve(options.baseDir, adapter.directory);
  }
  return source;
}

/**
 * Load every `*.yaml` file from `dir`, validate each against the source
 * schema, resolve `${ENV_VAR}` placeholders, and return the typed
 * {@link SourceDefinition} objects sorted by file name.
 *
 * Files that fail validation are skipped with a warning.  Duplicate source
 * ids keep the first definition.
 */
export function loadSourceRegistry(
  dir: string,
  options: LoadSourceRegistryOptions,
): SourceDefinition[] {
  const absoluteDir = path.resolve(dir);
  const log = options.logger.child({ module: "source-registry" });

  if (!fs.existsSync(absoluteDir)) {
    throw new ConfigurationError(
      `Source registry directory does not exist: ${absoluteDir}`,
    );
  }

  const files = fs
    .readdirSync(absoluteDir)
    .filter((f) => f.endsWith(".yaml") || f.endsWith(".yml"))
    .sort();

  const sources: SourceDefinition[] = [];
  const seen = new Set<string>();

  for (const file of files) {
    const filePath = path.join(absoluteDir, file);
    try {
      const raw: unknown = parse(fs.readFileSync(filePath, "utf-8"));
      const source = parseSourceDefinition(raw, {
        timeoutMs: options.timeoutMs,
        baseDir: process.cwd(),
        env: options.env,
      });
      if (seen.has(source.id)) {
        log.warn({ file, sourceId: source.id }, "Duplicate source id, skipping");
        continue;
      }
      seen.add(source.id);
      sources.push(source);
    } catch (err) {
      log.warn({ file, error: errorMessage(err) }, "Skipping invalid source config");
    }
  }

  return sources;
}

/** Find one source by id; throws when it is not configured. */
export function findSource(
  sources: SourceDefinition[],
  id: string,
): SourceDefinition {
  const source = sources.find((s) => s.id === id);
  if (!source) {
    const known = sources.map((s) => s.id).join(", ");
    throw new ConfigurationError(
      `Unknown source "${id}". Configured sources: ${known || "(none)"}`,
    );
  }
  return source;
}
