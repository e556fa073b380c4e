// ---------------------------------------------------------------------------
// Core types for the Compilatio manuscript aggregator.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Enums ───────────────────────────────────────────────────────────────────

export const AdapterKind = {
  IIIF_COLLECTION: "iiif-collection",
  JSON_SEARCH: "json-search",
  ID_PROBE: "id-probe",
  TEI_CORPUS: "tei-corpus",
  HTML_SNAPSHOT: "html-snapshot",
} as const;
export type AdapterKind = (typeof AdapterKind)[keyof typeof AdapterKind];

export const ImportPhase = {
  DISCOVERY: "discovery",
  IMPORT: "import",
  DONE: "done",
} as const;
export type ImportPhase = (typeof ImportPhase)[keyof typeof ImportPhase];

/** Canonical manuscript fields that a metadata label can map onto. */
export const CanonicalField = {
  SHELFMARK: "shelfmark",
  DATE: "date",
  CONTENTS: "contents",
  LANGUAGE: "language",
  PROVENANCE: "provenance",
  FOLIOS: "folios",
} as const;
export type CanonicalField = (typeof CanonicalField)[keyof typeof CanonicalField];

// ── Aggregate store entities ────────────────────────────────────────────────

export interface RepositoryDefinition {
  shortName: string;
  name: string;
  logoUrl: string | null;
  catalogueUrl: string | null;
}

export interface Repository extends RepositoryDefinition {
  id: number;
}

/** Every column of a manuscript row except its keys. */
export interface ManuscriptFields {
  shelfmark: string;
  collection: string | null;
  dateDisplay: string | null;
  dateStart: number | null;
  dateEnd: number | null;
  contents: string | null;
  provenance: string | null;
  language: string | null;
  folios: string | null;
  iiifManifestUrl: string;
  thumbnailUrl: string | null;
  sourceUrl: string | null;
  imageCount: number | null;
}

export interface ManuscriptRecord extends ManuscriptFields {
  repositoryId: number;
}

export interface Manuscript extends ManuscriptRecord {
  id: number;
}

/** Partial field values known before (or instead of) the manifest. */
export type ManuscriptHints = Partial<
  Omit<ManuscriptFields, "iiifManifestUrl">
>;

// ── Discovery & fetch ───────────────────────────────────────────────────────

/**
 * Source-native description of one candidate manuscript.  Serialised as-is
 * into the discovery cache, so everything here must be plain JSON.
 */
export interface DiscoveryRecord {
  /** Stable per-source identifier used by the checkpoint. */
  id: string;
  manifestUrl?: string;
  label?: string;
  sourceUrl?: string;
  hints?: ManuscriptHints;
  /** Set when a documented policy excludes the item (e.g. partial digitization). */
  exclusion?: string;
  /** An already-complete manifest document, when discovery returned one. */
  payload?: unknown;
}

export interface RawItem {
  manifestUrl: string;
  manifest: unknown;
}

export type FetchOutcome =
  | { ok: true; item: RawItem }
  | { ok: false; error: Error };

/**
 * Every source adapter implements this interface.  The orchestrator calls
 * `discover()` once per run and `fetch()` once per unsettled item.
 */
export interface SourceAdapter {
  readonly kind: AdapterKind;
  readonly sourceId: string;

  discover(signal?: AbortSignal): AsyncIterable<DiscoveryRecord>;

  fetch(record: DiscoveryRecord, signal?: AbortSignal): Promise<FetchOutcome>;
}

// ── Source configuration ────────────────────────────────────────────────────

interface AdapterConfigBase {
  /** Per-request timeout in ms. */
  timeoutMs: number;
  userAgent: string;
}

export interface IiifCollectionAdapterConfig extends AdapterConfigBase {
  kind: "iiif-collection";
  collectionUrls: string[];
  maxDepth: number;
  /** Keep only manifests whose id or label matches. */
  include?: string;
  exclude?: string;
  forceHttps: boolean;
  /** `{id}` is replaced by the manifest URL's last path segment. */
  sourceUrlTemplate?: string;
}

export interface JsonSearchAdapterConfig extends AdapterConfigBase {
  kind: "json-search";
  searchUrl: string;
  pageParam: string;
  perPageParam: string;
  perPage: number;
  startPage: number;
  maxPages: number;
  /** Dot path to the array of records in each page. */
  recordsPath: string;
  /** Dot path to the total page count; absent means "stop on an empty page". */
  totalPagesPath?: string;
  idField: string;
  manifestField?: string;
  manifestUrlTemplate?: string;
  shelfmarkField?: string;
  labelField?: string;
  sourceUrlTemplate?: string;
}

export interface IdProbeSeries {
  /** `{n}` is replaced by the (optionally zero-padded) number. */
  template: string;
  start: number;
  end: number;
  padWidth: number;
}

export interface IdProbeAdapterConfig extends AdapterConfigBase {
  kind: "id-probe";
  series: IdProbeSeries[];
  manifestUrlTemplate: string;
  sourceUrlTemplate?: string;
  /** Use the probed identifier as the shelfmark hint. */
  idIsShelfmark: boolean;
}

export interface TeiCorpusAdapterConfig extends AdapterConfigBase {
  kind: "tei-corpus";
  directory: string;
  /** Regex with one capture group, applied to surrogate `ref/@target` values. */
  surrogatePattern: string;
  manifestUrlTemplate: string;
  requireFullDigitization: boolean;
}

export interface HtmlSnapshotAdapterConfig extends AdapterConfigBase {
  kind: "html-snapshot";
  directory: string;
  linkSelector: string;
  /** Regex with one capture group extracting the item id from a link href. */
  idPattern: string;
  /** Regex with one capture group extracting a shelfmark number from link text. */
  shelfmarkPattern?: string;
  /** `{match}` is replaced by the shelfmark capture. */
  shelfmarkFormat: string;
  manifestUrlTemplate: string;
  sourceUrlTemplate?: string;
  /** Title prefixes stripped from link text. */
  titleStripPatterns: string[];
}

export type AdapterConfig =
  | IiifCollectionAdapterConfig
  | JsonSearchAdapterConfig
  | IdProbeAdapterConfig
  | TeiCorpusAdapterConfig
  | HtmlSnapshotAdapterConfig;

export interface CollectionPattern {
  match: string;
  collection: string;
}

export interface CollectionRules {
  /** Every shelfmark in the source belongs to this collection. */
  fixed?: string;
  stripPrefixes: string[];
  patterns: CollectionPattern[];
  /** "first-token", "none", or a literal label used when no pattern matches. */
  fallback: string;
}

export interface ShelfmarkRules {
  /** Institution prefixes stripped from extracted shelfmarks. */
  stripPrefixes: string[];
  /** Regex with one capture group extracting a shelfmark from the label. */
  labelPattern?: string;
  /** `{match}` is replaced by the `labelPattern` capture. */
  labelFormat: string;
  /** Shape of placeholder shelfmarks built from source-internal ids. */
  fallbackPattern?: string;
  /** `{id}` is replaced by the discovery id when no shelfmark is found. */
  fallbackTemplate?: string;
  allowFallback: boolean;
}

export interface SourceDefinition {
  id: string;
  enabled: boolean;
  repository: RepositoryDefinition;
  adapter: AdapterConfig;
  /** Overrides the global inter-item delay. */
  delayMs?: number;
  collection: CollectionRules;
  shelfmark: ShelfmarkRules;
  /** Extra metadata labels per canonical field, consulted before the defaults. */
  labelSynonyms: Partial<Record<CanonicalField, string[]>>;
}

// ── App config ──────────────────────────────────────────────────────────────

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user?: string;
  password?: string;
  maxConnections: number;
}

export interface ImportConfig {
  delayMs: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  testModeCap: number;
  checkpointDir: string;
  sourcesDir: string;
}

export interface AppConfig {
  env: "development" | "staging" | "production";
  port: number;
  logLevel: string;
  database: DatabaseConfig;
  import: ImportConfig;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
  /** Defaults to stdout. */
  stream?: "stdout" | "stderr";
}
