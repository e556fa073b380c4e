// ---------------------------------------------------------------------------
// Shared test fixtures: silent logger, source definitions, manifests and a
// scripted source adapter.
// ---------------------------------------------------------------------------

import pino from "pino";

import { AdapterKind } from "../../src/core/types.js";
import type {
  AdapterConfig,
  DiscoveryRecord,
  FetchOutcome,
  SourceAdapter,
  SourceDefinition,
} from "../../src/core/types.js";

export function createTestLogger(): pino.Logger {
  return pino({ level: "silent" });
}

export function makeSource(overrides: Partial<SourceDefinition> = {}): SourceDefinition {
  const adapter: AdapterConfig = {
    kind: "iiif-collection",
    timeoutMs: 1_000,
    userAgent: "compilatio-test",
    collectionUrls: ["https://iiif.example.org/collection/top"],
    maxDepth: 3,
    forceHttps: true,
  };
  return {
    id: "test-library",
    enabled: true,
    repository: {
      shortName: "TL",
      name: "Test Library",
      logoUrl: null,
      catalogueUrl: "https://library.example.org/",
    },
    adapter,
    collection: { stripPrefixes: ["MS"], patterns: [], fallback: "first-token" },
    shelfmark: { stripPrefixes: [], labelFormat: "{match}", allowFallback: false },
    labelSynonyms: {},
    ...overrides,
  };
}

export interface ManifestOptions {
  id?: string;
  label?: string;
  metadata?: Array<[string, string]>;
  canvases?: number;
}

/** A small IIIF Presentation 2 manifest. */
export function v2Manifest(options: ManifestOptions = {}): Record<string, unknown> {
  const id = options.id ?? "https://iiif.example.org/ms-1/manifest";
  const canvases = Array.from({ length: options.canvases ?? 2 }, (_v, i) => ({
    "@id": `${id}/canvas/${i + 1}`,
    "@type": "sc:Canvas",
    images: [
      {
        resource: {
          "@id": `https://images.example.org/page-${i + 1}/full/full/0/default.jpg`,
          service: { "@id": `https://images.example.org/page-${i + 1}` },
        },
      },
    ],
  }));
  return {
    "@context": "http://iiif.io/api/presentation/2/context.json",
    "@id": id,
    "@type": "sc:Manifest",
    label: options.label ?? "Test manuscript",
    metadata: (options.metadata ?? []).map(([label, value]) => ({ label, value })),
    sequences: [{ canvases }],
  };
}

export function record(id: string, extra: Partial<DiscoveryRecord> = {}): DiscoveryRecord {
  return { id, manifestUrl: `https://iiif.example.org/${id}/manifest`, ...extra };
}

type FetchHandler = (record: DiscoveryRecord, call: number) => FetchOutcome | Promise<FetchOutcome>;

/** Adapter whose discovery list and fetch behaviour are scripted by the test. */
export class ScriptedAdapter implements SourceAdapter {
  readonly kind = AdapterKind.IIIF_COLLECTION;
  readonly sourceId: string;
  discoverCalls = 0;
  readonly fetched: string[] = [];
  private readonly calls = new Map<string, number>();

  constructor(
    private readonly items: DiscoveryRecord[],
    private readonly handler: FetchHandler = (r) => ({
      ok: true,
      item: {
        manifestUrl: r.manifestUrl ?? "",
        manifest: v2Manifest({
          id: r.manifestUrl ?? "",
          metadata: [["Shelfmark", `MS ${r.id}`]],
        }),
      },
    }),
    sourceId = "test-library",
  ) {
    this.sourceId = sourceId;
  }

  async *discover(): AsyncIterable<DiscoveryRecord> {
    this.discoverCalls++;
    for (const item of this.items) yield item;
  }

  async fetch(item: DiscoveryRecord): Promise<FetchOutcome> {
    const call = (this.calls.get(item.id) ?? 0) + 1;
    this.calls.set(item.id, call);
    this.fetched.push(item.id);
    return this.handler(item, call);
  }
}

/** Minimal `fetch` stand-in answering from a URL → response map. */
export function stubFetch(
  routes: Record<string, { status?: number; body: unknown } | undefined>,
): typeof globalThis.fetch & { requested: string[] } {
  const requested: string[] = [];
  const fn = async (input: string | URL | Request): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    requested.push(url);
    const route = routes[url];
    if (!route) return new Response("not found", { status: 404 });
    const body = typeof route.body === "string" ? route.body : JSON.stringify(route.body);
    return new Response(body, { status: route.status ?? 200 });
  };
  return Object.assign(fn, { requested });
}
