// ---------------------------------------------------------------------------
// JSON search adapter – pages through a JSON search API (Blacklight-style
// `catalog.json`) and yields one record per hit.
// ---------------------------------------------------------------------------

import type { DiscoveryRecord, JsonSearchAdapterConfig } from "../../core/types.js";
import { DiscoveryError, errorMessage } from "../../core/errors.js";
import { collapseText } from "../../domain/manifest/language-map.js";
import { fillTemplate, getPath, isRecord } from "../../utils/json.js";
import { BaseSourceAdapter } from "../base/base-adapter.js";

/**
 * Read a field from a search hit.  Blacklight wraps values as
 * `{ attributes: { value } }`; plain strings and arrays are read directly.
 */
export function readField(hit: unknown, path: string | undefined): string | null {
  if (!path) return null;
  let value = getPath(hit, path);
  if (isRecord(value) && value["attributes"] !== undefined) {
    value = getPath(value, "attributes.value");
  }
  return collapseText(value, "join");
}

export class JsonSearchAdapter extends BaseSourceAdapter<JsonSearchAdapterConfig> {
  async *discover(signal?: AbortSignal): AsyncIterable<DiscoveryRecord> {
    const c = this.config;
    const seen = new Set<string>();
    let totalPages: number | null = null;

    for (let page = c.startPage; page < c.startPage + c.maxPages; page++) {
      if (signal?.aborted) return;
      const url = this.pageUrl(page);

      let body: unknown;
      try {
        body = await this.discoveryJson(url, signal);
      } catch (err) {
        throw new DiscoveryError(
          this.sourceId,
          `Search page ${page} failed: ${errorMessage(err)}`,
          { cause: err },
        );
      }

      const hits = getPath(body, c.recordsPath);
      if (!Array.isArray(hits) || hits.length === 0) break;
      this.logger.debug({ page, hits: hits.length }, "Read search page");

      for (const hit of hits) {
        const record = this.toRecord(hit);
        if (!record || seen.has(record.id)) continue;
        seen.add(record.id);
        yield record;
      }

      if (c.totalPagesPath) {
        const total = Number(getPath(body, c.totalPagesPath));
        totalPages = Number.isFinite(total) ? total : totalPages;
      }
      if (totalPages !== null && page >= totalPages) break;
    }
  }

  private pageUrl(page: number): string {
    const url = new URL(this.config.searchUrl);
    url.searchParams.set(this.config.pageParam, String(page));
    url.searchParams.set(this.config.perPageParam, String(this.config.perPage));
    return url.toString();
  }

  private toRecord(hit: unknown): DiscoveryRecord | null {
    const c = this.config;
    const id = readField(hit, c.idField);
    if (!id) return null;

    const values = { id, encodedId: encodeURIComponent(id) };
    const manifestUrl =
      readField(hit, c.manifestField) ??
      (c.manifestUrlTemplate ? fillTemplate(c.manifestUrlTemplate, values) : null);

    const record: DiscoveryRecord = { id };
    if (manifestUrl) record.manifestUrl = manifestUrl;
    const label = readField(hit, c.labelField);
    if (label) record.label = label;
    if (c.sourceUrlTemplate) record.sourceUrl = fillTemplate(c.sourceUrlTemplate, values);
    const shelfmark = readField(hit, c.shelfmarkField);
    if (shelfmark) record.hints = { shelfmark };
    return record;
  }
}
