// ---------------------------------------------------------------------------
// IIIF collection adapter – discovers manifests by walking a IIIF
// Presentation collection tree (v2 `collections`/`manifests`/`members`,
// v3 `items`).
// ---------------------------------------------------------------------------

import type { DiscoveryRecord, IiifCollectionAdapterConfig } from "../../core/types.js";
import { DiscoveryError, errorMessage } from "../../core/errors.js";
import { collapseText } from "../../domain/manifest/language-map.js";
import { resourceId } from "../../domain/manifest/parse-manifest.js";
import { manifestIdentifier } from "../../domain/manifest/thumbnail.js";
import { asArray, compilePattern, fillTemplate, isRecord } from "../../utils/json.js";
import { BaseSourceAdapter } from "../base/base-adapter.js";

type MemberKind = "collection" | "manifest";

interface CollectionMember {
  kind: MemberKind;
  id: string;
  label: string | null;
}

function memberKind(type: unknown, fallback: MemberKind | null): MemberKind | null {
  if (typeof type !== "string") return fallback;
  const lower = type.toLowerCase();
  if (lower.endsWith("collection")) return "collection";
  if (lower.endsWith("manifest")) return "manifest";
  return fallback;
}

/** Children of one collection document, in document order. */
export function collectionMembers(doc: unknown): CollectionMember[] {
  if (!isRecord(doc)) return [];
  const members: CollectionMember[] = [];

  const push = (entry: unknown, fallback: MemberKind | null): void => {
    if (!isRecord(entry)) return;
    const kind = memberKind(entry["@type"] ?? entry["type"], fallback);
    const id = resourceId(entry);
    if (!kind || !id) return;
    members.push({ kind, id, label: collapseText(entry["label"]) });
  };

  for (const entry of asArray(doc["collections"])) push(entry, "collection");
  for (const entry of asArray(doc["manifests"])) push(entry, "manifest");
  for (const entry of asArray(doc["members"])) push(entry, null);
  for (const entry of asArray(doc["items"])) push(entry, null);
  return members;
}

export class IiifCollectionAdapter extends BaseSourceAdapter<IiifCollectionAdapterConfig> {
  async *discover(signal?: AbortSignal): AsyncIterable<DiscoveryRecord> {
    const include = compilePattern(this.config.include, "i");
    const exclude = compilePattern(this.config.exclude, "i");
    const visited = new Set<string>();
    const seenManifests = new Set<string>();
    const queue = this.config.collectionUrls.map((url) => ({ url: this.normalizeUrl(url), depth: 0, root: true }));

    while (queue.length > 0) {
      if (signal?.aborted) return;
      const next = queue.shift();
      if (!next || visited.has(next.url)) continue;
      visited.add(next.url);

      let doc: unknown;
      try {
        doc = await this.discoveryJson(next.url, signal);
      } catch (err) {
        if (next.root) {
          throw new DiscoveryError(
            this.sourceId,
            `Cannot read collection ${next.url}: ${errorMessage(err)}`,
            { cause: err },
          );
        }
        this.logger.warn({ url: next.url, error: errorMessage(err) }, "Skipping unreadable sub-collection");
        continue;
      }

      const members = collectionMembers(doc);
      this.logger.debug({ url: next.url, depth: next.depth, members: members.length }, "Read collection");

      for (const member of members) {
        const url = this.normalizeUrl(member.id);
        if (member.kind === "collection") {
          if (next.depth < this.config.maxDepth) {
            queue.push({ url, depth: next.depth + 1, root: false });
          }
          continue;
        }

        if (seenManifests.has(url)) continue;
        seenManifests.add(url);

        const haystack = `${url} ${member.label ?? ""}`;
        if (include && !include.test(haystack)) continue;
        if (exclude && exclude.test(haystack)) continue;

        yield this.toRecord(url, member.label);
      }
    }
  }

  private toRecord(manifestUrl: string, label: string | null): DiscoveryRecord {
    const record: DiscoveryRecord = { id: manifestUrl, manifestUrl };
    if (label) record.label = label;
    if (this.config.sourceUrlTemplate) {
      record.sourceUrl = fillTemplate(this.config.sourceUrlTemplate, {
        id: manifestIdentifier(manifestUrl),
      });
    }
    return record;
  }

  private normalizeUrl(url: string): string {
    return this.config.forceHttps ? url.replace(/^http:\/\//i, "https://") : url;
  }
}
