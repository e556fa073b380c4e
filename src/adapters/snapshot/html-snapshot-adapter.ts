// ---------------------------------------------------------------------------
// HTML snapshot adapter – for catalogues that block automated browsing.
// Listing pages are saved by hand into a directory; discovery parses them
// with cheerio and manifests are then fetched from a URL template.
// ---------------------------------------------------------------------------

import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import * as cheerio from "cheerio";

import type { DiscoveryRecord, HtmlSnapshotAdapterConfig, ManuscriptHints } from "../../core/types.js";
import { DiscoveryError, errorMessage } from "../../core/errors.js";
import { compilePattern, fillTemplate } from "../../utils/json.js";
import { BaseSourceAdapter } from "../base/base-adapter.js";

export interface SnapshotItem {
  id: string;
  shelfmark: string | null;
  title: string | null;
}

type SnapshotRules = Pick<
  HtmlSnapshotAdapterConfig,
  "linkSelector" | "idPattern" | "shelfmarkPattern" | "shelfmarkFormat" | "titleStripPatterns"
>;

/** Extract every item link from one saved listing page. */
export function parseSnapshotPage(html: string, rules: SnapshotRules): SnapshotItem[] {
  const $ = cheerio.load(html);
  const idPattern = new RegExp(rules.idPattern);
  const shelfmarkPattern = compilePattern(rules.shelfmarkPattern);
  const stripPatterns = rules.titleStripPatterns
    .map((p) => compilePattern(p, "i"))
    .filter((p): p is RegExp => p !== null);

  const items: SnapshotItem[] = [];
  const seen = new Set<string>();

  const findShelfmark = (text: string): string | null => {
    const match = shelfmarkPattern?.exec(text);
    return match?.[1] ? fillTemplate(rules.shelfmarkFormat, { match: match[1] }) : null;
  };

  $(rules.linkSelector).each((_i, el) => {
    const link = $(el);
    const id = idPattern.exec(link.attr("href") ?? "")?.[1];
    if (!id || seen.has(id)) return;
    seen.add(id);

    const linkText = link.text().replace(/\s+/g, " ").trim();
    let shelfmark = findShelfmark(linkText);
    if (shelfmark === null) {
      // Thumbnail links carry no text; the shelfmark sits in the result card.
      const parentText = link.closest("div, article, li").text().replace(/\s+/g, " ").trim();
      shelfmark = findShelfmark(parentText);
    }

    let title = linkText;
    for (const pattern of stripPatterns) title = title.replace(pattern, "").trim();

    items.push({ id, shelfmark, title: title.length > 0 ? title : null });
  });

  return items;
}

/** `page*.html` when present (in name order), otherwise every `.html` file. */
async function listSnapshotFiles(directory: string): Promise<string[]> {
  const names = (await readdir(directory)).filter((n) => n.toLowerCase().endsWith(".html")).sort();
  const pages = names.filter((n) => n.startsWith("page"));
  return (pages.length > 0 ? pages : names).map((n) => path.join(directory, n));
}

export class HtmlSnapshotAdapter extends BaseSourceAdapter<HtmlSnapshotAdapterConfig> {
  async *discover(signal?: AbortSignal): AsyncIterable<DiscoveryRecord> {
    const directory = this.config.directory;
    let files: string[];
    try {
      files = await listSnapshotFiles(directory);
    } catch (err) {
      throw new DiscoveryError(
        this.sourceId,
        `Cannot read snapshot directory ${directory}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    if (files.length === 0) {
      throw new DiscoveryError(this.sourceId, `No HTML snapshots found in ${directory}`);
    }

    const seen = new Set<string>();
    for (const file of files) {
      if (signal?.aborted) return;
      const items = parseSnapshotPage(await readFile(file, "utf-8"), this.config);
      let fresh = 0;
      for (const item of items) {
        if (seen.has(item.id)) continue;
        seen.add(item.id);
        fresh++;
        yield this.toRecord(item);
      }
      this.logger.info({ file: path.basename(file), found: fresh, total: seen.size }, "Parsed snapshot page");
    }
  }

  private toRecord(item: SnapshotItem): DiscoveryRecord {
    const values = { id: item.id };
    const record: DiscoveryRecord = {
      id: item.id,
      manifestUrl: fillTemplate(this.config.manifestUrlTemplate, values),
    };
    if (this.config.sourceUrlTemplate) {
      record.sourceUrl = fillTemplate(this.config.sourceUrlTemplate, values);
    }
    const hints: ManuscriptHints = {};
    if (item.shelfmark) hints.shelfmark = item.shelfmark;
    if (item.title) hints.contents = item.title;
    if (Object.keys(hints).length > 0) record.hints = hints;
    return record;
  }
}
