// ---------------------------------------------------------------------------
// TEI corpus adapter – discovers manuscripts from a local checkout of TEI
// catalogue files and fetches their IIIF manifests over HTTP.
// ---------------------------------------------------------------------------

import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import type { DiscoveryRecord, ManuscriptHints, TeiCorpusAdapterConfig } from "../../core/types.js";
import { DiscoveryError, errorMessage } from "../../core/errors.js";
import { SkipReason } from "../../reconcile/reconciler.js";
import { fillTemplate } from "../../utils/json.js";
import { BaseSourceAdapter } from "../base/base-adapter.js";
import { parseTeiDocument, type TeiManuscript } from "./tei-parser.js";

async function listXmlFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(directory, entry.name);
    if (entry.isDirectory()) files.push(...(await listXmlFiles(full)));
    else if (entry.isFile() && entry.name.toLowerCase().endsWith(".xml")) files.push(full);
  }
  return files;
}

function toHints(ms: TeiManuscript): ManuscriptHints {
  const hints: ManuscriptHints = {
    contents: ms.contents,
    language: ms.language,
    folios: ms.folios,
    dateDisplay: ms.dateDisplay,
    dateStart: ms.dateStart,
    dateEnd: ms.dateEnd,
    provenance: ms.provenance,
  };
  if (ms.shelfmark) hints.shelfmark = ms.shelfmark;
  return hints;
}

export class TeiCorpusAdapter extends BaseSourceAdapter<TeiCorpusAdapterConfig> {
  async *discover(signal?: AbortSignal): AsyncIterable<DiscoveryRecord> {
    const root = this.config.directory;
    let files: string[];
    try {
      files = (await listXmlFiles(root)).sort();
    } catch (err) {
      throw new DiscoveryError(this.sourceId, `Cannot read TEI directory ${root}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    this.logger.info({ directory: root, files: files.length }, "Scanning TEI files");

    const surrogatePattern = new RegExp(this.config.surrogatePattern);
    let withoutDescription = 0;

    for (const file of files) {
      if (signal?.aborted) return;
      const id = path.relative(root, file).replace(/\.xml$/i, "").split(path.sep).join("/");

      let ms: TeiManuscript | null;
      try {
        ms = parseTeiDocument(await readFile(file, "utf-8"), surrogatePattern);
      } catch (err) {
        this.logger.warn({ file, error: errorMessage(err) }, "Skipping unparseable TEI file");
        continue;
      }
      if (ms === null) {
        withoutDescription++;
        continue;
      }

      yield this.toRecord(id, ms);
    }

    if (withoutDescription > 0) {
      this.logger.debug({ count: withoutDescription }, "TEI files without msDesc");
    }
  }

  private toRecord(id: string, ms: TeiManuscript): DiscoveryRecord {
    const record: DiscoveryRecord = { id, hints: toHints(ms) };
    if (ms.surrogateId) {
      record.manifestUrl = fillTemplate(this.config.manifestUrlTemplate, { id: ms.surrogateId });
    }
    if (ms.sourceUrl) record.sourceUrl = ms.sourceUrl;
    if (this.config.requireFullDigitization && !ms.fullyDigitized) {
      record.exclusion = SkipReason.NOT_FULLY_DIGITIZED;
    }
    return record;
  }
}
