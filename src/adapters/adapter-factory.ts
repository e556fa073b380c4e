// ---------------------------------------------------------------------------
// Adapter factory – selects the adapter implementation by the `kind` tag of
// a source's YAML config.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { SourceAdapter, SourceDefinition } from "../core/types.js";
import { AdapterKind } from "../core/types.js";
import type { AdapterOptions } from "./base/base-adapter.js";
import { IiifCollectionAdapter } from "./iiif/iiif-collection-adapter.js";
import { IdProbeAdapter } from "./probe/id-probe-adapter.js";
import { JsonSearchAdapter } from "./search/json-search-adapter.js";
import { HtmlSnapshotAdapter } from "./snapshot/html-snapshot-adapter.js";
import { TeiCorpusAdapter } from "./tei/tei-corpus-adapter.js";

export function createAdapter(
  source: SourceDefinition,
  logger: Logger,
  options: AdapterOptions = {},
): SourceAdapter {
  const config = source.adapter;
  switch (config.kind) {
    case AdapterKind.IIIF_COLLECTION:
      return new IiifCollectionAdapter(source, config, logger, options);

    case AdapterKind.JSON_SEARCH:
      return new JsonSearchAdapter(source, config, logger, options);

    case AdapterKind.ID_PROBE:
      return new IdProbeAdapter(source, config, logger, options);

    case AdapterKind.TEI_CORPUS:
      return new TeiCorpusAdapter(source, config, logger, options);

    case AdapterKind.HTML_SNAPSHOT:
      return new HtmlSnapshotAdapter(source, config, logger, options);

    default: {
      const unreachable: never = config;
      throw new Error(`Unhandled adapter kind: ${JSON.stringify(unreachable)}`);
    }
  }
}
