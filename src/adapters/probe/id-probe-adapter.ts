// ---------------------------------------------------------------------------
// ID probe adapter – for sources with no listing at all.  Enumerates
// identifier series and keeps the ids whose manifest URL answers 200.
// ---------------------------------------------------------------------------

import type { DiscoveryRecord, IdProbeAdapterConfig, IdProbeSeries } from "../../core/types.js";
import { AdapterNotFoundError, errorMessage } from "../../core/errors.js";
import { withRetry } from "../../orchestrator/retry.js";
import { fillTemplate } from "../../utils/json.js";
import { BaseSourceAdapter } from "../base/base-adapter.js";

/** Every identifier in a series, in order. */
export function expandSeries(series: IdProbeSeries): string[] {
  const ids: string[] = [];
  for (let n = series.start; n <= series.end; n++) {
    const num = series.padWidth > 0 ? String(n).padStart(series.padWidth, "0") : String(n);
    ids.push(fillTemplate(series.template, { n: num }));
  }
  return ids;
}

export class IdProbeAdapter extends BaseSourceAdapter<IdProbeAdapterConfig> {
  async *discover(signal?: AbortSignal): AsyncIterable<DiscoveryRecord> {
    const seen = new Set<string>();

    for (const series of this.config.series) {
      let found = 0;
      for (const id of expandSeries(series)) {
        if (signal?.aborted) return;
        if (seen.has(id)) continue;
        seen.add(id);

        const manifestUrl = this.manifestUrl(id);
        if (!(await this.exists(manifestUrl, signal))) continue;
        found++;
        yield this.toRecord(id, manifestUrl);
      }
      this.logger.info({ series: series.template, found }, "Probed identifier series");
    }
  }

  private async exists(url: string, signal?: AbortSignal): Promise<boolean> {
    try {
      await withRetry(
        async () => {
          // The body is drained so the connection is released.
          await this.getText(url, signal);
        },
        {
          maxRetries: this.options.discoveryRetries ?? 2,
          baseDelayMs: this.options.discoveryRetryDelayMs ?? 1_000,
          ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
        },
      );
      return true;
    } catch (err) {
      if (!(err instanceof AdapterNotFoundError)) {
        this.logger.warn({ url, error: errorMessage(err) }, "Probe failed, treating id as absent");
      }
      return false;
    }
  }

  private manifestUrl(id: string): string {
    return fillTemplate(this.config.manifestUrlTemplate, { id, encodedId: encodeURIComponent(id) });
  }

  private toRecord(id: string, manifestUrl: string): DiscoveryRecord {
    const record: DiscoveryRecord = { id, manifestUrl };
    if (this.config.sourceUrlTemplate) {
      record.sourceUrl = fillTemplate(this.config.sourceUrlTemplate, {
        id,
        encodedId: encodeURIComponent(id),
      });
    }
    if (this.config.idIsShelfmark) record.hints = { shelfmark: id };
    return record;
  }
}
