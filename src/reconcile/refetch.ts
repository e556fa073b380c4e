// ---------------------------------------------------------------------------
// Re-fetch the manifest behind a stored row, for the corrective passes.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import { errorMessage } from "../core/errors.js";
import type { RawItem, SourceAdapter } from "../core/types.js";
import { isTransientError, withRetry } from "../orchestrator/retry.js";
import type { ManuscriptRef } from "../store/manuscript-store.js";

export interface RefetchRetry {
  maxRetries: number;
  baseDelayMs: number;
}

const DEFAULT_RETRY: RefetchRetry = { maxRetries: 2, baseDelayMs: 1_000 };

export interface RefetchOptions {
  adapter: SourceAdapter;
  /** Defaults to two retries one second apart, as for the import. */
  retry?: RefetchRetry;
  sleep?: (ms: number) => Promise<void>;
}

/** Fetch `row`'s manifest, retrying transient failures; throws the last error. */
export async function refetchManifest(
  row: ManuscriptRef,
  options: RefetchOptions,
  logger: Logger,
): Promise<RawItem> {
  const retry = options.retry ?? DEFAULT_RETRY;
  return withRetry(
    async () => {
      const outcome = await options.adapter.fetch({ id: row.shelfmark, manifestUrl: row.iiifManifestUrl });
      if (!outcome.ok) throw outcome.error;
      return outcome.item;
    },
    {
      maxRetries: retry.maxRetries,
      baseDelayMs: retry.baseDelayMs,
      shouldRetry: isTransientError,
      onRetry: (err, attempt, delayMs) =>
        logger.warn({ id: row.id, attempt, delayMs, error: errorMessage(err) }, "Retrying fetch"),
      ...(options.sleep ? { sleep: options.sleep } : {}),
    },
  );
}
