// ---------------------------------------------------------------------------
// BaseSourceAdapter – abstract base class shared by every source adapter.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  AdapterConfig,
  AdapterKind,
  DiscoveryRecord,
  FetchOutcome,
  RawItem,
  SourceAdapter,
  SourceDefinition,
} from "../../core/types.js";
import {
  AdapterAuthError,
  AdapterConnectionError,
  AdapterError,
  AdapterNotFoundError,
  AdapterParseError,
  AdapterRateLimitError,
  AdapterTimeoutError,
  errorMessage,
} from "../../core/errors.js";
import { withRetry } from "../../orchestrator/retry.js";

export type FetchFn = typeof globalThis.fetch;

/** Settle with `promise`, or reject with the signal's reason once it aborts. */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export interface AdapterOptions {
  fetchFn?: FetchFn;
  /** Retries for discovery requests.  Item fetches are retried by the orchestrator. */
  discoveryRetries?: number;
  discoveryRetryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Abstract base adapter that implements the {@link SourceAdapter} contract.
 * Concrete adapters provide {@link discover} and may override
 * {@link executeFetch}; the default fetches `record.manifestUrl` as JSON.
 *
 * The base class provides:
 *   - A typed fetch outcome; per-item problems never throw out of `fetch()`.
 *   - Consistent error classification (status codes, timeouts, network).
 *   - Shared HTTP helpers with a per-request timeout.
 */
export abstract class BaseSourceAdapter<C extends AdapterConfig>
  implements SourceAdapter
{
  public readonly kind: AdapterKind;
  public readonly sourceId: string;

  protected readonly source: SourceDefinition;
  protected readonly config: C;
  protected readonly logger: Logger;
  private readonly fetchFn: FetchFn;
  protected readonly options: AdapterOptions;

  constructor(
    source: SourceDefinition,
    config: C,
    logger: Logger,
    options: AdapterOptions = {},
  ) {
    this.source = source;
    this.config = config;
    this.kind = config.kind;
    this.sourceId = source.id;
    this.options = options;
    this.fetchFn = options.fetchFn ?? ((input, init) => globalThis.fetch(input, init));
    this.logger = logger.child({
      adapter: this.constructor.name,
      sourceId: source.id,
      kind: config.kind,
    });
  }

  // ── Public interface ────────────────────────────────────────────────────

  abstract discover(signal?: AbortSignal): AsyncIterable<DiscoveryRecord>;

  /**
   * Fetch one item's manifest, measuring elapsed time and converting every
   * failure into `{ ok: false, error }`.
   */
  async fetch(record: DiscoveryRecord, signal?: AbortSignal): Promise<FetchOutcome> {
    const start = performance.now();
    try {
      const item = await this.executeFetch(record, signal);
      this.logger.debug(
        { id: record.id, responseTimeMs: Math.round(performance.now() - start) },
        "Fetched manifest",
      );
      return { ok: true, item };
    } catch (error: unknown) {
      const wrapped = this.wrapError(error, `Fetching ${record.id}`);
      this.logger.debug(
        { id: record.id, err: wrapped, responseTimeMs: Math.round(performance.now() - start) },
        "Fetch failed",
      );
      return { ok: false, error: wrapped };
    }
  }

  // ── Overridable ─────────────────────────────────────────────────────────

  protected async executeFetch(
    record: DiscoveryRecord,
    signal?: AbortSignal,
  ): Promise<RawItem> {
    const manifestUrl = record.manifestUrl;
    if (!manifestUrl) {
      throw new AdapterParseError(
        `Record ${record.id} has no manifest URL`,
        this.sourceId,
        this.kind,
      );
    }
    if (record.payload !== undefined) {
      return { manifestUrl, manifest: record.payload };
    }
    return { manifestUrl, manifest: await this.getJson(manifestUrl, signal) };
  }

  // ── Protected helpers ───────────────────────────────────────────────────

  /**
   * GET `url` and read its body as text, all under the configured timeout
   * and User-Agent.  Non-2xx statuses become the matching
   * {@link AdapterError} subclass.
   */
  protected async getText(
    url: string,
    signal?: AbortSignal,
    accept = "application/json",
  ): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(
        new AdapterTimeoutError(
          `Request to ${url} timed out after ${this.config.timeoutMs}ms`,
          this.sourceId,
          this.kind,
        ),
      );
    }, this.config.timeoutMs);
    const onAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchFn(url, {
        headers: { "User-Agent": this.config.userAgent, Accept: accept },
        signal: controller.signal,
      });
      this.assertOk(response, url);
      // The body is read before the timer is cleared: a stalled stream
      // aborts like a stalled connect.
      return await untilAborted(response.text(), controller.signal);
    } catch (error: unknown) {
      throw this.wrapError(error, `GET ${url}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  protected async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const text = await this.getText(url, signal);
    try {
      return JSON.parse(text);
    } catch (error: unknown) {
      throw new AdapterParseError(
        `Invalid JSON from ${url}: ${errorMessage(error)}`,
        this.sourceId,
        this.kind,
        { cause: error },
      );
    }
  }

  /** {@link getJson} with the discovery retry policy applied. */
  protected async discoveryJson(url: string, signal?: AbortSignal): Promise<unknown> {
    return withRetry(() => this.getJson(url, signal), {
      maxRetries: this.options.discoveryRetries ?? 2,
      baseDelayMs: this.options.discoveryRetryDelayMs ?? 1_000,
      backoff: "exponential",
      onRetry: (err, attempt, delayMs) =>
        this.logger.warn({ url, attempt, delayMs, error: errorMessage(err) }, "Retrying discovery request"),
      ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
    });
  }

  /** Map a thrown value to an {@link AdapterError}; adapter errors pass through. */
  protected wrapError(error: unknown, context: string): AdapterError {
    if (error instanceof AdapterError) return error;

    if (
      error instanceof Error &&
      (error.name === "AbortError" || error.name === "TimeoutError")
    ) {
      return new AdapterTimeoutError(`${context} was aborted`, this.sourceId, this.kind, {
        cause: error,
      });
    }

    // fetch() rejects with a TypeError on network failure.
    if (error instanceof TypeError) {
      return new AdapterConnectionError(
        `Network error during ${context}: ${error.message}`,
        this.sourceId,
        this.kind,
        { cause: error },
      );
    }

    return new AdapterError(`${context} failed: ${errorMessage(error)}`, this.sourceId, this.kind, {
      cause: error,
    });
  }

  private assertOk(response: Response, url: string): void {
    if (response.ok) return;
    const status = response.status;
    const message = `HTTP ${status} from ${url}`;

    if (status === 404 || status === 410) {
      throw new AdapterNotFoundError(message, this.sourceId, this.kind);
    }
    if (status === 401 || status === 403) {
      throw new AdapterAuthError(message, this.sourceId, this.kind);
    }
    if (status === 429) {
      const retryAfter = Number(response.headers.get("retry-after"));
      throw new AdapterRateLimitError(
        message,
        this.sourceId,
        this.kind,
        Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : null,
      );
    }
    if (status >= 500) {
      throw new AdapterConnectionError(message, this.sourceId, this.kind);
    }
    throw new AdapterError(message, this.sourceId, this.kind);
  }
}
