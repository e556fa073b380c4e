// ---------------------------------------------------------------------------
// Bounded retry with fixed or exponential delay.
// ---------------------------------------------------------------------------

import {
  AdapterAuthError,
  AdapterConnectionError,
  AdapterError,
  AdapterNotFoundError,
  AdapterParseError,
  AdapterRateLimitError,
  AdapterTimeoutError,
  ManifestParseError,
} from "../core/errors.js";
import { sleep as defaultSleep } from "../utils/sleep.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface RetryOptions {
  /** Maximum number of retries (0 means no retries, just the initial call). */
  maxRetries: number;
  /** Delay in milliseconds before the first retry. */
  baseDelayMs: number;
  /** `fixed` waits `baseDelayMs` every time; `exponential` doubles it per attempt. */
  backoff?: "fixed" | "exponential";
  /**
   * Predicate that decides whether a given error is retryable.
   *
   * When omitted the default policy is used:
   * - Retry: connection, timeout and rate-limit errors
   * - Do NOT retry: auth, not-found and parse errors
   */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each wait; `attempt` is 1 for the first retry. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

// ── Default retry predicate ────────────────────────────────────────────────

/**
 * Default predicate: transient network conditions are retried, anything the
 * remote side answered definitively is not.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof AdapterConnectionError) return true;
  if (error instanceof AdapterTimeoutError) return true;
  if (error instanceof AdapterRateLimitError) return true;

  // Permanent failures -- do not retry.
  if (error instanceof AdapterAuthError) return false;
  if (error instanceof AdapterNotFoundError) return false;
  if (error instanceof AdapterParseError) return false;
  if (error instanceof ManifestParseError) return false;
  // Any other status the adapter classified (e.g. HTTP 400) is final too.
  if (error instanceof AdapterError) return false;

  // Unknown errors -- default to retryable so we don't silently drop.
  return true;
}

// ── Delay helper ───────────────────────────────────────────────────────────

function computeDelay(
  attempt: number,
  options: Pick<RetryOptions, "baseDelayMs" | "backoff">,
  error: unknown,
): number {
  const base =
    options.backoff === "exponential"
      ? options.baseDelayMs * 2 ** attempt
      : options.baseDelayMs;
  if (error instanceof AdapterRateLimitError && error.retryAfterMs !== null) {
    return Math.max(base, error.retryAfterMs);
  }
  return base;
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn` with retry semantics.
 *
 * On failure `shouldRetry` is consulted.  If `true`, the function sleeps
 * and tries again, up to `maxRetries` times.
 *
 * If all attempts are exhausted, the last error is thrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    shouldRetry = isTransientError,
    onRetry,
    sleep = defaultSleep,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      // If not retryable or we've exhausted attempts, bail out.
      if (!shouldRetry(error) || attempt >= maxRetries) {
        throw error;
      }

      const delay = computeDelay(attempt, options, error);
      onRetry?.(error, attempt + 1, delay);
      await sleep(delay);
    }
  }
}
