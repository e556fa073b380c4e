// ---------------------------------------------------------------------------
// Tests for bounded retry and the transient-error policy.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi } from "vitest";

import { isTransientError, withRetry } from "../../../src/orchestrator/retry.js";
import {
  AdapterAuthError,
  AdapterConnectionError,
  AdapterError,
  AdapterNotFoundError,
  AdapterParseError,
  AdapterRateLimitError,
  AdapterTimeoutError,
  ManifestParseError,
} from "../../../src/core/errors.js";

const SRC = "test-library";
const KIND = "iiif-collection" as const;

/**
 * Create a function that throws on the first N calls and then resolves.
 */
function failThenSucceed(error: Error, failCount: number, successValue = "ok") {
  let calls = 0;
  return async (): Promise<string> => {
    calls++;
    if (calls <= failCount) throw error;
    return successValue;
  };
}

function alwaysFail(error: Error) {
  return async (): Promise<string> => {
    throw error;
  };
}

/** Records requested delays instead of waiting. */
function fakeSleep() {
  return vi.fn(async (_ms: number): Promise<void> => undefined);
}

describe("withRetry", () => {
  // ── Successful calls ──────────────────────────────────────────────────

  it("returns the result when the function succeeds on the first call", async () => {
    const fn = vi.fn(async () => "ok");
    const sleep = fakeSleep();
    const result = await withRetry(fn, { maxRetries: 3, baseDelayMs: 100, sleep });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  // ── Retries on transient errors ───────────────────────────────────────

  it("retries and succeeds after transient failures", async () => {
    const fn = vi.fn(failThenSucceed(new AdapterConnectionError("conn fail", SRC, KIND), 2, "recovered"));
    const sleep = fakeSleep();

    const result = await withRetry(fn, { maxRetries: 3, baseDelayMs: 10, sleep });

    expect(result).toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 10]);
  });

  it("doubles the delay with exponential backoff", async () => {
    const fn = failThenSucceed(new AdapterTimeoutError("timeout", SRC, KIND), 3);
    const sleep = fakeSleep();

    await withRetry(fn, { maxRetries: 3, baseDelayMs: 100, backoff: "exponential", sleep });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 400]);
  });

  it("waits at least as long as a rate limit asks", async () => {
    const fn = failThenSucceed(new AdapterRateLimitError("slow down", SRC, KIND, 5_000), 1);
    const sleep = fakeSleep();

    await withRetry(fn, { maxRetries: 1, baseDelayMs: 100, sleep });

    expect(sleep).toHaveBeenCalledWith(5_000);
  });

  it("reports each retry before waiting", async () => {
    const onRetry = vi.fn();
    const error = new AdapterConnectionError("conn fail", SRC, KIND);
    await withRetry(failThenSucceed(error, 1), {
      maxRetries: 2,
      baseDelayMs: 10,
      onRetry,
      sleep: fakeSleep(),
    });
    expect(onRetry).toHaveBeenCalledWith(error, 1, 10);
  });

  // ── Stops after max retries ───────────────────────────────────────────

  it("throws the last error after exhausting all retries", async () => {
    const fn = vi.fn(alwaysFail(new AdapterConnectionError("conn fail", SRC, KIND)));

    await expect(
      withRetry(fn, { maxRetries: 2, baseDelayMs: 10, sleep: fakeSleep() }),
    ).rejects.toThrow("conn fail");
    // initial call + 2 retries = 3
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry when maxRetries is 0", async () => {
    const fn = vi.fn(alwaysFail(new AdapterConnectionError("fail", SRC, KIND)));

    await expect(
      withRetry(fn, { maxRetries: 0, baseDelayMs: 10, sleep: fakeSleep() }),
    ).rejects.toBeInstanceOf(AdapterConnectionError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  // ── Non-retryable errors ──────────────────────────────────────────────

  it("does not retry a definitive answer", async () => {
    const fn = vi.fn(alwaysFail(new AdapterNotFoundError("HTTP 404", SRC, KIND)));

    await expect(
      withRetry(fn, { maxRetries: 5, baseDelayMs: 10, sleep: fakeSleep() }),
    ).rejects.toBeInstanceOf(AdapterNotFoundError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  // ── Custom shouldRetry ────────────────────────────────────────────────

  it("uses a custom shouldRetry predicate when provided", async () => {
    const fn = vi.fn(alwaysFail(new Error("non-retryable")));

    await expect(
      withRetry(fn, {
        maxRetries: 5,
        baseDelayMs: 10,
        shouldRetry: () => false,
        sleep: fakeSleep(),
      }),
    ).rejects.toThrow("non-retryable");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("isTransientError", () => {
  it("retries network conditions", () => {
    expect(isTransientError(new AdapterConnectionError("x", SRC, KIND))).toBe(true);
    expect(isTransientError(new AdapterTimeoutError("x", SRC, KIND))).toBe(true);
    expect(isTransientError(new AdapterRateLimitError("x", SRC, KIND))).toBe(true);
  });

  it("does not retry definitive failures", () => {
    expect(isTransientError(new AdapterAuthError("x", SRC, KIND))).toBe(false);
    expect(isTransientError(new AdapterNotFoundError("x", SRC, KIND))).toBe(false);
    expect(isTransientError(new AdapterParseError("x", SRC, KIND))).toBe(false);
    expect(isTransientError(new AdapterError("HTTP 400", SRC, KIND))).toBe(false);
    expect(isTransientError(new ManifestParseError("id", "missing_id"))).toBe(false);
  });

  it("retries unknown errors", () => {
    expect(isTransientError(new Error("mysterious"))).toBe(true);
  });
});
