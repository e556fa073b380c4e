// ---------------------------------------------------------------------------
// Error hierarchy for Compilatio.
// ---------------------------------------------------------------------------

import type { AdapterKind } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all Compilatio domain errors.
 */
export class CompilatioError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CompilatioError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Adapter errors ──────────────────────────────────────────────────────────

/**
 * Base class for errors originating from a source adapter.
 */
export class AdapterError extends CompilatioError {
  public readonly sourceId: string;
  public readonly kind: AdapterKind;

  constructor(
    message: string,
    sourceId: string,
    kind: AdapterKind,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "AdapterError";
    this.sourceId = sourceId;
    this.kind = kind;
  }
}

/** The adapter could not reach the remote host, or it answered 5xx. */
export class AdapterConnectionError extends AdapterError {
  constructor(
    message: string,
    sourceId: string,
    kind: AdapterKind,
    options?: ErrorOptions,
  ) {
    super(message, sourceId, kind, options);
    this.name = "AdapterConnectionError";
  }
}

/** The adapter's request exceeded the allowed timeout. */
export class AdapterTimeoutError extends AdapterError {
  constructor(
    message: string,
    sourceId: string,
    kind: AdapterKind,
    options?: ErrorOptions,
  ) {
    super(message, sourceId, kind, options);
    this.name = "AdapterTimeoutError";
  }
}

/** The remote host refused access (401 / 403). */
export class AdapterAuthError extends AdapterError {
  constructor(
    message: string,
    sourceId: string,
    kind: AdapterKind,
    options?: ErrorOptions,
  ) {
    super(message, sourceId, kind, options);
    this.name = "AdapterAuthError";
  }
}

/** The remote system told us we are rate-limited. */
export class AdapterRateLimitError extends AdapterError {
  public readonly retryAfterMs: number | null;

  constructor(
    message: string,
    sourceId: string,
    kind: AdapterKind,
    retryAfterMs: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, sourceId, kind, options);
    this.name = "AdapterRateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

/** The requested document does not exist (404 / 410). */
export class AdapterNotFoundError extends AdapterError {
  constructor(
    message: string,
    sourceId: string,
    kind: AdapterKind,
    options?: ErrorOptions,
  ) {
    super(message, sourceId, kind, options);
    this.name = "AdapterNotFoundError";
  }
}

/** The adapter received a response it could not parse. */
export class AdapterParseError extends AdapterError {
  constructor(
    message: string,
    sourceId: string,
    kind: AdapterKind,
    options?: ErrorOptions,
  ) {
    super(message, sourceId, kind, options);
    this.name = "AdapterParseError";
  }
}

// ── Pipeline errors ─────────────────────────────────────────────────────────

/** A manifest lacks a mandatory field or has an unusable shape. */
export class ManifestParseError extends CompilatioError {
  public readonly field: string;

  constructor(field: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ManifestParseError";
    this.field = field;
  }
}

/** Candidates could not be enumerated at all.  Fatal for the run. */
export class DiscoveryError extends CompilatioError {
  public readonly sourceId: string;

  constructor(sourceId: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DiscoveryError";
    this.sourceId = sourceId;
  }
}

/** The checkpoint file could not be read, written or locked. */
export class CheckpointError extends CompilatioError {
  public readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CheckpointError";
    this.path = path;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A write or query against the aggregate store failed. */
export class StoreError extends CompilatioError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreError";
  }
}

/** The aggregate store cannot be reached at all.  Fatal for the run. */
export class StoreUnavailableError extends StoreError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

// ── API errors ──────────────────────────────────────────────────────────────

/** A read-API request carried an invalid path or query parameter. */
export class InvalidRequestError extends CompilatioError {
  public readonly parameter: string;

  constructor(parameter: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvalidRequestError";
    this.parameter = parameter;
  }
}

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends CompilatioError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** Render any thrown value as a one-line message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
