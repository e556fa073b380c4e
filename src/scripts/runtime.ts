// ---------------------------------------------------------------------------
// Shared wiring for the command-line tools.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { AppConfig, SourceDefinition } from "../core/types.js";
import { loadConfig } from "../config/config.js";
import { findSource, loadSourceRegistry } from "../config/source-registry.js";
import { createLogger } from "../logging/logger.js";
import { createPool, initSchema, type SqlPool } from "../store/pg.js";
import { PgManuscriptStore } from "../store/pg-manuscript-store.js";

export interface CliRuntime {
  config: AppConfig;
  logger: Logger;
  sources: SourceDefinition[];
}

export function createRuntime(verbose: boolean): CliRuntime {
  const config = loadConfig();
  const logger = createLogger({
    level: verbose ? "debug" : config.logLevel,
    prettyPrint: config.env === "development",
    redactSecrets: true,
    stream: "stderr",
  });
  const sources = loadSourceRegistry(config.import.sourcesDir, {
    timeoutMs: config.import.timeoutMs,
    logger,
  });
  return { config, logger, sources };
}

export function requireSource(runtime: CliRuntime, id: string | undefined): SourceDefinition {
  if (!id) {
    throw new Error("--source is required (use --list to see configured sources)");
  }
  return findSource(runtime.sources, id);
}

export interface StoreHandle {
  pool: SqlPool;
  store: PgManuscriptStore;
}

/** The pool connects lazily; `bootstrap` creates missing tables first. */
export async function openStore(runtime: CliRuntime, bootstrap: boolean): Promise<StoreHandle> {
  const pool = createPool(runtime.config.database, runtime.logger.child({ module: "pg" }));
  if (bootstrap) await initSchema(pool);
  const store = new PgManuscriptStore(pool, runtime.logger, {
    retryDelayMs: runtime.config.import.retryDelayMs,
  });
  return { pool, store };
}

/** Parse a non-negative integer flag; `undefined` when absent. */
export function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return n;
}

/** Abort `controller` on the first SIGINT/SIGTERM; returns the detach function. */
export function abortOnSignals(controller: AbortController, logger: Logger): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    logger.warn({ signal }, "Interrupted; finishing the current item");
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return () => {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  };
}
