#!/usr/bin/env node
// ---------------------------------------------------------------------------
// compilatio-fallback-shelfmarks -- replace placeholder shelfmarks with the
// proper ones read from each row's manifest.
//
// Usage:
//   compilatio-fallback-shelfmarks --source <id> [--execute] [--limit N] [--verbose]
//
// Dry run unless --execute is given.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";

import { createAdapter } from "../../adapters/adapter-factory.js";
import { resolveFallbackShelfmarks } from "../../reconcile/fallback-resolver.js";
import { sleep } from "../../utils/sleep.js";
import { createRuntime, openStore, parseCount, requireSource } from "../runtime.js";

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      source: { type: "string" },
      execute: { type: "boolean", default: false },
      limit: { type: "string" },
      verbose: { type: "boolean", default: false },
    },
    strict: true,
  });
  const execute = values.execute ?? false;

  const runtime = createRuntime(values.verbose ?? false);
  const source = requireSource(runtime, values.source);
  const { pool, store } = await openStore(runtime, false);

  try {
    const result = await resolveFallbackShelfmarks({
      store,
      adapter: createAdapter(source, runtime.logger),
      source,
      logger: runtime.logger,
      execute,
      limit: parseCount(values.limit, "--limit"),
      delayMs: source.delayMs ?? runtime.config.import.delayMs,
      retry: { maxRetries: runtime.config.import.maxRetries, baseDelayMs: runtime.config.import.retryDelayMs },
      sleep,
    });

    const verb = execute ? "" : " (would be)";
    console.log(`\n=== Fallback shelfmarks: ${source.id} [${execute ? "EXECUTE" : "DRY RUN"}] ===`);
    console.log(`  Examined:         ${result.examined}`);
    console.log(`  Renamed${verb}:  ${result.renamed}`);
    console.log(`  Deleted${verb}:  ${result.deleted}`);
    console.log(`  Unresolved:       ${result.unresolved}`);
    console.log(`  Conflicts:        ${result.conflicts}`);
    console.log(`  Failed:           ${result.failed}`);
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
