#!/usr/bin/env node
// ---------------------------------------------------------------------------
// compilatio-fix-thumbnails -- re-derive stored thumbnails from each row's
// manifest and replace the ones that differ.
//
// Usage:
//   compilatio-fix-thumbnails --source <id> [--execute] [--resume]
//                             [--missing-only] [--limit N]
//                             [--checkpoint-dir DIR] [--verbose]
//
// Dry run unless --execute is given.  Executed runs keep a checkpoint
// under "<source>-thumbnails" so that --resume skips rows already done.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";

import { createAdapter } from "../../adapters/adapter-factory.js";
import { CheckpointStore } from "../../checkpoint/checkpoint-store.js";
import { repairThumbnails } from "../../reconcile/thumbnail-repair.js";
import { sleep } from "../../utils/sleep.js";
import { abortOnSignals, createRuntime, openStore, parseCount, requireSource } from "../runtime.js";

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      source: { type: "string" },
      execute: { type: "boolean", default: false },
      resume: { type: "boolean", default: false },
      "missing-only": { type: "boolean", default: false },
      limit: { type: "string" },
      "checkpoint-dir": { type: "string" },
      verbose: { type: "boolean", default: false },
    },
    strict: true,
  });
  const execute = values.execute ?? false;

  const runtime = createRuntime(values.verbose ?? false);
  const { config, logger } = runtime;
  const source = requireSource(runtime, values.source);

  const checkpoint = new CheckpointStore({
    directory: values["checkpoint-dir"] ?? config.import.checkpointDir,
    sourceId: `${source.id}-thumbnails`,
    logger,
  });
  if (execute) await checkpoint.acquireLock();

  const controller = new AbortController();
  const detach = abortOnSignals(controller, logger);
  const { pool, store } = await openStore(runtime, false);

  try {
    const result = await repairThumbnails({
      store,
      adapter: createAdapter(source, logger),
      source,
      logger,
      execute,
      checkpoint,
      resume: values.resume ?? false,
      missingOnly: values["missing-only"] ?? false,
      limit: parseCount(values.limit, "--limit"),
      delayMs: source.delayMs ?? config.import.delayMs,
      retry: { maxRetries: config.import.maxRetries, baseDelayMs: config.import.retryDelayMs },
      sleep: (ms) => sleep(ms, controller.signal),
      signal: controller.signal,
    });

    const verb = execute ? "" : " (would be)";
    console.log(`\n=== Thumbnails: ${source.id} [${execute ? "EXECUTE" : "DRY RUN"}] ===`);
    console.log(`  Examined:         ${result.examined}`);
    console.log(`  Already settled:  ${result.alreadySettled}`);
    console.log(`  Updated${verb}:  ${result.updated}`);
    console.log(`  Unchanged:        ${result.unchanged}`);
    console.log(`  No thumbnail:     ${result.missing}`);
    console.log(`  Failed:           ${result.failed}`);
    if (result.interrupted) {
      console.log("  Interrupted: rerun with --resume to continue");
      process.exitCode = 130;
    }
  } finally {
    detach();
    await pool.end();
    await checkpoint.release();
  }
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
