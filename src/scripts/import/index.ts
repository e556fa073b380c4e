#!/usr/bin/env node
// ---------------------------------------------------------------------------
// compilatio-import -- run one source's importer.
//
// Usage:
//   compilatio-import --source <id> [--execute] [--test] [--limit N]
//                     [--resume] [--discover-only] [--skip-discovery]
//                     [--checkpoint-dir DIR] [--verbose]
//   compilatio-import --list
//
// Without --execute nothing is written to the database.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";

import { createAdapter } from "../../adapters/adapter-factory.js";
import { CheckpointStore } from "../../checkpoint/checkpoint-store.js";
import { ImportOrchestrator } from "../../orchestrator/import-orchestrator.js";
import { printRunSummary } from "../../orchestrator/run-summary.js";
import { sleep } from "../../utils/sleep.js";
import {
  abortOnSignals,
  createRuntime,
  openStore,
  parseCount,
  requireSource,
  type CliRuntime,
  type StoreHandle,
} from "../runtime.js";

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      source: { type: "string" },
      execute: { type: "boolean", default: false },
      test: { type: "boolean", default: false },
      limit: { type: "string" },
      resume: { type: "boolean", default: false },
      "discover-only": { type: "boolean", default: false },
      "skip-discovery": { type: "boolean", default: false },
      "checkpoint-dir": { type: "string" },
      verbose: { type: "boolean", default: false },
      list: { type: "boolean", default: false },
    },
    strict: true,
  });

  return {
    source: values.source,
    execute: values.execute ?? false,
    test: values.test ?? false,
    limit: parseCount(values.limit, "--limit"),
    resume: values.resume ?? false,
    discoverOnly: values["discover-only"] ?? false,
    skipDiscovery: values["skip-discovery"] ?? false,
    checkpointDir: values["checkpoint-dir"],
    verbose: values.verbose ?? false,
    list: values.list ?? false,
  };
}

function listSources(runtime: CliRuntime): void {
  console.log("Configured sources:");
  for (const s of runtime.sources) {
    const state = s.enabled ? "" : " (disabled)";
    console.log(`  ${s.id.padEnd(24)} ${s.adapter.kind.padEnd(16)} ${s.repository.name}${state}`);
  }
}

async function main(): Promise<void> {
  const opts = parseCliArgs();
  const runtime = createRuntime(opts.verbose);

  if (opts.list) {
    listSources(runtime);
    return;
  }

  const source = requireSource(runtime, opts.source);
  const { config, logger } = runtime;
  if (!source.enabled) {
    logger.warn({ sourceId: source.id }, "Source is disabled in its config; running anyway");
  }

  const checkpoint = new CheckpointStore({
    directory: opts.checkpointDir ?? config.import.checkpointDir,
    sourceId: source.id,
    logger,
  });
  await checkpoint.acquireLock();

  const controller = new AbortController();
  const detach = abortOnSignals(controller, logger);
  let handle: StoreHandle | undefined;

  try {
    handle = await openStore(runtime, opts.execute && !opts.discoverOnly);
    const { store } = handle;
    const orchestrator = new ImportOrchestrator({
      source,
      adapter: createAdapter(source, logger),
      store,
      checkpoint,
      logger,
      delayMs: source.delayMs ?? config.import.delayMs,
      retry: { maxRetries: config.import.maxRetries, baseDelayMs: config.import.retryDelayMs },
      testModeCap: config.import.testModeCap,
      sleep,
    });

    const summary = await orchestrator.run({
      execute: opts.execute,
      resume: opts.resume,
      test: opts.test,
      limit: opts.limit,
      discoverOnly: opts.discoverOnly,
      skipDiscovery: opts.skipDiscovery,
      verbose: opts.verbose,
      signal: controller.signal,
    });
    printRunSummary(summary);
    if (summary.interrupted) process.exitCode = 130;
  } finally {
    detach();
    await handle?.pool.end();
    await checkpoint.release();
  }
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
