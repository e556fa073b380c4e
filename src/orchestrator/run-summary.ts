import type { RunSummary } from "./import-orchestrator.js";

/** Human-readable end-of-run report. */
export function formatRunSummary(summary: RunSummary): string {
  const mode = summary.dryRun ? "DRY RUN" : "EXECUTE";
  const wouldBe = summary.dryRun ? " (would be)" : "";
  const lines = [
    `=== Import summary: ${summary.sourceId} [${mode}] ===`,
    `  Discovered:        ${summary.discovered}`,
    `  Already settled:   ${summary.alreadySettled}`,
    `  Processed:         ${summary.processed}`,
    `  Inserted${wouldBe}: ${summary.inserted}`,
    `  Updated${wouldBe}:  ${summary.updated}`,
    `  Completed:         ${summary.completed}`,
    `  Skipped:           ${summary.skipped}`,
    `  Failed:            ${summary.failed}`,
    `  Duplicates:        ${summary.duplicates}`,
    `  Phase:             ${summary.phase}`,
  ];
  if (summary.interrupted) lines.push("  Interrupted: rerun with --resume to continue");
  if (summary.dryRun) lines.push("  No changes were written; pass --execute to import.");
  return lines.join("\n");
}

export function printRunSummary(summary: RunSummary): void {
  console.log(`\n${formatRunSummary(summary)}`);
}
