import { formatBytes, formatDuration } from "./utils.js";
import type { BatchReport, SkipReason, TaskOutcome } from "./types.js";

const SKIP_LABELS: Record<SkipReason, string> = {
  "already-target-format": "already target format",
  "unknown-format": "unknown format",
  "explicitly-skipped-format": "skipped format",
  "unsupported-format": "unsupported format",
};

export function summarize(outcomes: readonly TaskOutcome[], elapsedMs?: number): BatchReport {
  const report: BatchReport = {
    total: outcomes.length,
    converted: 0,
    skipped: 0,
    errors: 0,
    deleted: 0,
    deleteFailures: 0,
    inputBytes: 0,
    outputBytes: 0,
    savedBytes: 0,
    elapsedMs: elapsedMs ?? null,
    throughput: 0,
  };

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case "converted":
        report.converted++;
        report.inputBytes += outcome.inputBytes;
        report.outputBytes += outcome.outputBytes;
        if (outcome.deleted) report.deleted++;
        if (outcome.deleteError !== undefined) report.deleteFailures++;
        break;
      case "skipped":
        report.skipped++;
        break;
      case "error":
        report.errors++;
        break;
    }
  }

  report.savedBytes = report.inputBytes - report.outputBytes;

  if (elapsedMs !== undefined && elapsedMs > 0) {
    report.throughput = report.converted / (elapsedMs / 1000);
  }

  return report;
}

export function describeOutcome(outcome: TaskOutcome): string {
  switch (outcome.status) {
    case "converted": {
      const line = `Converted ${outcome.source} to ${outcome.dest}`;
      if (outcome.deleteError !== undefined) {
        return `${line}, but delete failed: ${outcome.deleteError}`;
      }
      return outcome.deleted ? `${line} | Deleted original ${outcome.source}` : line;
    }
    case "skipped": {
      const label = SKIP_LABELS[outcome.reason];
      const detail =
        outcome.format && outcome.reason !== "already-target-format" ? ` ${outcome.format}` : "";
      return `Skipped (${label}${detail}): ${outcome.source}`;
    }
    case "error":
      return `Error processing ${outcome.source}: ${outcome.message}`;
  }
}

export function renderSummary(report: BatchReport): string[] {
  const ratio =
    report.inputBytes > 0 ? ((report.savedBytes / report.inputBytes) * 100).toFixed(2) + "%" : "0%";

  const lines = [
    "Conversion completed:",
    `  Total files: ${report.total}`,
    `  Converted:   ${report.converted}`,
    `  Skipped:     ${report.skipped}`,
    `  Errors:      ${report.errors}`,
  ];

  if (report.deleted > 0 || report.deleteFailures > 0) {
    lines.push(`  Deleted:     ${report.deleted} (${report.deleteFailures} failed)`);
  }

  if (report.elapsedMs !== null) {
    lines.push(`  Duration:    ${formatDuration(report.elapsedMs)}`);
    lines.push(`  Throughput:  ${report.throughput.toFixed(2)} files/s`);
  }

  lines.push(`  Total size:  ${formatBytes(report.inputBytes)}`);
  lines.push(`  Saved:       ${formatBytes(report.savedBytes)}`);
  lines.push(`  Compression: ${ratio}`);

  return lines;
}
