/**
 * Machine-readable run summary: `import-summary_<runId>.json`, with older
 * summaries pruned down to the configured retain count.
 */

import {
  existsSync,
  mkdirSync,
  readdirSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import type { ReportConfig } from "../../core/domain/entities/config.entity.js";
import type {
  CleanupOutcome,
  RunSummary,
} from "../../core/domain/entities/run-summary.entity.js";

const REPORT_PREFIX = "import-summary_";

export interface SummaryReport extends RunSummary {
  loader: string;
  destination: string;
  cleanup: CleanupOutcome;
}

function pruneOldReports(outDir: string, retainCount: number): string[] {
  const reports = readdirSync(outDir)
    .filter((name) => name.startsWith(REPORT_PREFIX) && name.endsWith(".json"))
    .map((name) => {
      const path = join(outDir, name);
      return { path, mtimeMs: statSync(path).mtimeMs, name };
    })
    .sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name));
  const removed: string[] = [];
  for (const report of reports.slice(retainCount)) {
    unlinkSync(report.path);
    removed.push(report.path);
  }
  return removed;
}

export function writeSummaryReport(
  config: ReportConfig,
  report: SummaryReport,
): string {
  const outDir = config.outputDir;
  if (!existsSync(outDir)) mkdirSync(outDir, { recursive: true });
  const path = join(outDir, `${REPORT_PREFIX}${report.runId}.json`);
  writeFileSync(path, JSON.stringify(report, null, 2), "utf-8");
  if (config.retainCount > 0) pruneOldReports(outDir, config.retainCount);
  return path;
}
