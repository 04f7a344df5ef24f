/**
 * Result aggregation: run summary, the printed report, and the cleanup policy.
 */

import { rm, unlink } from "node:fs/promises";
import type { Chunk, ChunkResult } from "../domain/entities/chunk.entity.js";
import type { CleanupPolicy } from "../domain/entities/config.entity.js";
import type {
  CleanupOutcome,
  RunSummary,
} from "../domain/entities/run-summary.entity.js";
import type { RunWorkspace } from "../domain/entities/run-workspace.entity.js";
import { errorMessage } from "../domain/errors.js";
import {
  computeLinesPerSecond,
  computeSuccessDurationStats,
  formatSeconds,
} from "../../infrastructure/utils/metrics.utils.js";

export interface RunTiming {
  runId: string;
  sourcePath: string;
  startedAt: Date;
  finishedAt: Date;
}

const BANNER = "=".repeat(50);

export function sortByChunkIndex(results: ChunkResult[]): ChunkResult[] {
  return [...results].sort((a, b) => a.index - b.index);
}

export function summarize(results: ChunkResult[], timing: RunTiming): RunSummary {
  const sorted = sortByChunkIndex(results);
  const successes = sorted.filter((r) => r.status === "SUCCESS");
  const stats = computeSuccessDurationStats(sorted);
  const totalDurationMs = timing.finishedAt.getTime() - timing.startedAt.getTime();
  const linesLoaded = successes.reduce((sum, r) => sum + r.lineCount, 0);

  return {
    runId: timing.runId,
    sourcePath: timing.sourcePath,
    startedAt: timing.startedAt.toISOString(),
    finishedAt: timing.finishedAt.toISOString(),
    totalDurationMs,
    totalChunks: sorted.length,
    successCount: successes.length,
    failureCount: sorted.length - successes.length,
    averageSuccessDurationMs: stats.averageMs,
    p50SuccessDurationMs: stats.p50Ms,
    p95SuccessDurationMs: stats.p95Ms,
    linesLoaded,
    linesPerSecond: computeLinesPerSecond(linesLoaded, totalDurationMs),
    results: sorted,
  };
}

export function allSucceeded(summary: RunSummary): boolean {
  return summary.results.every((r) => r.status === "SUCCESS");
}

export function formatRunReport(summary: RunSummary): string[] {
  const lines = [
    "",
    BANNER,
    `IMPORT JOB COMPLETED in ${formatSeconds(summary.totalDurationMs)} seconds`,
    BANNER,
    `Total chunks: ${summary.totalChunks}`,
    `Successful chunks: ${summary.successCount}`,
    `Failed chunks: ${summary.failureCount}`,
  ];
  if (summary.averageSuccessDurationMs !== undefined) {
    lines.push(
      `Average time per successful chunk: ${formatSeconds(summary.averageSuccessDurationMs)} seconds`,
    );
  }
  lines.push("", "DETAILED RESULTS:");
  for (const r of sortByChunkIndex(summary.results)) {
    lines.push(
      `Chunk ${r.chunk}: ${r.status} in ${formatSeconds(r.durationMs)} seconds`,
    );
  }
  return lines;
}

/**
 * Deletes every chunk file and the cleaned file, then the workspace directory,
 * only when every chunk succeeded and the policy allows it.
 */
export async function cleanupWorkspace(
  workspace: RunWorkspace,
  chunks: Chunk[],
  summary: RunSummary,
  policy: CleanupPolicy,
): Promise<CleanupOutcome> {
  if (policy === "never" || !allSucceeded(summary)) {
    return { deleted: false, workspaceDir: workspace.dir, removedFiles: [] };
  }
  const removedFiles: string[] = [];
  try {
    for (const path of [...chunks.map((c) => c.filePath), workspace.cleanedPath]) {
      await unlink(path);
      removedFiles.push(path);
    }
    await rm(workspace.dir, { recursive: true, force: true });
  } catch (e) {
    // the chunks are already loaded; a failed delete only leaves files behind
    return {
      deleted: false,
      workspaceDir: workspace.dir,
      removedFiles,
      error: errorMessage(e),
    };
  }
  return { deleted: true, workspaceDir: workspace.dir, removedFiles };
}
