import type { ChunkResult } from "./chunk.entity.js";

export interface RunSummary {
  runId: string;
  sourcePath: string;
  startedAt: string;
  finishedAt: string;
  totalDurationMs: number;
  totalChunks: number;
  successCount: number;
  failureCount: number;
  /** Undefined when no chunk succeeded. */
  averageSuccessDurationMs?: number;
  p50SuccessDurationMs?: number;
  p95SuccessDurationMs?: number;
  linesLoaded: number;
  linesPerSecond: number;
  /** Always ordered by chunk index. */
  results: ChunkResult[];
}

export interface CleanupOutcome {
  deleted: boolean;
  workspaceDir: string;
  removedFiles: string[];
  /** Set when deletion was attempted and failed part-way. */
  error?: string;
}
