/**
 * Duration statistics over successful chunks and run throughput.
 */

import { mean, quantile } from "simple-statistics";
import type { ChunkResult } from "../../core/domain/entities/chunk.entity.js";

export interface DurationStats {
  averageMs?: number;
  p50Ms?: number;
  p95Ms?: number;
}

export function computeSuccessDurationStats(
  results: ChunkResult[],
): DurationStats {
  const durations = results
    .filter((r) => r.status === "SUCCESS")
    .map((r) => r.durationMs);
  if (durations.length === 0) return {};
  return {
    averageMs: mean(durations),
    p50Ms: quantile(durations, 0.5),
    p95Ms: quantile(durations, 0.95),
  };
}

export function computeLinesPerSecond(
  linesLoaded: number,
  totalDurationMs: number,
): number {
  const seconds = totalDurationMs / 1000;
  return seconds > 0 ? linesLoaded / seconds : 0;
}

export function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}
