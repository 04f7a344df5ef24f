import { basename } from "node:path";
import { performance } from "node:perf_hooks";
import PQueue from "p-queue";
import type { Chunk, ChunkResult } from "../domain/entities/chunk.entity.js";
import { errorMessage } from "../domain/errors.js";
import type {
  ChunkLoadOutcome,
  IChunkLoader,
} from "../domain/services/chunk-loader.service.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type { IProgressReporter } from "../domain/services/progress-reporter.service.js";
import { formatSeconds } from "../../infrastructure/utils/metrics.utils.js";

/** Same code GNU timeout(1) exits with. */
export const TIMEOUT_EXIT_CODE = 124;

export interface RunChunksRequest {
  runId: string;
  chunks: Chunk[];
  destination: string;
  concurrency: number;
  /** 0 or undefined: no timeout. */
  timeoutMs?: number;
  onChunkComplete?: (result: ChunkResult, done: number, total: number) => void;
}

/**
 * Default parallelism: one worker per chunk, capped so that a very large
 * chunk count does not oversubscribe the host.
 */
export function resolveConcurrency(
  chunkCount: number,
  maxConcurrency: number,
  requested?: number,
): number {
  const wanted = requested ?? Math.min(chunkCount, maxConcurrency);
  return Math.max(1, Math.min(wanted, chunkCount));
}

export class RunChunksUseCase {
  constructor(
    private loader: IChunkLoader,
    private reporter: IProgressReporter,
    private logger: ILogger,
  ) {}

  async execute(request: RunChunksRequest): Promise<ChunkResult[]> {
    const { chunks } = request;
    const total = chunks.length;
    const queue = new PQueue({ concurrency: request.concurrency });
    const results = new Map<number, ChunkResult>();
    let done = 0;

    const tasks = chunks.map((chunk) =>
      queue.add(async () => {
        const result = await this.runOne(chunk, total, request);
        results.set(chunk.index, result);
        done += 1;
        request.onChunkComplete?.(result, done, total);
      }),
    );
    await Promise.all(tasks);

    return chunks.map((chunk) => {
      const result = results.get(chunk.index);
      if (!result) {
        throw new Error(`Chunk ${chunk.index + 1} finished without a result.`);
      }
      return result;
    });
  }

  private async runOne(
    chunk: Chunk,
    total: number,
    request: RunChunksRequest,
  ): Promise<ChunkResult> {
    const label = `${chunk.index + 1}/${total}`;
    this.reporter.event(
      `Starting import of chunk ${label}: ${basename(chunk.filePath)}`,
    );
    const startedAt = performance.now();
    const outcome = await this.loadWithTimeout(chunk, request);
    const durationMs = performance.now() - startedAt;

    const status = outcome.exitCode === 0 ? "SUCCESS" : "FAILED";
    if (status === "FAILED") {
      this.reporter.error(`Error output: ${outcome.stderr}`);
    }
    this.reporter.event(
      `${status}: Chunk ${label} completed in ${formatSeconds(durationMs)} seconds`,
    );

    const result: ChunkResult = {
      chunk: chunk.index + 1,
      index: chunk.index,
      filePath: chunk.filePath,
      status,
      durationMs,
      exitCode: outcome.exitCode,
      stderr: outcome.stderr,
      lineCount: chunk.lineCount,
      ...(outcome.rowsLoaded !== undefined
        ? { rowsLoaded: outcome.rowsLoaded }
        : {}),
    };
    this.logger.log({
      runId: request.runId,
      event: "chunk_finished",
      chunk: result.chunk,
      filePath: result.filePath,
      status: result.status,
      durationMs: Math.round(result.durationMs),
      exitCode: result.exitCode,
      lineCount: result.lineCount,
      rowsLoaded: result.rowsLoaded,
      stderr: result.stderr || undefined,
    });
    return result;
  }

  private async loadWithTimeout(
    chunk: Chunk,
    request: RunChunksRequest,
  ): Promise<ChunkLoadOutcome> {
    const timeoutMs = request.timeoutMs ?? 0;
    const controller = new AbortController();
    const load = this.safeLoad(chunk, request.destination, controller.signal);
    if (timeoutMs <= 0) return load;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<ChunkLoadOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          exitCode: TIMEOUT_EXIT_CODE,
          stderr: `Chunk load timed out after ${timeoutMs} ms`,
        });
      }, timeoutMs);
    });
    try {
      return await Promise.race([load, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Loader exceptions become a failed outcome instead of escaping the queue. */
  private async safeLoad(
    chunk: Chunk,
    destination: string,
    signal: AbortSignal,
  ): Promise<ChunkLoadOutcome> {
    try {
      return await this.loader.load(chunk.filePath, destination, { signal });
    } catch (e) {
      return { exitCode: 1, stderr: errorMessage(e) };
    }
  }
}
