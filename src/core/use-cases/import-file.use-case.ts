import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import type { ChunkResult } from "../domain/entities/chunk.entity.js";
import type { CleanupPolicy } from "../domain/entities/config.entity.js";
import type {
  CleanupOutcome,
  RunSummary,
} from "../domain/entities/run-summary.entity.js";
import { InputError } from "../domain/errors.js";
import type { IChunkLoader } from "../domain/services/chunk-loader.service.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type { IProgressReporter } from "../domain/services/progress-reporter.service.js";
import { createRunWorkspace } from "../../infrastructure/utils/workspace.utils.js";
import { assertChunkCount, SplitFileUseCase } from "./split-file.use-case.js";
import { resolveConcurrency, RunChunksUseCase } from "./run-chunks.use-case.js";
import {
  allSucceeded,
  cleanupWorkspace,
  formatRunReport,
  summarize,
} from "./summarize-run.use-case.js";

export interface ImportFileRequest {
  runId: string;
  sourcePath: string;
  chunkCount: number;
  destination: string;
  maxConcurrency: number;
  concurrency?: number;
  chunkTimeoutMs?: number;
  workDir?: string;
  cleanup: CleanupPolicy;
  onChunkComplete?: (result: ChunkResult, done: number, total: number) => void;
}

export interface ImportFileResult {
  summary: RunSummary;
  cleanup: CleanupOutcome;
}

export async function assertReadableFile(path: string): Promise<void> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new InputError(`Error: '${path}' is not a regular file.`);
    }
    await access(path, constants.R_OK);
  } catch (e) {
    if (e instanceof InputError) throw e;
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      throw new InputError(`Error: File '${path}' does not exist.`, { cause: e });
    }
    throw new InputError(`Error: File '${path}' is not readable.`, { cause: e });
  }
}

export class ImportFileUseCase {
  constructor(
    private loader: IChunkLoader,
    private reporter: IProgressReporter,
    private logger: ILogger,
  ) {}

  async execute(request: ImportFileRequest): Promise<ImportFileResult> {
    const { runId, sourcePath, chunkCount } = request;
    await assertReadableFile(sourcePath);
    assertChunkCount(chunkCount);

    const startedAt = new Date();
    this.reporter.event("Starting TAQ trade data import");
    this.reporter.line(`Input file: ${sourcePath}`);
    this.reporter.line(`Number of chunks: ${chunkCount}`);

    const workspace = await createRunWorkspace(runId, request.workDir);
    this.reporter.line(`Working directory: ${workspace.dir}`);
    this.logger.log({
      runId,
      event: "run_started",
      sourcePath,
      chunkCount,
      workspace: workspace.dir,
      loader: this.loader.name,
      destination: request.destination,
    });

    const split = await new SplitFileUseCase(this.reporter).execute({
      sourcePath,
      chunkCount,
      workspace,
    });
    this.logger.log({
      runId,
      event: "split_completed",
      totalLines: split.totalLines,
      chunkSize: split.chunkSize,
      chunks: split.chunks.map((c) => ({ index: c.index, start: c.start, end: c.end })),
    });

    const concurrency = resolveConcurrency(
      split.chunks.length,
      request.maxConcurrency,
      request.concurrency,
    );
    this.reporter.event(
      `Starting parallel import of ${split.chunks.length} chunks (concurrency ${concurrency})`,
    );
    const results = await new RunChunksUseCase(
      this.loader,
      this.reporter,
      this.logger,
    ).execute({
      runId,
      chunks: split.chunks,
      destination: request.destination,
      concurrency,
      timeoutMs: request.chunkTimeoutMs,
      onChunkComplete: request.onChunkComplete,
    });

    const summary = summarize(results, {
      runId,
      sourcePath,
      startedAt,
      finishedAt: new Date(),
    });
    for (const line of formatRunReport(summary)) this.reporter.line(line);

    this.reporter.line();
    if (request.cleanup === "on-success" && allSucceeded(summary)) {
      this.reporter.event("Cleaning up temporary files");
    } else if (summary.failureCount > 0) {
      this.reporter.event(
        `Some imports failed. Temporary files kept for debugging: ${workspace.dir}`,
      );
    } else {
      this.reporter.event(`Temporary files kept as requested: ${workspace.dir}`);
    }
    const cleanup = await cleanupWorkspace(
      workspace,
      split.chunks,
      summary,
      request.cleanup,
    );
    if (cleanup.error !== undefined) {
      this.reporter.error(
        `Could not remove temporary files (${cleanup.error}). Remaining files: ${workspace.dir}`,
      );
    }

    this.logger.log({
      runId,
      event: "run_finished",
      totalDurationMs: summary.totalDurationMs,
      successCount: summary.successCount,
      failureCount: summary.failureCount,
      cleanedUp: cleanup.deleted,
      cleanupError: cleanup.error,
    });
    return { summary, cleanup };
  }
}
