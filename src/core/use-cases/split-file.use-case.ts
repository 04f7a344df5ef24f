/**
 * Line splitter: drops the header and trailer line of a TAQ file and cuts the
 * remaining lines into contiguous chunk files, streaming both passes.
 */

import { createWriteStream } from "node:fs";
import { open, type FileHandle } from "node:fs/promises";
import { createInterface, type Interface } from "node:readline";
import { pipeline } from "node:stream/promises";
import type { Chunk, ChunkRange, SplitResult } from "../domain/entities/chunk.entity.js";
import {
  chunkFilePath,
  type RunWorkspace,
} from "../domain/entities/run-workspace.entity.js";
import { ImportError, InputError, SplitError, errorMessage } from "../domain/errors.js";
import type { IProgressReporter } from "../domain/services/progress-reporter.service.js";

export interface SplitFileRequest {
  sourcePath: string;
  chunkCount: number;
  workspace: RunWorkspace;
}

export function assertChunkCount(chunkCount: number): void {
  if (!Number.isInteger(chunkCount) || chunkCount < 1) {
    throw new InputError(
      `Chunk count must be a positive integer, got ${chunkCount}.`,
    );
  }
}

/**
 * Every chunk gets floor(L / N) lines except the last one, which also takes
 * the remainder. With L < N the leading chunks are empty ranges (start 1, end 0).
 */
export function computeChunkRanges(
  totalLines: number,
  chunkCount: number,
): ChunkRange[] {
  assertChunkCount(chunkCount);
  if (!Number.isInteger(totalLines) || totalLines < 0) {
    throw new RangeError(`Line count must be a non-negative integer, got ${totalLines}.`);
  }
  const chunkSize = Math.floor(totalLines / chunkCount);
  const ranges: ChunkRange[] = [];
  for (let i = 0; i < chunkCount; i++) {
    const start = i * chunkSize + 1;
    const end = i < chunkCount - 1 ? (i + 1) * chunkSize : totalLines;
    ranges.push({
      index: i,
      start,
      end,
      lineCount: Math.max(0, end - start + 1),
    });
  }
  return ranges;
}

function readLines(handle: FileHandle): Interface {
  return createInterface({
    input: handle.createReadStream(),
    crlfDelay: Number.POSITIVE_INFINITY,
  });
}

/** Pulls up to `count` lines off a shared iterator without closing it. */
async function* takeLines(
  lines: AsyncIterator<string>,
  count: number,
  onLine: () => void,
): AsyncGenerator<string> {
  for (let taken = 0; taken < count; taken++) {
    const next = await lines.next();
    if (next.done) return;
    onLine();
    yield next.value + "\n";
  }
}

/** Copies all but the first and last line; returns how many lines were kept. */
export async function stripHeaderAndFooter(
  sourcePath: string,
  cleanedPath: string,
): Promise<number> {
  const handle = await open(sourcePath, "r");
  const rl = readLines(handle);
  let kept = 0;

  async function* bodyLines(): AsyncGenerator<string> {
    let seen = 0;
    let pending: string | undefined;
    for await (const line of rl) {
      seen += 1;
      if (seen === 1) continue;
      if (pending !== undefined) {
        kept += 1;
        yield pending + "\n";
      }
      pending = line;
    }
    // whatever is still pending is the trailer
  }

  try {
    await pipeline(bodyLines(), createWriteStream(cleanedPath));
    return kept;
  } finally {
    rl.close();
    await handle.close();
  }
}

/**
 * Writes every chunk file in one pass over the cleaned file, including empty
 * ones, and returns the number of lines read.
 */
export async function writeChunkFiles(
  cleanedPath: string,
  chunks: Chunk[],
): Promise<number> {
  const handle = await open(cleanedPath, "r");
  const rl = readLines(handle);
  const lines = rl[Symbol.asyncIterator]();
  let lineNo = 0;
  try {
    for (const [i, chunk] of chunks.entries()) {
      const count =
        i === chunks.length - 1 ? Number.POSITIVE_INFINITY : chunk.lineCount;
      await pipeline(
        takeLines(lines, count, () => {
          lineNo += 1;
        }),
        createWriteStream(chunk.filePath),
      );
    }
    return lineNo;
  } finally {
    rl.close();
    await handle.close();
  }
}

export class SplitFileUseCase {
  constructor(private reporter: IProgressReporter) {}

  async execute(request: SplitFileRequest): Promise<SplitResult> {
    const { sourcePath, chunkCount, workspace } = request;
    assertChunkCount(chunkCount);
    try {
      this.reporter.event("Preprocessing file (removing header and footer)");
      const totalLines = await stripHeaderAndFooter(
        sourcePath,
        workspace.cleanedPath,
      );

      this.reporter.event("Counting lines to split file evenly");
      const ranges = computeChunkRanges(totalLines, chunkCount);
      const chunkSize = Math.floor(totalLines / chunkCount);
      this.reporter.line(
        `Total lines: ${totalLines}, splitting into ${chunkCount} chunks of ~${chunkSize} lines each`,
      );

      this.reporter.event(`Creating ${chunkCount} chunk files`);
      const chunks: Chunk[] = ranges.map((range) => ({
        ...range,
        filePath: chunkFilePath(workspace, range.index),
      }));
      for (const chunk of chunks) {
        this.reporter.line(
          `Creating chunk ${chunk.index + 1}/${chunkCount}: lines ${chunk.start}-${chunk.end} -> ${chunk.filePath}`,
        );
      }
      const written = await writeChunkFiles(workspace.cleanedPath, chunks);
      if (written !== totalLines) {
        throw new SplitError(
          `Cleaned file changed while splitting: expected ${totalLines} lines, read ${written}.`,
        );
      }

      return {
        cleanedPath: workspace.cleanedPath,
        totalLines,
        chunkSize,
        chunks,
      };
    } catch (e) {
      if (e instanceof ImportError) throw e;
      throw new SplitError(`Failed to split ${sourcePath}: ${errorMessage(e)}`, {
        cause: e,
      });
    }
  }
}
