/** 1-indexed, inclusive line range inside the cleaned file. */
export interface ChunkRange {
  index: number;
  start: number;
  end: number;
  lineCount: number;
}

export interface Chunk extends ChunkRange {
  filePath: string;
}

export type ChunkStatus = "SUCCESS" | "FAILED";

export interface ChunkResult {
  /** 1-based number used in every human-facing line. */
  chunk: number;
  index: number;
  filePath: string;
  status: ChunkStatus;
  durationMs: number;
  exitCode: number;
  stderr: string;
  lineCount: number;
  rowsLoaded?: number;
}

export interface SplitResult {
  cleanedPath: string;
  totalLines: number;
  chunkSize: number;
  chunks: Chunk[];
}
