export interface ChunkLoadOptions {
  /** Aborted when the per-chunk timeout elapses. */
  signal?: AbortSignal;
}

export interface ChunkLoadOutcome {
  /** 0 means the chunk was loaded; anything else is a failure. */
  exitCode: number;
  stderr: string;
  rowsLoaded?: number;
}

export interface IChunkLoader {
  readonly name: string;
  load(
    chunkFilePath: string,
    destination: string,
    options?: ChunkLoadOptions,
  ): Promise<ChunkLoadOutcome>;
  close(): Promise<void>;
}
