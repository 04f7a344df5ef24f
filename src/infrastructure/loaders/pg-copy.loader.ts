import { createReadStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import pg from "pg";
import type { Pool, PoolClient } from "pg";
import copyStreams from "pg-copy-streams";
import type { PgCopyLoaderConfig } from "../../core/domain/entities/config.entity.js";
import { errorMessage } from "../../core/domain/errors.js";
import type {
  ChunkLoadOptions,
  ChunkLoadOutcome,
  IChunkLoader,
} from "../../core/domain/services/chunk-loader.service.js";
import { quoteIdentifier, quoteLiteral } from "./identifiers.js";

export function buildCopyFromStdinSql(
  destination: string,
  delimiter: string,
): string {
  return `COPY ${quoteIdentifier(destination)} FROM STDIN WITH (FORMAT csv, DELIMITER ${quoteLiteral(delimiter)})`;
}

/**
 * Streams each chunk file into `COPY ... FROM STDIN` over a pooled connection.
 * COPY is a single statement, so a failed chunk leaves no rows behind.
 */
export class PgCopyLoader implements IChunkLoader {
  readonly name = "pg-copy";
  private pool: Pool;

  constructor(
    config: PgCopyLoaderConfig,
    private delimiter: string,
  ) {
    this.pool = new pg.Pool({
      connectionString: config.connectionString,
      max: config.maxConnections,
    });
  }

  async load(
    chunkFilePath: string,
    destination: string,
    options: ChunkLoadOptions = {},
  ): Promise<ChunkLoadOutcome> {
    let client: PoolClient | undefined;
    let failure: Error | undefined;
    try {
      client = await this.pool.connect();
      const copyStream = client.query(
        copyStreams.from(buildCopyFromStdinSql(destination, this.delimiter)),
      );
      await pipeline(createReadStream(chunkFilePath), copyStream, {
        signal: options.signal,
      });
      return { exitCode: 0, stderr: "" };
    } catch (e) {
      failure = e instanceof Error ? e : new Error(String(e));
      return { exitCode: 1, stderr: errorMessage(e) };
    } finally {
      // a connection that failed mid-COPY is discarded instead of reused
      client?.release(failure);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
