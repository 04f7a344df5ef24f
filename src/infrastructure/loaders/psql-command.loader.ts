import { spawn } from "node:child_process";
import type { PsqlLoaderConfig } from "../../core/domain/entities/config.entity.js";
import type {
  ChunkLoadOptions,
  ChunkLoadOutcome,
  IChunkLoader,
} from "../../core/domain/services/chunk-loader.service.js";
import { quoteIdentifier, quoteLiteral } from "./identifiers.js";

export function buildCopyMetaCommand(
  chunkFilePath: string,
  destination: string,
  delimiter: string,
): string {
  return `\\copy ${quoteIdentifier(destination)} FROM ${quoteLiteral(chunkFilePath)} WITH (FORMAT CSV, DELIMITER ${quoteLiteral(delimiter)})`;
}

export function buildPsqlArgs(
  config: PsqlLoaderConfig,
  chunkFilePath: string,
  destination: string,
  delimiter: string,
): string[] {
  return [
    "-X",
    "-v",
    "ON_ERROR_STOP=1",
    "-c",
    buildCopyMetaCommand(chunkFilePath, destination, delimiter),
    config.database,
  ];
}

/** Runs psql's client-side `\copy` once per chunk; its exit code is the result. */
export class PsqlCommandLoader implements IChunkLoader {
  readonly name = "psql";

  constructor(
    private config: PsqlLoaderConfig,
    private delimiter: string,
  ) {}

  load(
    chunkFilePath: string,
    destination: string,
    options: ChunkLoadOptions = {},
  ): Promise<ChunkLoadOutcome> {
    const args = buildPsqlArgs(
      this.config,
      chunkFilePath,
      destination,
      this.delimiter,
    );

    return new Promise<ChunkLoadOutcome>((resolve) => {
      let settled = false;
      let stderr = "";
      const finish = (outcome: ChunkLoadOutcome) => {
        if (settled) return;
        settled = true;
        resolve(outcome);
      };

      const child = spawn(this.config.command, args, {
        shell: false,
        stdio: ["ignore", "ignore", "pipe"],
        signal: options.signal,
      });

      child.stderr?.on("data", (d: Buffer) => {
        stderr += d.toString();
      });

      child.on("close", (code, signal) => {
        finish({
          exitCode: code ?? (signal ? 1 : 0),
          stderr: stderr.trim(),
        });
      });

      child.on("error", (err) => {
        finish({ exitCode: 1, stderr: err.message });
      });
    });
  }

  async close(): Promise<void> {}
}
