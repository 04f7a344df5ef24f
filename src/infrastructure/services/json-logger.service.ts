import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { join } from "node:path";
import { finished } from "node:stream/promises";
import type { LoggingConfig } from "../../core/domain/entities/config.entity.js";
import type { ILogger, RunLogEntry } from "../../core/domain/services/logger.service.js";

/** `import-run.jsonl` + `run_1` -> `import-run_run_1.jsonl` */
export function runLogFileName(template: string, runId: string): string {
  return `${template.replace(/\.[^.]+$/, "")}_${runId}.jsonl`;
}

/**
 * Run log as JSON Lines, one file per run. A failed write never interrupts
 * the import: later entries are dropped and the error is kept for the caller.
 */
export class JsonLogger implements ILogger {
  private stream: WriteStream | null = null;
  private writeError: Error | null = null;

  constructor(private config: LoggingConfig) {}

  /** Opens the run's log file and returns its path. */
  init(runId: string): string {
    mkdirSync(this.config.dir, { recursive: true });
    const path = join(this.config.dir, runLogFileName(this.config.runLog, runId));
    this.stream = createWriteStream(path, { flags: "a" });
    this.stream.on("error", (e) => this.recordError(e));
    return path;
  }

  log({ runId, event, ...fields }: RunLogEntry): void {
    if (!this.stream || this.writeError) return;
    const line = { timestamp: new Date().toISOString(), runId, event, ...fields };
    this.stream.write(JSON.stringify(line) + "\n");
  }

  getWriteError(): Error | null {
    return this.writeError;
  }

  async close(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    stream.end();
    try {
      await finished(stream);
    } catch (e) {
      this.recordError(e);
    }
  }

  private recordError(e: unknown): void {
    this.writeError ??= e instanceof Error ? e : new Error(String(e));
  }
}
