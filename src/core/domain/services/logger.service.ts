export type RunLogEvent =
  | "run_started"
  | "split_completed"
  | "chunk_finished"
  | "run_finished";

export interface RunLogEntry {
  runId: string;
  event: RunLogEvent;
  [field: string]: unknown;
}

export interface ILogger {
  init(runId: string): void;
  log(entry: RunLogEntry): void;
  close(): Promise<void>;
}
