export interface IProgressReporter {
  /** Prefixed with the wall-clock time, e.g. `[14:03:11] Starting ...`. */
  event(message: string): void;
  line(message?: string): void;
  error(message: string): void;
}
