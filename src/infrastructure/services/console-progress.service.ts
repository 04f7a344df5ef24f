import type { IProgressReporter } from "../../core/domain/services/progress-reporter.service.js";
import { clockTime } from "../utils/id.utils.js";

export interface LineSink {
  write(chunk: string): unknown;
}

/**
 * Writes every line as soon as it is produced so progress can be followed
 * while workers are still running.
 */
export class ConsoleProgressReporter implements IProgressReporter {
  constructor(
    private out: LineSink = process.stdout,
    private err: LineSink = process.stderr,
    private now: () => Date = () => new Date(),
  ) {}

  event(message: string): void {
    this.out.write(`[${clockTime(this.now())}] ${message}\n`);
  }

  line(message = ""): void {
    this.out.write(message + "\n");
  }

  error(message: string): void {
    this.err.write(message + "\n");
  }
}
