export type ImportErrorCode = "INPUT_ERROR" | "SPLIT_ERROR" | "CONFIG_ERROR";

export class ImportError extends Error {
  constructor(
    readonly code: ImportErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ImportError";
  }
}

/** Missing or unreadable source file, or an invalid chunk count. */
export class InputError extends ImportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INPUT_ERROR", message, options);
    this.name = "InputError";
  }
}

export class SplitError extends ImportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SPLIT_ERROR", message, options);
    this.name = "SplitError";
  }
}

export class ConfigError extends ImportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
