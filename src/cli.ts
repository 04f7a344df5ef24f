import { Command, InvalidArgumentError } from "commander";
import type { Config, LoaderConfig, LoaderKind } from "./core/domain/entities/config.entity.js";
import { ImportError } from "./core/domain/errors.js";
import type { IChunkLoader } from "./core/domain/services/chunk-loader.service.js";
import type { IProgressReporter } from "./core/domain/services/progress-reporter.service.js";
import {
  assertReadableFile,
  ImportFileUseCase,
} from "./core/use-cases/import-file.use-case.js";
import { createChunkLoader } from "./infrastructure/loaders/loader.factory.js";
import { ConfigService } from "./infrastructure/services/config.service.js";
import { ConsoleProgressReporter } from "./infrastructure/services/console-progress.service.js";
import { JsonLogger } from "./infrastructure/services/json-logger.service.js";
import { writeSummaryReport } from "./infrastructure/services/summary-report.service.js";
import { runId as newRunId } from "./infrastructure/utils/id.utils.js";

export interface CliOptions {
  file: string;
  chunks?: number;
  concurrency?: number;
  loader?: LoaderKind;
  table?: string;
  chunkTimeout?: number;
  keepTemp?: boolean;
  report?: boolean;
  failOnChunkError?: boolean;
  config?: string;
}

export interface CliDeps {
  reporter?: IProgressReporter;
  env?: NodeJS.ProcessEnv;
  createLoader?: (config: LoaderConfig) => IChunkLoader;
}

/** Exit code when --fail-on-chunk-error is set and a chunk failed. */
export const CHUNK_FAILURE_EXIT_CODE = 2;

const LOADER_KINDS: readonly LoaderKind[] = ["psql", "pg-copy", "sqlite"];

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return n;
}

export function parseLoaderKind(value: string): LoaderKind {
  const kind = LOADER_KINDS.find((k) => k === value);
  if (!kind) {
    throw new InvalidArgumentError(`Expected one of: ${LOADER_KINDS.join(", ")}.`);
  }
  return kind;
}

export function applyCliOverrides(config: Config, opts: CliOptions): Config {
  return {
    ...config,
    loader: {
      ...config.loader,
      kind: opts.loader ?? config.loader.kind,
      table: opts.table ?? config.loader.table,
    },
    run: {
      ...config.run,
      chunks: opts.chunks ?? config.run.chunks,
      concurrency: opts.concurrency ?? config.run.concurrency,
      chunkTimeoutMs: opts.chunkTimeout ?? config.run.chunkTimeoutMs,
      cleanup: opts.keepTemp ? "never" : config.run.cleanup,
      failOnChunkError: opts.failOnChunkError ?? config.run.failOnChunkError,
    },
    report: {
      ...config.report,
      enabled: opts.report === false ? false : config.report.enabled,
    },
  };
}

/**
 * Runs one import and returns the process exit code. Chunk failures only
 * change the exit code when failOnChunkError is on.
 */
export async function runImport(
  opts: CliOptions,
  deps: CliDeps = {},
): Promise<number> {
  const reporter = deps.reporter ?? new ConsoleProgressReporter();
  let config: Config;
  try {
    await assertReadableFile(opts.file);
    config = applyCliOverrides(
      new ConfigService(opts.config, deps.env).getConfig(),
      opts,
    );
  } catch (e) {
    if (e instanceof ImportError) {
      reporter.error(e.message);
      return 1;
    }
    throw e;
  }

  const runId = newRunId();
  const logger = new JsonLogger(config.logging);
  const logPath = logger.init(runId);
  const loader = (deps.createLoader ?? createChunkLoader)(config.loader);
  reporter.line(`Run ID: ${runId}`);
  reporter.line(`Run log: ${logPath}`);

  try {
    const { summary, cleanup } = await new ImportFileUseCase(
      loader,
      reporter,
      logger,
    ).execute({
      runId,
      sourcePath: opts.file,
      chunkCount: config.run.chunks,
      destination: config.loader.table,
      maxConcurrency: config.run.maxConcurrency,
      concurrency: config.run.concurrency,
      chunkTimeoutMs: config.run.chunkTimeoutMs,
      workDir: config.run.workDir || undefined,
      cleanup: config.run.cleanup,
      onChunkComplete: (_result, done, total) =>
        reporter.line(`Progress: ${done}/${total} chunks finished`),
    });

    if (config.report.enabled) {
      const path = writeSummaryReport(config.report, {
        ...summary,
        loader: loader.name,
        destination: config.loader.table,
        cleanup,
      });
      reporter.line(`Summary report: ${path}`);
    }

    return config.run.failOnChunkError && summary.failureCount > 0
      ? CHUNK_FAILURE_EXIT_CODE
      : 0;
  } catch (e) {
    if (e instanceof ImportError) {
      reporter.error(e.message);
      return 1;
    }
    throw e;
  } finally {
    await loader.close();
    await logger.close();
    const logError = logger.getWriteError();
    if (logError) reporter.error(`Run log could not be written: ${logError.message}`);
  }
}

export function buildProgram(
  run: (opts: CliOptions) => Promise<number> = (opts) => runImport(opts),
): Command {
  const program = new Command();
  program
    .name("taq-import")
    .description("Import TAQ trade data into a database table in parallel chunks")
    .requiredOption("-f, --file <path>", "Path to the TAQ trade data file to import")
    .option(
      "-c, --chunks <n>",
      "Number of chunks to split the file into (default: 8)",
      parsePositiveInt,
    )
    .option(
      "--concurrency <n>",
      "Max chunks loading at once (default: chunk count, capped by run.maxConcurrency)",
      parsePositiveInt,
    )
    .option("--loader <kind>", "Chunk loader: psql | pg-copy | sqlite", parseLoaderKind)
    .option("--table <name>", "Destination table (default: taq_trades)")
    .option(
      "--chunk-timeout <ms>",
      "Fail a chunk that takes longer than this (0 = no timeout)",
      parseNonNegativeInt,
    )
    .option("--keep-temp", "Keep temporary files even when every chunk succeeds")
    .option("--no-report", "Do not write the JSON summary report")
    .option("--fail-on-chunk-error", "Exit with code 2 when any chunk fails")
    .option("--config <path>", "Config file path (default: config/config.yaml)")
    .action(async (opts: CliOptions) => {
      process.exitCode = await run(opts);
    });
  return program;
}
