import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { readdirSync, readFileSync, unlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { InvalidArgumentError } from "commander";
import {
  applyCliOverrides,
  buildProgram,
  CHUNK_FAILURE_EXIT_CODE,
  parseLoaderKind,
  parseNonNegativeInt,
  parsePositiveInt,
  runImport,
  type CliOptions,
} from "../cli.js";
import type { LoaderConfig } from "../core/domain/entities/config.entity.js";
import { parseConfig } from "../infrastructure/services/config.service.js";
import {
  chunkIndexOf,
  FakeChunkLoader,
  makeTempDir,
  MemoryReporter,
  removeDir,
  taqFileContent,
} from "./helpers/fakes.js";

void describe("option parsers", () => {
  void it("accepts positive integers only for counts", () => {
    assert.equal(parsePositiveInt("8"), 8);
    assert.throws(() => parsePositiveInt("0"), InvalidArgumentError);
    assert.throws(() => parsePositiveInt("-3"), InvalidArgumentError);
    assert.throws(() => parsePositiveInt("2.5"), InvalidArgumentError);
    assert.throws(() => parsePositiveInt("eight"), InvalidArgumentError);
  });

  void it("accepts zero for the chunk timeout", () => {
    assert.equal(parseNonNegativeInt("0"), 0);
    assert.equal(parseNonNegativeInt("60000"), 60000);
    assert.throws(() => parseNonNegativeInt("-1"), InvalidArgumentError);
  });

  void it("accepts the known loader kinds", () => {
    assert.equal(parseLoaderKind("pg-copy"), "pg-copy");
    assert.throws(() => parseLoaderKind("mysql"), InvalidArgumentError);
  });
});

void describe("applyCliOverrides", () => {
  void it("lets flags win over the config file", () => {
    const config = applyCliOverrides(parseConfig({}, "test", {}), {
      file: "/data/trades.psv",
      chunks: 4,
      concurrency: 2,
      loader: "sqlite",
      table: "trades_2026",
      chunkTimeout: 5000,
      keepTemp: true,
      report: false,
      failOnChunkError: true,
    });

    assert.equal(config.loader.kind, "sqlite");
    assert.equal(config.loader.table, "trades_2026");
    assert.deepEqual(config.run, {
      chunks: 4,
      maxConcurrency: 16,
      concurrency: 2,
      chunkTimeoutMs: 5000,
      workDir: "",
      cleanup: "never",
      failOnChunkError: true,
    });
    assert.equal(config.report.enabled, false);
  });

  void it("keeps the config values when no flag is given", () => {
    const base = parseConfig({ run: { chunks: 12 } }, "test", {});

    const config = applyCliOverrides(base, { file: "/data/trades.psv" });

    assert.equal(config.run.chunks, 12);
    assert.equal(config.run.cleanup, "on-success");
    assert.equal(config.report.enabled, true);
  });
});

void describe("runImport", () => {
  let dir: string;
  let source: string;
  let configPath: string;
  let reporter: MemoryReporter;

  beforeEach(async () => {
    dir = await makeTempDir();
    source = join(dir, "EQY_US_ALL_TRADE_TEST");
    writeFileSync(source, taqFileContent(20));
    configPath = join(dir, "config.yaml");
    writeFileSync(
      configPath,
      [
        "run:",
        "  chunks: 4",
        `  workDir: ${join(dir, "work")}`,
        "logging:",
        `  dir: ${join(dir, "logs")}`,
        "report:",
        `  outputDir: ${join(dir, "reports")}`,
        "",
      ].join("\n"),
    );
    reporter = new MemoryReporter();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  void it("returns 1 without creating a loader when the file is missing", async () => {
    let created = false;
    const missing = join(dir, "missing.psv");

    const code = await runImport(
      { file: missing, config: configPath },
      {
        reporter,
        env: {},
        createLoader: () => {
          created = true;
          return new FakeChunkLoader();
        },
      },
    );

    assert.equal(code, 1);
    assert.equal(created, false);
    assert.deepEqual(reporter.errors, [`Error: File '${missing}' does not exist.`]);
  });

  void it("imports every chunk, writes the run log and summary report", async () => {
    const loader = new FakeChunkLoader();
    let seen: LoaderConfig | undefined;

    const code = await runImport(
      { file: source, config: configPath },
      {
        reporter,
        env: {},
        createLoader: (config) => {
          seen = config;
          return loader;
        },
      },
    );

    assert.equal(code, 0);
    assert.equal(seen?.table, "taq_trades");
    assert.equal(loader.calls.length, 4);
    assert.equal(loader.closed, true);
    assert.deepEqual(readdirSync(join(dir, "work")), []);

    const [logFile] = readdirSync(join(dir, "logs"));
    assert.match(logFile, /^import-run_run_\d{8}T\d{6}_[a-z0-9]+\.jsonl$/);
    assert.ok(reporter.lines.includes(`Run log: ${join(dir, "logs", logFile)}`));
    assert.deepEqual(
      reporter.lines.filter((l) => l.startsWith("Progress: ")),
      [
        "Progress: 1/4 chunks finished",
        "Progress: 2/4 chunks finished",
        "Progress: 3/4 chunks finished",
        "Progress: 4/4 chunks finished",
      ],
    );
    const events = readFileSync(join(dir, "logs", logFile), "utf-8")
      .trimEnd()
      .split("\n")
      .map((l) => {
        const entry: unknown = JSON.parse(l);
        return entry !== null && typeof entry === "object" && "event" in entry
          ? entry.event
          : undefined;
      });
    assert.deepEqual(events, [
      "run_started",
      "split_completed",
      "chunk_finished",
      "chunk_finished",
      "chunk_finished",
      "chunk_finished",
      "run_finished",
    ]);

    const [reportFile] = readdirSync(join(dir, "reports"));
    assert.ok(reporter.lines.includes(`Summary report: ${join(dir, "reports", reportFile)}`));
    const report: unknown = JSON.parse(readFileSync(join(dir, "reports", reportFile), "utf-8"));
    assert.ok(report !== null && typeof report === "object");
    assert.ok("loader" in report && report.loader === "fake");
    assert.ok("linesLoaded" in report && report.linesLoaded === 20);
  });

  void it("still exits 0 on chunk failures unless asked otherwise", async () => {
    const failSecond = () =>
      new FakeChunkLoader(async (path) =>
        chunkIndexOf(path) === 1
          ? { exitCode: 1, stderr: "ERROR:  duplicate key value" }
          : { exitCode: 0, stderr: "" },
      );

    const lenient = await runImport(
      { file: source, config: configPath, report: false },
      { reporter, env: {}, createLoader: failSecond },
    );
    const strict = await runImport(
      { file: source, config: configPath, report: false, failOnChunkError: true },
      { reporter: new MemoryReporter(), env: {}, createLoader: failSecond },
    );

    assert.equal(lenient, 0);
    assert.equal(strict, CHUNK_FAILURE_EXIT_CODE);
    assert.equal(readdirSync(join(dir, "work")).length, 2);
  });

  void it("writes the summary report and exits 0 when cleanup fails", async () => {
    const loader = new FakeChunkLoader(async (path) => {
      if (chunkIndexOf(path) === 3) unlinkSync(path);
      return { exitCode: 0, stderr: "" };
    });

    const code = await runImport(
      { file: source, config: configPath },
      { reporter, env: {}, createLoader: () => loader },
    );

    assert.equal(code, 0);
    assert.equal(reporter.errors.length, 1);
    assert.ok(reporter.errors[0].startsWith("Could not remove temporary files (ENOENT"));
    const [reportFile] = readdirSync(join(dir, "reports"));
    const report: unknown = JSON.parse(readFileSync(join(dir, "reports", reportFile), "utf-8"));
    assert.ok(report !== null && typeof report === "object" && "cleanup" in report);
    const { cleanup } = report;
    assert.ok(cleanup !== null && typeof cleanup === "object");
    assert.ok("deleted" in cleanup && cleanup.deleted === false);
    assert.ok("error" in cleanup && typeof cleanup.error === "string");
  });
});

void describe("buildProgram", () => {
  void it("parses flags into options and sets the exit code", async () => {
    const received: CliOptions[] = [];
    const program = buildProgram(async (opts) => {
      received.push(opts);
      return 2;
    });

    try {
      await program.parseAsync(
        [
          "-f",
          "/data/trades.psv",
          "-c",
          "6",
          "--loader",
          "sqlite",
          "--chunk-timeout",
          "0",
          "--keep-temp",
          "--no-report",
        ],
        { from: "user" },
      );
      assert.equal(process.exitCode, 2);
    } finally {
      process.exitCode = undefined;
    }

    assert.equal(received.length, 1);
    assert.equal(received[0].file, "/data/trades.psv");
    assert.equal(received[0].chunks, 6);
    assert.equal(received[0].loader, "sqlite");
    assert.equal(received[0].chunkTimeout, 0);
    assert.equal(received[0].keepTemp, true);
    assert.equal(received[0].report, false);
    assert.equal(received[0].failOnChunkError, undefined);
  });
});
