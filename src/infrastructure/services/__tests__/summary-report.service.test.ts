import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { readdirSync, readFileSync, utimesSync } from "node:fs";
import { join } from "node:path";
import { writeSummaryReport, type SummaryReport } from "../summary-report.service.js";
import { makeTempDir, removeDir } from "../../../__tests__/helpers/fakes.js";

function report(runId: string): SummaryReport {
  return {
    runId,
    sourcePath: "/data/trades.psv",
    startedAt: "2026-01-05T10:00:00.000Z",
    finishedAt: "2026-01-05T10:00:02.000Z",
    totalDurationMs: 2000,
    totalChunks: 1,
    successCount: 1,
    failureCount: 0,
    averageSuccessDurationMs: 1500,
    p50SuccessDurationMs: 1500,
    p95SuccessDurationMs: 1500,
    linesLoaded: 10,
    linesPerSecond: 5,
    results: [],
    loader: "psql",
    destination: "taq_trades",
    cleanup: { deleted: true, workspaceDir: "/tmp/ws", removedFiles: [] },
  };
}

void describe("writeSummaryReport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  void it("writes the summary as pretty JSON named after the run", () => {
    const outputDir = join(dir, "reports");

    const path = writeSummaryReport(
      { enabled: true, outputDir, retainCount: 0 },
      report("run_a"),
    );

    assert.equal(path, join(outputDir, "import-summary_run_a.json"));
    const text = readFileSync(path, "utf-8");
    assert.ok(text.startsWith('{\n  "runId": "run_a",'));
    assert.deepEqual(JSON.parse(text), report("run_a"));
  });

  void it("keeps only the newest reports", () => {
    const outputDir = join(dir, "reports");
    const config = { enabled: true, outputDir, retainCount: 2 };
    const older = new Date("2026-01-01T00:00:00Z");

    const first = writeSummaryReport(config, report("run_a"));
    utimesSync(first, older, older);
    writeSummaryReport(config, report("run_b"));
    writeSummaryReport(config, report("run_c"));

    assert.deepEqual(readdirSync(outputDir).sort(), [
      "import-summary_run_b.json",
      "import-summary_run_c.json",
    ]);
  });
});
