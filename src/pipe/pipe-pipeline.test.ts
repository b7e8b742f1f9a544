import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { FakeOracle, FakeUploader, FakeWarehouse, MemoryLogger } from "../__tests__/fakes.js";
import { NotFoundError } from "../core/errors.js";

import { runPipeTest, type PipeTestDeps } from "./pipe-pipeline.js";

const PIPE_DDL =
  "create pipe RAW.ORDERS_PIPE as COPY INTO DB.RAW.ORDERS FROM (SELECT t.$1, t.$2 FROM @LANDING/orders/ t)";

describe("runPipeTest", () => {
  let reportsDir: string;

  beforeEach(async () => {
    reportsDir = await fse.mkdtemp(path.join(os.tmpdir(), "sqlprobe-pipe-"));
  });

  afterEach(async () => {
    await fse.remove(reportsDir);
  });

  function deps(overrides: { warehouse: FakeWarehouse; oracle?: FakeOracle }): PipeTestDeps & {
    uploader: FakeUploader;
    logger: MemoryLogger;
  } {
    return {
      oracle: new FakeOracle(),
      uploader: new FakeUploader(),
      logger: new MemoryLogger(),
      sleep: vi.fn(async (_ms: number) => {}),
      settleMs: 0,
      reportsDir,
      runId: "20260101-000000",
      feed: { now: () => 1, randomSuffix: () => "r" },
      ...overrides,
    };
  }

  it("runs all three stages and writes a report", async () => {
    const warehouse = new FakeWarehouse()
      .setPipe("RAW", "ORDERS_PIPE", PIPE_DDL)
      .setTable("DB.RAW.ORDERS", "create table ORDERS (ID NUMBER, NAME VARCHAR)")
      .setCount("SELECT COUNT(*) FROM DB.RAW.ORDERS", 2);
    const oracle = new FakeOracle([{ parsed: { csv_content: "C1,C2\n1,a\n2,b", comment: "ok" } }]);
    const run = deps({ warehouse, oracle });

    const { state, reportPath } = await runPipeTest({ schema: "RAW", name: "ORDERS_PIPE" }, run);

    expect(state.outcome).toBe("Pass");
    expect(run.uploader.uploadCalls).toEqual([
      { content: "C1,C2\n1,a\n2,b", folderPath: "orders", filename: "ORDERS_PIPE_test_1_r.csv" },
    ]);
    expect(reportPath).toBe(path.join(reportsDir, "pipe-raw-orders-pipe-20260101-000000.json"));

    const report = await fse.readJson(reportPath);
    expect(report.summary.outcome).toBe("Pass");
    expect(report.summary.final_message).toBe(
      "Test successful: Upload OK. Found 2 rows in 'DB.RAW.ORDERS' after waiting. (Generated 2 rows).",
    );
    expect(report.payload).toEqual({ csv_content: "C1,C2\n1,a\n2,b", comment: "ok" });
    expect(run.logger.types()).toContain("report.written");
  });

  it("skips generation and upload when the stage path cannot be extracted", async () => {
    const warehouse = new FakeWarehouse().setPipe(
      "RAW",
      "ORDERS_PIPE",
      "create pipe RAW.ORDERS_PIPE as COPY INTO DB.RAW.ORDERS FROM (SELECT t.$1 FROM STAGED t)",
    );
    const oracle = new FakeOracle();
    const run = deps({ warehouse, oracle });

    const { state } = await runPipeTest({ schema: "RAW", name: "ORDERS_PIPE" }, run);

    expect(state.halted).toBe(true);
    expect(state.finalMessage).toBe(
      "Test skipped due to errors: Could not extract stage path (FROM @stage/path) from pipe definition.",
    );
    expect(oracle.prompts).toEqual([]);
    expect(run.uploader.uploadCalls).toEqual([]);
    expect(warehouse.calls).toEqual(["pipe:RAW.ORDERS_PIPE"]);
  });

  it("neither uploads nor queries when the feed response cannot be parsed", async () => {
    const warehouse = new FakeWarehouse()
      .setPipe("RAW", "ORDERS_PIPE", PIPE_DDL)
      .setTable("DB.RAW.ORDERS", "create table ORDERS (ID NUMBER)");
    const oracle = new FakeOracle([{ text: "{ broken" }]);
    const run = deps({ warehouse, oracle });

    const { state } = await runPipeTest({ schema: "RAW", name: "ORDERS_PIPE" }, run);

    expect(state.halted).toBe(true);
    expect(state.outcome).toBe("Skipped");
    expect(run.uploader.uploadCalls).toEqual([]);
    expect(warehouse.countCalls).toEqual([]);
    expect(warehouse.tableCalls).toEqual([]);
  });

  it("raises NotFoundError and writes no report for a missing pipe", async () => {
    const run = deps({ warehouse: new FakeWarehouse() });

    await expect(runPipeTest({ schema: "RAW", name: "GHOST" }, run)).rejects.toBeInstanceOf(
      NotFoundError,
    );
    expect(await fse.readdir(reportsDir)).toEqual([]);
  });
});
