import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, logRunEvent } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function tempLogPath(name = "run.jsonl"): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
  return path.join(tmpDir, "nested", name);
}

function readLines(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("JsonlLogger", () => {
  it("stamps each event with ts, run id and target", () => {
    const logPath = tempLogPath();
    const logger = new JsonlLogger(logPath, { runId: "run-1", target: "procedure:SALES.LOAD_ORDERS" });

    logRunEvent(logger, "stage.start", { pipeline: "procedure", stage: "resolve-objects" });
    logger.close();

    const [event] = readLines(logPath);
    expect(event).toMatchObject({
      type: "stage.start",
      run_id: "run-1",
      target: "procedure:SALES.LOAD_ORDERS",
      pipeline: "procedure",
      stage: "resolve-objects",
    });
    expect(new Date(String(event?.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends in order and omits target when none is set", () => {
    const logPath = tempLogPath("events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-2" });

    logRunEvent(logger, "diagnostic", { message: "Truncated RAW.ORDERS before fixture execution." });
    logRunEvent(logger, "pipeline.complete", { tables: ["RAW.ORDERS"] });
    logger.close();

    const events = readLines(logPath);
    expect(events.map((e) => e.type)).toEqual(["diagnostic", "pipeline.complete"]);
    expect(events[0]?.target).toBeUndefined();
    expect(events[1]?.tables).toEqual(["RAW.ORDERS"]);
  });

  it("keeps the event type when a field tries to overwrite it", () => {
    const logPath = tempLogPath();
    const logger = new JsonlLogger(logPath, { runId: "run-3" });

    logRunEvent(logger, "report.written", { type: "other", path: "/tmp/r.json" });
    logger.close();

    expect(readLines(logPath)[0]?.type).toBe("report.written");
  });

  it("ignores events after close", () => {
    const logPath = tempLogPath();
    const logger = new JsonlLogger(logPath, { runId: "run-4" });

    logRunEvent(logger, "first");
    logger.close();
    logRunEvent(logger, "late");
    logger.close();

    expect(readLines(logPath).map((e) => e.type)).toEqual(["first"]);
  });

  it("warns once when writes keep failing", () => {
    const logPath = tempLogPath();
    const logger = new JsonlLogger(logPath, { runId: "run-5" });
    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logRunEvent(logger, "stage.start");
    logRunEvent(logger, "stage.complete");
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      `Warning: run log ${logPath}: failed to write stage.start event: disk full`,
    );
  });
});
