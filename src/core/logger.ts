/**
 * Run log: one JSON object per line under <home>/logs/<run-id>/run.jsonl.
 * Every line carries ts, type and run_id; pipelines add stage and message fields.
 */

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type RunEvent = JsonObject & { type: string };

export type RunLogLine = RunEvent & {
  ts: string;
  run_id: string;
  target?: string;
};

export interface RunLogger {
  log(event: RunEvent): void;
  close(): void;
}

export type JsonlLoggerOptions = {
  runId: string;
  // Object under test, e.g. "procedure:MART.LOAD_T".
  target?: string;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements RunLogger {
  private readonly fd: number;
  private closed = false;
  private warned = false;

  constructor(
    public readonly filePath: string,
    private readonly options: JsonlLoggerOptions,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
  }

  log(event: RunEvent): void {
    if (this.closed) return;

    const line: RunLogLine = { ...event, ts: isoNow(), run_id: this.options.runId };
    if (this.options.target) line.target = this.options.target;

    try {
      fs.writeSync(this.fd, `${JSON.stringify(line)}\n`);
    } catch (err) {
      this.warnOnce(`write ${event.type} event`, err);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.fsyncSync(this.fd);
      fs.closeSync(this.fd);
    } catch (err) {
      this.warnOnce("close", err);
    }
  }

  // A full disk would otherwise repeat the same warning for every stage event.
  private warnOnce(action: string, err: unknown): void {
    if (this.warned) return;
    this.warned = true;
    console.warn(`Warning: run log ${this.filePath}: failed to ${action}: ${formatErrorMessage(err)}`);
  }
}

export function logRunEvent(logger: RunLogger, type: string, fields: JsonObject = {}): void {
  logger.log({ ...fields, type });
}
