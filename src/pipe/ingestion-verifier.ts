/**
 * Upload and ingestion verification.
 * Purpose: drop the generated feed into the pipe's stage, wait once, then count what landed.
 * Assumptions: a single settle delay, no polling; the pipe loads asynchronously on its own.
 */

import type { BlobUploader } from "../storage/ports.js";
import {
  COUNT_NO_DATA,
  COUNT_QUERY_FAILED,
  type QueryExecutor,
} from "../warehouse/ports.js";

import {
  countGeneratedRows,
  haltWith,
  withDiagnostic,
  type PipeRunState,
} from "./pipe-state.js";

export type IngestionVerifierDeps = {
  uploader: BlobUploader;
  executor: QueryExecutor;
  sleep: (ms: number) => Promise<void>;
  settleMs: number;
};

export class IngestionVerifier {
  constructor(private readonly deps: IngestionVerifierDeps) {}

  async verify(state: PipeRunState): Promise<PipeRunState> {
    if (state.halted) {
      return {
        ...state,
        outcome: "Skipped",
        finalMessage: `Test skipped due to errors: ${state.errorMessage ?? "unknown error"}`,
      };
    }

    const { payload, filename, folderPath, targetTable } = state;
    if (!payload || !filename || folderPath === null || !targetTable) {
      return failed(
        state,
        "Missing required data for upload/verification (CSV content, filename, stage path or target table).",
      );
    }

    const uploaded = await this.deps.uploader.upload(payload, folderPath, filename);
    if (!uploaded) {
      return failed(state, `Failed to upload CSV file '${filename}' to blob storage.`);
    }

    let next = withDiagnostic(
      { ...state, uploaded: true },
      `Uploaded '${filename}'. Waiting ${this.deps.settleMs} ms for the pipe to load it.`,
    );
    await this.deps.sleep(this.deps.settleMs);

    next = await this.verifyCount(next, targetTable, countGeneratedRows(payload));
    return this.captureTarget(next, targetTable);
  }

  private async verifyCount(
    state: PipeRunState,
    targetTable: string,
    generatedRows: number,
  ): Promise<PipeRunState> {
    const query = `SELECT COUNT(*) FROM ${targetTable}`;
    const count = await this.deps.executor.runCount(query);
    const base = { ...state, verificationQuery: query };

    if (count === COUNT_QUERY_FAILED) {
      const error = `Failed to execute verification query (COUNT): ${query}`;
      return {
        ...haltWith(base, error),
        outcome: "Error",
        finalMessage: `Test partially succeeded (upload OK), but verification (COUNT) failed: ${error}`,
      };
    }

    if (count === COUNT_NO_DATA) {
      const error = `Verification query (COUNT) ran but returned no data (unexpected): ${query}`;
      return {
        ...withDiagnostic(base, error),
        errorMessage: error,
        verificationCount: 0,
        outcome: "Uncertain",
        finalMessage:
          "Test status uncertain: Upload OK, but verification query (COUNT) returned no data. Row count: 0.",
      };
    }

    const found = `Found ${count} rows in '${targetTable}' after waiting. (Generated ${generatedRows} rows).`;
    if (count > 0) {
      return {
        ...withDiagnostic(base, `Verification (COUNT) successful. ${found}`),
        verificationCount: count,
        outcome: "Pass",
        finalMessage: `Test successful: Upload OK. ${found}`,
      };
    }
    return {
      ...withDiagnostic(base, `Verification (COUNT) shows a potential issue. ${found}`),
      verificationCount: count,
      outcome: "Fail",
      finalMessage: `Test potentially failed: Upload OK, but ${found}`,
    };
  }

  private async captureTarget(state: PipeRunState, targetTable: string): Promise<PipeRunState> {
    const snapshot = await this.deps.executor.runToTable(`SELECT * FROM ${targetTable}`);
    if (!snapshot) {
      return withDiagnostic(state, `Warning: Failed to fetch data from ${targetTable} for reporting.`);
    }
    return { ...state, targetSnapshot: snapshot };
  }
}

function failed(state: PipeRunState, message: string): PipeRunState {
  return { ...haltWith(state, message), outcome: "Fail", finalMessage: `Test failed: ${message}` };
}
