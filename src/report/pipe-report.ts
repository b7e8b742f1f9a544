import path from "node:path";

import { formatErrorMessage } from "../core/error-format.js";
import { ReportCreationError } from "../core/errors.js";
import { slugify, writeJsonFile } from "../core/utils.js";
import type { PipeRunState } from "../pipe/pipe-state.js";
import type { TableSnapshot } from "../warehouse/ports.js";

import type { ReportWriteOptions } from "./procedure-report.js";

export type PipeReport = {
  kind: "pipe";
  run_id: string;
  generated_at: string;
  summary: {
    pipe: string;
    target_table: string | null;
    folder_path: string | null;
    file_pattern: string | null;
    filename: string | null;
    uploaded: boolean;
    verification_query: string | null;
    verification_count: number | null;
    outcome: string | null;
    final_message: string | null;
    error_message: string | null;
  };
  definitions: { pipe: string | null; target_table: string | null };
  payload: { csv_content: string | null; comment: string | null };
  target_snapshot: TableSnapshot;
  diagnostics: string[];
};

export function buildPipeReport(
  state: PipeRunState,
  meta: { runId: string; generatedAt: string },
): PipeReport {
  return {
    kind: "pipe",
    run_id: meta.runId,
    generated_at: meta.generatedAt,
    summary: {
      pipe: `${state.pipeSchema}.${state.pipeName}`,
      target_table: state.targetTable,
      folder_path: state.folderPath,
      file_pattern: state.filePattern,
      filename: state.filename,
      uploaded: state.uploaded,
      verification_query: state.verificationQuery,
      verification_count: state.verificationCount,
      outcome: state.outcome,
      final_message: state.finalMessage,
      error_message: state.errorMessage,
    },
    definitions: { pipe: state.pipeDefinition, target_table: state.targetTableDefinition },
    payload: { csv_content: state.payload, comment: state.payloadComment },
    target_snapshot: state.targetSnapshot,
    diagnostics: [...state.diagnostics],
  };
}

export function pipeReportPath(
  reportsDir: string,
  schema: string,
  name: string,
  runId: string,
): string {
  return path.join(reportsDir, `pipe-${slugify(`${schema}-${name}`)}-${runId}.json`);
}

export async function writePipeReport(
  state: PipeRunState,
  options: ReportWriteOptions,
): Promise<string> {
  const reportPath = pipeReportPath(options.reportsDir, state.pipeSchema, state.pipeName, options.runId);

  try {
    const report = buildPipeReport(state, {
      runId: options.runId,
      generatedAt: (options.now ?? new Date()).toISOString(),
    });
    await writeJsonFile(reportPath, report);
  } catch (err) {
    throw new ReportCreationError(
      `Failed to write pipe report to ${reportPath}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  return reportPath;
}
