import path from "node:path";

import { formatErrorMessage } from "../core/error-format.js";
import { ReportCreationError } from "../core/errors.js";
import { slugify, writeJsonFile } from "../core/utils.js";
import type { RunState } from "../procedure/run-state.js";
import type { TableSnapshot } from "../warehouse/ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProcedureReportDefinition = {
  object_name: string;
  object_type: string;
  object_role: string;
  definition: string;
};

export type ProcedureReportRow = {
  test_no: string;
  test_case: string;
  insert_query: string;
  validation_query: string;
  expected_count: string;
  actual_count: number | null;
  result: string;
  details: string;
};

export type ProcedureReport = {
  kind: "procedure";
  run_id: string;
  generated_at: string;
  procedure: { schema: string; name: string };
  definitions: ProcedureReportDefinition[];
  summary: ProcedureReportRow[];
  snapshots: Record<string, TableSnapshot>;
  diagnostics: string[];
};

export type ReportWriteOptions = {
  reportsDir: string;
  runId: string;
  now?: Date;
};

// =============================================================================
// BUILD
// =============================================================================

export function buildProcedureReport(
  state: RunState,
  meta: { runId: string; generatedAt: string },
): ProcedureReport {
  const definitions: ProcedureReportDefinition[] = [
    {
      object_name: `${state.procedureSchema}.${state.procedureName}`,
      object_type: "PROCEDURE",
      object_role: "under test",
      definition: state.procedureDefinition,
    },
    ...state.objects.map((object) => ({
      object_name: object.qualifiedName,
      object_type: object.kind.toUpperCase(),
      object_role: object.role,
      definition: object.definition,
    })),
  ];

  const summary: ProcedureReportRow[] = [];
  const snapshots: Record<string, TableSnapshot> = {};
  state.results.forEach((result, index) => {
    const testNo = `1-${index + 1}`;
    summary.push({
      test_no: testNo,
      test_case: result.fixtureName,
      insert_query: result.insertQuery,
      validation_query: result.validationQuery,
      expected_count: result.expectedCount,
      actual_count: result.actualCount,
      result: result.outcome,
      details: result.detail,
    });
    snapshots[`#${testNo}_input`] = result.sourceSnapshot;
    snapshots[`#${testNo}_output`] = result.targetSnapshot;
  });

  return {
    kind: "procedure",
    run_id: meta.runId,
    generated_at: meta.generatedAt,
    procedure: { schema: state.procedureSchema, name: state.procedureName },
    definitions,
    summary,
    snapshots,
    diagnostics: [...state.diagnostics],
  };
}

// =============================================================================
// WRITE
// =============================================================================

export function procedureReportPath(
  reportsDir: string,
  schema: string,
  name: string,
  runId: string,
): string {
  return path.join(reportsDir, `procedure-${slugify(`${schema}-${name}`)}-${runId}.json`);
}

export async function writeProcedureReport(
  state: RunState,
  options: ReportWriteOptions,
): Promise<string> {
  const reportPath = procedureReportPath(
    options.reportsDir,
    state.procedureSchema,
    state.procedureName,
    options.runId,
  );

  try {
    const report = buildProcedureReport(state, {
      runId: options.runId,
      generatedAt: (options.now ?? new Date()).toISOString(),
    });
    await writeJsonFile(reportPath, report);
  } catch (err) {
    throw new ReportCreationError(
      `Failed to write procedure report to ${reportPath}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  return reportPath;
}
