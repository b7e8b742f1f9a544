import type { AppContext } from "../app/context.js";
import { openRunServices } from "../app/services.js";
import { runProcedureTest, type ProcedureTestResult } from "../procedure/procedure-pipeline.js";
import { summarizeOutcomes, type RunState } from "../procedure/run-state.js";

import { formatTable } from "./table.js";

export type ProcedureCommandOptions = {
  schema: string;
  name: string;
  runId: string;
};

export async function procedureCommand(
  ctx: AppContext,
  opts: ProcedureCommandOptions,
): Promise<ProcedureTestResult> {
  const services = await openRunServices(ctx, {
    runId: opts.runId,
    target: `procedure:${opts.schema}.${opts.name}`,
  });

  let result: ProcedureTestResult;
  try {
    result = await runProcedureTest(
      { schema: opts.schema, name: opts.name },
      {
        oracle: services.oracle,
        warehouse: services.warehouse,
        logger: services.logger,
        reportsDir: services.reportsDir,
        runId: services.runId,
      },
    );
  } finally {
    await services.close();
  }

  console.log(formatProcedureSummary(result.state));
  console.log(`Report: ${result.reportPath}`);

  if (procedureRunFailed(result.state)) {
    process.exitCode = 1;
  }
  return result;
}

export function formatProcedureSummary(state: RunState): string {
  const header = `Procedure ${state.procedureSchema}.${state.procedureName}: ${state.objects.length} related objects, ${state.results.length} fixtures`;
  if (state.results.length === 0) {
    return `${header}\nNo fixtures were executed.`;
  }

  const table = formatTable(
    ["#", "Fixture", "Expected", "Actual", "Result"],
    state.results.map((result, index) => [
      `1-${index + 1}`,
      result.fixtureName,
      result.expectedCount,
      result.actualCount === null ? "-" : String(result.actualCount),
      result.outcome,
    ]),
  );
  const counts = summarizeOutcomes(state.results);
  const totals = `Pass ${counts.Pass}, Fail ${counts.Fail}, Error ${counts.Error}, Skipped ${counts.Skipped}`;
  return `${header}\n${table}\n${totals}`;
}

export function procedureRunFailed(state: RunState): boolean {
  const counts = summarizeOutcomes(state.results);
  return counts.Fail > 0 || counts.Error > 0;
}
