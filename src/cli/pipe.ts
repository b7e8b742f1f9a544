import type { AppContext } from "../app/context.js";
import { openPipeServices } from "../app/services.js";
import { runPipeTest, type PipeTestResult } from "../pipe/pipe-pipeline.js";
import type { PipeRunState } from "../pipe/pipe-state.js";

import { formatTable } from "./table.js";

export type PipeCommandOptions = {
  schema: string;
  name: string;
  runId: string;
};

export async function pipeCommand(ctx: AppContext, opts: PipeCommandOptions): Promise<PipeTestResult> {
  const services = await openPipeServices(ctx, {
    runId: opts.runId,
    target: `pipe:${opts.schema}.${opts.name}`,
  });

  let result: PipeTestResult;
  try {
    result = await runPipeTest(
      { schema: opts.schema, name: opts.name },
      {
        oracle: services.oracle,
        warehouse: services.warehouse,
        uploader: services.uploader,
        logger: services.logger,
        sleep: services.sleep,
        settleMs: services.settleMs,
        reportsDir: services.reportsDir,
        runId: services.runId,
      },
    );
  } finally {
    await services.close();
  }

  console.log(formatPipeSummary(result.state));
  console.log(`Report: ${result.reportPath}`);

  if (pipeRunFailed(result.state)) {
    process.exitCode = 1;
  }
  return result;
}

export function formatPipeSummary(state: PipeRunState): string {
  const rows: string[][] = [
    ["Pipe", `${state.pipeSchema}.${state.pipeName}`],
    ["Target table", state.targetTable ?? "-"],
    ["Stage path", state.folderPath === null ? "-" : state.folderPath || "/"],
    ["File", state.filename ?? "-"],
    ["Uploaded", state.uploaded ? "yes" : "no"],
    ["Row count", state.verificationCount === null ? "-" : String(state.verificationCount)],
    ["Outcome", state.outcome ?? "-"],
  ];
  const table = formatTable(["Field", "Value"], rows);
  return `${table}\n${state.finalMessage ?? ""}`.trimEnd();
}

/** Anything short of a confirmed load counts as a failed run. */
export function pipeRunFailed(state: PipeRunState): boolean {
  return state.outcome !== "Pass";
}
