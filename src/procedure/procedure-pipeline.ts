import { ExecutionError, NotFoundError } from "../core/errors.js";
import { logRunEvent, type RunLogger } from "../core/logger.js";
import type { LlmClient } from "../llm/client.js";
import { LinearPipeline, type PipelineStage } from "../pipeline/linear-pipeline.js";
import { writeProcedureReport } from "../report/procedure-report.js";
import type { Warehouse } from "../warehouse/ports.js";

import { ExecutionEngine } from "./execution-engine.js";
import { FixtureSynthesizer } from "./fixture-synthesizer.js";
import { ObjectResolver } from "./object-resolver.js";
import { createRunState, type RunState } from "./run-state.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProcedureTestDeps = {
  oracle: LlmClient;
  warehouse: Warehouse;
  logger: RunLogger;
  reportsDir: string;
  runId: string;
};

export type ProcedureTestResult = {
  state: RunState;
  reportPath: string;
};

// =============================================================================
// STAGES
// =============================================================================

export function buildProcedureStages(
  deps: Pick<ProcedureTestDeps, "oracle" | "warehouse">,
): PipelineStage<RunState>[] {
  const resolver = new ObjectResolver({ oracle: deps.oracle, lookup: deps.warehouse });
  const synthesizer = new FixtureSynthesizer(deps.oracle);
  const engine = new ExecutionEngine(deps.warehouse);

  return [
    {
      name: "resolve-objects",
      failureKind: "generation",
      run: async (state) => {
        const { objects, diagnostics } = await resolver.resolve(state.procedureDefinition);
        return { ...state, objects, diagnostics: [...state.diagnostics, ...diagnostics] };
      },
    },
    {
      name: "synthesize-fixtures",
      failureKind: "generation",
      run: async (state) => {
        const { fixtures, diagnostics } = await synthesizer.synthesize(
          { name: state.procedureName, schema: state.procedureSchema },
          state.procedureDefinition,
          state.objects,
        );
        return { ...state, fixtures, diagnostics: [...state.diagnostics, ...diagnostics] };
      },
    },
    {
      name: "execute-fixtures",
      failureKind: "execution",
      run: async (state) => {
        const diagnostics = [...state.diagnostics];
        const results = await engine.execute(
          state.fixtures,
          { name: state.procedureName, schema: state.procedureSchema },
          { truncatedTables: state.truncatedTables, diagnostics },
        );
        return { ...state, results, diagnostics };
      },
    },
  ];
}

// =============================================================================
// RUNNER
// =============================================================================

export async function runProcedureTest(
  procedure: { schema: string; name: string },
  deps: ProcedureTestDeps,
): Promise<ProcedureTestResult> {
  const definition = await deps.warehouse.getProcedureDefinition(procedure.name, procedure.schema);
  if (definition.status === "not_found") {
    throw new NotFoundError(definition.message);
  }
  if (definition.status === "error") {
    throw new ExecutionError(definition.message);
  }

  const pipeline = new LinearPipeline("procedure", buildProcedureStages(deps), deps.logger);
  const state = await pipeline.run(
    createRunState({
      procedureName: procedure.name,
      procedureSchema: procedure.schema,
      procedureDefinition: definition.text,
    }),
  );

  const reportPath = await writeProcedureReport(state, {
    reportsDir: deps.reportsDir,
    runId: deps.runId,
  });
  logRunEvent(deps.logger, "report.written", { path: reportPath });

  return { state, reportPath };
}
