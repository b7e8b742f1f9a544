import { NotFoundError } from "../core/errors.js";
import { logRunEvent, type RunLogger } from "../core/logger.js";
import type { LlmClient } from "../llm/client.js";
import { LinearPipeline, type PipelineStage } from "../pipeline/linear-pipeline.js";
import { writePipeReport } from "../report/pipe-report.js";
import type { BlobUploader } from "../storage/ports.js";
import type { Warehouse } from "../warehouse/ports.js";

import { FeedGenerator, type FeedGeneratorOptions } from "./feed-generator.js";
import { IngestionVerifier } from "./ingestion-verifier.js";
import { PipeResolver } from "./pipe-resolver.js";
import { createPipeRunState, type PipeRunState } from "./pipe-state.js";

export type PipeTestDeps = {
  oracle: LlmClient;
  warehouse: Warehouse;
  uploader: BlobUploader;
  logger: RunLogger;
  sleep: (ms: number) => Promise<void>;
  settleMs: number;
  reportsDir: string;
  runId: string;
  feed?: FeedGeneratorOptions;
};

export type PipeTestResult = {
  state: PipeRunState;
  reportPath: string;
};

export function buildPipeStages(
  deps: Omit<PipeTestDeps, "logger" | "reportsDir" | "runId">,
): PipelineStage<PipeRunState>[] {
  const resolver = new PipeResolver(deps.warehouse);
  const generator = new FeedGenerator(deps.oracle, deps.feed);
  const verifier = new IngestionVerifier({
    uploader: deps.uploader,
    executor: deps.warehouse,
    sleep: deps.sleep,
    settleMs: deps.settleMs,
  });

  return [
    { name: "resolve-pipe", failureKind: "execution", run: (state) => resolver.resolve(state) },
    { name: "generate-feed", failureKind: "generation", run: (state) => generator.generate(state) },
    { name: "verify-ingestion", failureKind: "execution", run: (state) => verifier.verify(state) },
  ];
}

export async function runPipeTest(
  pipe: { schema: string; name: string },
  deps: PipeTestDeps,
): Promise<PipeTestResult> {
  const pipeline = new LinearPipeline("pipe", buildPipeStages(deps), deps.logger);
  const state = await pipeline.run(createPipeRunState({ pipeName: pipe.name, pipeSchema: pipe.schema }));

  if (state.pipeNotFound) {
    throw new NotFoundError(state.errorMessage ?? `Pipe ${pipe.schema}.${pipe.name} not found.`);
  }

  const reportPath = await writePipeReport(state, { reportsDir: deps.reportsDir, runId: deps.runId });
  logRunEvent(deps.logger, "report.written", { path: reportPath });

  return { state, reportPath };
}
