import { formatErrorMessage } from "../core/error-format.js";
import {
  ExecutionError,
  GenerationError,
  NotFoundError,
  ReportCreationError,
  SqlProbeError,
} from "../core/errors.js";
import { logRunEvent, type RunLogger } from "../core/logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineState = {
  diagnostics: string[];
};

/** Which typed failure an exception escaping the stage becomes. */
export type StageFailureKind = "generation" | "execution";

export interface PipelineStage<TState extends PipelineState> {
  readonly name: string;
  readonly failureKind: StageFailureKind;
  run(state: TState): Promise<TState>;
}

// =============================================================================
// PIPELINE
// =============================================================================

export class LinearPipeline<TState extends PipelineState> {
  constructor(
    readonly name: string,
    private readonly stages: ReadonlyArray<PipelineStage<TState>>,
    private readonly logger: RunLogger,
  ) {}

  get stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  async run(initial: TState): Promise<TState> {
    logRunEvent(this.logger, "pipeline.start", { pipeline: this.name, stages: this.stageNames });

    let state = initial;
    for (const stage of this.stages) {
      state = await this.runStage(stage, state);
    }

    logRunEvent(this.logger, "pipeline.complete", {
      pipeline: this.name,
      diagnostics: state.diagnostics.length,
    });
    return state;
  }

  private async runStage(stage: PipelineStage<TState>, state: TState): Promise<TState> {
    logRunEvent(this.logger, "stage.start", { stage: stage.name });
    const seen = state.diagnostics.length;

    let next: TState;
    try {
      next = await stage.run(state);
    } catch (err) {
      this.emitDiagnostics(stage.name, state.diagnostics.slice(seen));
      logRunEvent(this.logger, "stage.error", {
        stage: stage.name,
        message: formatErrorMessage(err),
      });
      throw wrapStageError(stage, err);
    }

    this.emitDiagnostics(stage.name, next.diagnostics.slice(seen));
    logRunEvent(this.logger, "stage.complete", { stage: stage.name });
    return next;
  }

  private emitDiagnostics(stage: string, messages: string[]): void {
    for (const message of messages) {
      logRunEvent(this.logger, "diagnostic", { stage, message });
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

// Already typed as a run failure. Anything else, LlmError and ConfigError included,
// is reported as the failure kind of the stage it escaped from.
const RUN_FAILURES = [NotFoundError, GenerationError, ExecutionError, ReportCreationError];

function wrapStageError(
  stage: { name: string; failureKind: StageFailureKind },
  err: unknown,
): SqlProbeError {
  for (const failure of RUN_FAILURES) {
    if (err instanceof failure) return err;
  }

  const message = `Stage "${stage.name}" failed: ${formatErrorMessage(err)}`;
  return stage.failureKind === "execution"
    ? new ExecutionError(message, err)
    : new GenerationError(message, err);
}
