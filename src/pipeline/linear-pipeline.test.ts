import { describe, expect, it } from "vitest";

import { MemoryLogger } from "../__tests__/fakes.js";
import { ExecutionError, GenerationError, NotFoundError } from "../core/errors.js";
import { LlmError } from "../llm/client.js";

import { LinearPipeline, type PipelineStage, type PipelineState } from "./linear-pipeline.js";

type CounterState = PipelineState & { count: number };

function step(name: string, note?: string): PipelineStage<CounterState> {
  return {
    name,
    failureKind: "generation",
    run: async (state) => ({
      count: state.count + 1,
      diagnostics: note ? [...state.diagnostics, note] : state.diagnostics,
    }),
  };
}

describe("LinearPipeline", () => {
  it("runs stages in order and streams new diagnostics", async () => {
    const logger = new MemoryLogger();
    const pipeline = new LinearPipeline("demo", [step("one", "first note"), step("two")], logger);

    const result = await pipeline.run({ count: 0, diagnostics: ["carried over"] });

    expect(result).toEqual({ count: 2, diagnostics: ["carried over", "first note"] });
    expect(pipeline.stageNames).toEqual(["one", "two"]);
    expect(logger.events).toEqual([
      { type: "pipeline.start", pipeline: "demo", stages: ["one", "two"] },
      { type: "stage.start", stage: "one" },
      { type: "diagnostic", stage: "one", message: "first note" },
      { type: "stage.complete", stage: "one" },
      { type: "stage.start", stage: "two" },
      { type: "stage.complete", stage: "two" },
      { type: "pipeline.complete", pipeline: "demo", diagnostics: 2 },
    ]);
  });

  it("wraps a plain exception into the stage's failure kind and stops", async () => {
    const logger = new MemoryLogger();
    const boom: PipelineStage<CounterState> = {
      name: "execute",
      failureKind: "execution",
      run: async () => {
        throw new Error("socket closed");
      },
    };
    const pipeline = new LinearPipeline("demo", [boom, step("never")], logger);

    const failure = pipeline.run({ count: 0, diagnostics: [] });

    await expect(failure).rejects.toBeInstanceOf(ExecutionError);
    await expect(failure).rejects.toThrow('Stage "execute" failed: socket closed');
    expect(logger.types()).toEqual(["pipeline.start", "stage.start", "stage.error"]);
  });

  it("uses GenerationError for generation stages", async () => {
    const pipeline = new LinearPipeline<CounterState>(
      "demo",
      [
        {
          name: "synthesize",
          failureKind: "generation",
          run: async () => {
            throw new Error("bad output");
          },
        },
      ],
      new MemoryLogger(),
    );

    await expect(pipeline.run({ count: 0, diagnostics: [] })).rejects.toBeInstanceOf(GenerationError);
  });

  it("reports an escaped oracle error as the generation stage's failure", async () => {
    const oracleFailure = new LlmError("rate limited");
    const pipeline = new LinearPipeline<CounterState>(
      "demo",
      [
        {
          name: "synthesize-fixtures",
          failureKind: "generation",
          run: async () => {
            throw oracleFailure;
          },
        },
      ],
      new MemoryLogger(),
    );

    const error = await pipeline.run({ count: 0, diagnostics: [] }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({
      message: 'Stage "synthesize-fixtures" failed: rate limited',
      cause: oracleFailure,
    });
  });

  it("rethrows taxonomy errors unchanged", async () => {
    const original = new NotFoundError("Pipe RAW.P not found.");
    const pipeline = new LinearPipeline<CounterState>(
      "demo",
      [
        {
          name: "resolve",
          failureKind: "execution",
          run: async () => {
            throw original;
          },
        },
      ],
      new MemoryLogger(),
    );

    await expect(pipeline.run({ count: 0, diagnostics: [] })).rejects.toBe(original);
  });
});
