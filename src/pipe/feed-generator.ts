import { randomUUID } from "node:crypto";

import { z } from "zod";

import { formatErrorMessage } from "../core/error-format.js";
import { renderPromptTemplate } from "../core/prompts.js";
import type { LlmClient } from "../llm/client.js";
import { normalizeCompletion } from "../llm/structured.js";

import { haltWith, withDiagnostic, type PipeRunState } from "./pipe-state.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const FeedSchema = z
  .object({
    csv_content: z.string(),
    comment: z.string(),
  })
  .strict();

export const FeedJsonSchema: Record<string, unknown> = {
  type: "object",
  properties: {
    csv_content: { type: "string" },
    comment: { type: "string" },
  },
  required: ["csv_content", "comment"],
  additionalProperties: false,
};

const TABLE_DEFINITION_UNAVAILABLE = "-- Table definition unavailable.";

// =============================================================================
// GENERATOR
// =============================================================================

export type FeedGeneratorOptions = {
  now?: () => number;
  randomSuffix?: () => string;
};

export class FeedGenerator {
  private readonly now: () => number;
  private readonly randomSuffix: () => string;

  constructor(
    private readonly oracle: LlmClient,
    options: FeedGeneratorOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.randomSuffix = options.randomSuffix ?? (() => randomUUID().slice(0, 8));
  }

  async generate(state: PipeRunState): Promise<PipeRunState> {
    if (state.halted) return state;

    if (!state.pipeDefinition || !state.targetTable) {
      return haltWith(state, "Missing pipe definition or target table for feed generation.");
    }

    try {
      const prompt = await renderPromptTemplate("feed-generator", {
        target_table: state.targetTable,
        table_definition: state.targetTableDefinition ?? TABLE_DEFINITION_UNAVAILABLE,
        pipe_definition: state.pipeDefinition,
      });
      const completion = await this.oracle.complete(prompt, { schema: FeedJsonSchema });
      const feed = normalizeCompletion(completion, FeedSchema, "Feed generator");

      const payload = feed.csv_content.trim();
      if (payload.length === 0 || !payload.includes("\n")) {
        throw new Error("Generated CSV content is empty or lacks a data row.");
      }

      const filename = feedFilename(state.pipeName, this.now(), this.randomSuffix());
      return withDiagnostic(
        { ...state, payload, payloadComment: feed.comment, filename },
        `Generated CSV feed ${filename}. Comment: ${feed.comment}`,
      );
    } catch (err) {
      return haltWith(state, `Failed to generate CSV feed: ${formatErrorMessage(err)}`);
    }
  }
}

export function feedFilename(pipeName: string, epochMs: number, suffix: string): string {
  return `${pipeName}_test_${epochMs}_${suffix}.csv`;
}
