import fs from "node:fs/promises";
import path from "node:path";

import {
  LlmError,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
} from "./client.js";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

export function isMockLlmEnabled(): boolean {
  const flag = process.env.MOCK_LLM;
  if (!flag) return false;

  return TRUE_VALUES.has(flag.trim().toLowerCase());
}

// Replays a fixed payload, from the constructor or from MOCK_LLM_OUTPUT(_PATH).
export class MockLlmClient implements LlmClient {
  readonly prompts: string[] = [];

  constructor(private readonly response?: unknown) {}

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    this.prompts.push(prompt);

    const payload = await this.loadPayload();
    const text = typeof payload === "string" ? payload : JSON.stringify(payload);

    return {
      text,
      parsed: options.schema ? parseStructured(payload) : undefined,
      finishReason: "mock",
    };
  }

  private async loadPayload(): Promise<unknown> {
    if (this.response !== undefined) {
      return this.response;
    }

    const fixturePath = process.env.MOCK_LLM_OUTPUT_PATH;
    if (fixturePath) {
      const raw = await fs.readFile(path.resolve(fixturePath), "utf8");
      return parseInlineJson(raw);
    }

    const inline = process.env.MOCK_LLM_OUTPUT;
    if (inline) {
      return parseInlineJson(inline);
    }

    return { status: "ok", source: "mock-llm" };
  }
}

function parseStructured(payload: unknown): unknown {
  const value = typeof payload === "string" ? parseInlineJson(payload) : payload;
  if (value && typeof value === "object") {
    return value;
  }

  throw new LlmError("Mock LLM requires an object payload when a schema is provided.");
}

function parseInlineJson(raw: string): unknown {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return {};

  try {
    return JSON.parse(trimmed);
  } catch {
    return trimmed;
  }
}
