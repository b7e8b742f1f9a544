import Anthropic, { APIError, AnthropicError } from "@anthropic-ai/sdk";
import type {
  ContentBlock,
  MessageCreateParamsNonStreaming,
  Tool,
  ToolChoice,
} from "@anthropic-ai/sdk/resources/messages/messages";

import { delay } from "../core/utils.js";

import {
  isJsonObject,
  oracleError,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
  LlmError,
} from "./client.js";

// =============================================================================
// TYPES
// =============================================================================

export type AnthropicReplyBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; name: string; input: unknown }
  | { type: "other" };

export type AnthropicReply = {
  content: AnthropicReplyBlock[];
  stop_reason: string | null;
};

export type AnthropicRequestOptions = {
  timeout?: number;
};

export type AnthropicTransport = {
  create: (
    body: MessageCreateParamsNonStreaming,
    options?: AnthropicRequestOptions,
  ) => Promise<AnthropicReply>;
};

export type AnthropicClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  transport?: AnthropicTransport;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const STRUCTURED_OUTPUT_TOOL = "structured_output";
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 250;
const RETRIABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504, 529]);

// =============================================================================
// CLIENT
// =============================================================================

export class AnthropicClient implements LlmClient {
  private readonly model: string;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly transport: AnthropicTransport;

  constructor(options: AnthropicClientOptions) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultMaxTokens = options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;

    if (options.transport) {
      this.transport = options.transport;
    } else {
      const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
      if (!apiKey) {
        throw oracleError("anthropic", "missing-key");
      }
      this.transport = createTransport({ apiKey, baseURL: options.baseURL });
    }
  }

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    const body = this.buildRequestBody(prompt, options);
    const requestOptions = { timeout: options.timeoutMs ?? this.defaultTimeoutMs };

    const response = await this.runWithRetries(() => this.transport.create(body, requestOptions));
    const finishReason = response.stop_reason;

    if (options.schema) {
      const parsed = extractStructured(response);
      return { text: JSON.stringify(parsed), parsed, finishReason };
    }

    const text = extractText(response.content);
    if (!text) {
      throw oracleError("anthropic", "empty-response");
    }

    return { text, finishReason };
  }

  private buildRequestBody(
    prompt: string,
    options: LlmCompletionOptions,
  ): MessageCreateParamsNonStreaming {
    const body: MessageCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      max_tokens: this.defaultMaxTokens,
      temperature: options.temperature ?? this.defaultTemperature ?? 0,
    };

    if (options.schema !== undefined) {
      body.tools = [buildStructuredOutputTool(options.schema)];
      body.tool_choice = { type: "tool", name: STRUCTURED_OUTPUT_TOOL } satisfies ToolChoice;
    }

    return body;
  }

  private async runWithRetries<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await fn();
      } catch (err) {
        if (!isRetryable(err) || attempt >= this.maxRetries) {
          throw wrapError(err);
        }
        await delay(this.retryDelayMs * 2 ** (Math.min(attempt, 5) - 1));
      }
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function buildStructuredOutputTool(schema: unknown): Tool {
  if (!isJsonObject(schema)) {
    throw oracleError("anthropic", "bad-schema");
  }
  if (schema.type !== "object") {
    throw oracleError("anthropic", "bad-schema", 'Anthropic structured outputs require a schema with type "object".');
  }

  return {
    name: STRUCTURED_OUTPUT_TOOL,
    description: "Return JSON that matches the provided schema.",
    input_schema: { ...schema, type: "object" },
  };
}

function createTransport(args: { apiKey: string; baseURL?: string }): AnthropicTransport {
  const client = new Anthropic({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    maxRetries: 0, // AnthropicClient retries itself.
  });

  return {
    create: async (body, options) => {
      const message = await client.messages.create(body, options);
      return {
        content: message.content.map(toReplyBlock),
        stop_reason: message.stop_reason,
      };
    },
  };
}

function toReplyBlock(block: ContentBlock): AnthropicReplyBlock {
  if (block.type === "text") return { type: "text", text: block.text };
  if (block.type === "tool_use") return { type: "tool_use", name: block.name, input: block.input };
  return { type: "other" };
}

function extractStructured(reply: AnthropicReply): Record<string, unknown> {
  for (const block of reply.content) {
    if (block.type !== "tool_use") continue;

    if (!isJsonObject(block.input)) {
      throw oracleError("anthropic", "bad-structured-output", "Anthropic tool_use input was not a JSON object.");
    }
    return block.input;
  }

  throw oracleError(
    "anthropic",
    "bad-structured-output",
    "Anthropic response did not include a tool_use block for structured output.",
  );
}

function extractText(content: AnthropicReplyBlock[]): string {
  return content
    .map((block) => (block.type === "text" ? block.text : ""))
    .join("")
    .trim();
}

function isRetryable(error: unknown): boolean {
  if (error instanceof APIError) {
    return error.status !== undefined && RETRIABLE_STATUS_CODES.has(error.status);
  }
  if (error instanceof AnthropicError) {
    return false;
  }
  if (error instanceof Error) {
    return error.message.toLowerCase().includes("timeout") || error.message.includes("ETIMEDOUT");
  }
  return false;
}

function wrapError(error: unknown): LlmError {
  if (error instanceof APIError) {
    const status = error.status ?? "unknown";
    const hint =
      status === 401 || status === 403
        ? " Check ANTHROPIC_API_KEY and permissions."
        : status === 429
          ? " Rate limited by Anthropic."
          : "";
    return new LlmError(`Anthropic request failed (status ${status}): ${error.message}${hint}`, error);
  }

  if (error instanceof AnthropicError) {
    return new LlmError(`Anthropic request failed: ${error.message}`, error);
  }

  if (error instanceof Error) {
    return new LlmError(error.message, error);
  }

  return new LlmError("Anthropic request failed due to an unknown error.", error);
}
