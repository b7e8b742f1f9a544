import OpenAI from "openai";
import { APIError, OpenAIError } from "openai/error";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";

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

export type OpenAiRequestOptions = {
  timeout?: number;
};

export type OpenAiChatReply = {
  choices: Array<{
    message: { content: string | null };
    finish_reason: string | null;
  }>;
};

export type OpenAiTransport = {
  create: (
    body: ChatCompletionCreateParamsNonStreaming,
    options?: OpenAiRequestOptions,
  ) => Promise<OpenAiChatReply>;
};

export type OpenAiClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  transport?: OpenAiTransport;
};

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 250;
const RETRIABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

// =============================================================================
// CLIENT
// =============================================================================

export class OpenAiClient implements LlmClient {
  private readonly model: string;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly transport: OpenAiTransport;

  constructor(options: OpenAiClientOptions) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;

    if (options.transport) {
      this.transport = options.transport;
    } else {
      const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw oracleError("openai", "missing-key");
      }
      this.transport = createTransport({ apiKey, baseURL: options.baseURL });
    }
  }

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    if (options.schema !== undefined && !isJsonObject(options.schema)) {
      throw oracleError("openai", "bad-schema");
    }

    const body = this.buildRequestBody(prompt, options);
    const requestOptions = { timeout: options.timeoutMs ?? this.defaultTimeoutMs };

    const response = await this.runWithRetries(() => this.transport.create(body, requestOptions));

    const choice = response.choices[0];
    const text = choice?.message.content ?? "";
    if (!text) {
      throw oracleError("openai", "empty-response");
    }

    return {
      text,
      parsed: options.schema ? parseJson(text) : undefined,
      finishReason: choice?.finish_reason ?? null,
    };
  }

  private buildRequestBody(
    prompt: string,
    options: LlmCompletionOptions,
  ): ChatCompletionCreateParamsNonStreaming {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature: options.temperature ?? this.defaultTemperature ?? 0,
    };

    if (options.schema) {
      body.response_format = {
        type: "json_schema",
        json_schema: { name: "structured_output", schema: options.schema, strict: true },
      };
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

function createTransport(args: { apiKey: string; baseURL?: string }): OpenAiTransport {
  const client = new OpenAI({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    maxRetries: 0, // OpenAiClient retries itself.
  });

  return {
    create: async (body, options) => {
      const response = await client.chat.completions.create(body, options);
      return {
        choices: response.choices.map((choice) => ({
          message: { content: choice.message.content },
          finish_reason: choice.finish_reason,
        })),
      };
    },
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text.trim());
  } catch (err) {
    throw oracleError("openai", "bad-structured-output", "OpenAI returned invalid JSON for structured output.", err);
  }
}

function isRetryable(error: unknown): boolean {
  if (error instanceof APIError) {
    return error.status !== undefined && RETRIABLE_STATUS_CODES.has(error.status);
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
        ? " Check OPENAI_API_KEY and permissions."
        : status === 429
          ? " Rate limited by OpenAI."
          : "";
    return new LlmError(`OpenAI request failed (status ${status}): ${error.message}${hint}`, error);
  }

  if (error instanceof OpenAIError) {
    return new LlmError(`OpenAI request failed: ${error.message}`, error);
  }

  if (error instanceof Error) {
    return new LlmError(error.message, error);
  }

  return new LlmError("OpenAI request failed due to an unknown error.", error);
}
