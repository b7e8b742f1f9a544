import { SqlProbeError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type LlmProvider = "openai" | "anthropic";

export type LlmCompletionOptions = {
  schema?: Record<string, unknown>;
  temperature?: number;
  timeoutMs?: number;
};

// `parsed` is the provider's raw JSON; callers validate it before use.
export type LlmCompletionResult = {
  text: string;
  parsed?: unknown;
  finishReason: string | null;
};

/** The generation oracle: one prompt in, one completion out. */
export interface LlmClient {
  complete(prompt: string, options?: LlmCompletionOptions): Promise<LlmCompletionResult>;
}

// =============================================================================
// ERRORS
// =============================================================================

export class LlmError extends SqlProbeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LlmError";
  }
}

export type OracleProblem = "missing-key" | "bad-schema" | "bad-structured-output" | "empty-response";

const PROVIDER_LABELS: Record<LlmProvider, string> = {
  openai: "OpenAI",
  anthropic: "Anthropic",
};

const API_KEY_ENV: Record<LlmProvider, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
};

/**
 * Maps a provider failure onto the CLI's user-facing error. A missing key is a
 * config problem; everything else aborts the generation stage that asked.
 */
export function oracleError(
  provider: LlmProvider,
  problem: OracleProblem,
  message?: string,
  cause?: unknown,
): UserFacingError {
  const label = PROVIDER_LABELS[provider];

  switch (problem) {
    case "missing-key":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: `${label} API key missing.`,
        message: message ?? `${label} API key is missing or invalid.`,
        hint: `Export ${API_KEY_ENV[provider]} or set llm.provider to mock.`,
        cause,
      });
    case "bad-schema":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.generation,
        title: "Oracle schema rejected.",
        message: message ?? "Structured output schema must be a plain JSON object.",
        cause,
      });
    case "bad-structured-output":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.generation,
        title: `${label} returned unusable structured output.`,
        message: message ?? `${label} structured output could not be read.`,
        hint: "Rerun the test; the run log names the stage that asked.",
        cause,
      });
    case "empty-response":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.generation,
        title: `${label} returned an empty response.`,
        message: message ?? `${label} response did not include assistant content.`,
        hint: "Check the provider status and rerun.",
        cause,
      });
  }
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
