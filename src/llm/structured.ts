import type { ZodType, ZodTypeDef } from "zod";

import { LlmError, type LlmCompletionResult } from "./client.js";

// =============================================================================
// COMPLETION NORMALIZATION
// =============================================================================

export function normalizeCompletion<TOutput, TInput>(
  completion: LlmCompletionResult,
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  label: string,
): TOutput {
  const raw = completion.parsed ?? parseJson(completion.text, label);
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.errors
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new LlmError(`${label} output failed schema validation: ${detail}`);
  }
  return parsed.data;
}

export function parseJson(raw: string, label: string): unknown {
  try {
    return JSON.parse(stripCodeFence(raw));
  } catch (err) {
    throw new LlmError(`${label} returned invalid JSON.`, err);
  }
}

// Models sometimes wrap JSON in a ```json fence even when asked not to.
function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const match = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/i.exec(trimmed);
  return match?.[1] ?? trimmed;
}

// =============================================================================
// TEXT HELPERS
// =============================================================================

export function truncate(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return `${text.slice(0, limit)}\n... [truncated]`;
}
