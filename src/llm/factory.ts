// Picks the completion client for the configured provider.
// MOCK_LLM=1 wins over the config so runs can be replayed offline.

import type { LlmConfig } from "../core/config.js";

import { AnthropicClient } from "./anthropic.js";
import type { LlmClient } from "./client.js";
import { MockLlmClient, isMockLlmEnabled } from "./mock.js";
import { OpenAiClient } from "./openai.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function createLlmClient(cfg: LlmConfig): LlmClient {
  if (isMockLlmEnabled() || cfg.provider === "mock") {
    return new MockLlmClient();
  }

  const shared = {
    model: cfg.model,
    defaultTemperature: cfg.temperature ?? 0,
    defaultTimeoutMs: cfg.timeout_seconds * 1000,
    baseURL: cfg.base_url,
  };

  if (cfg.provider === "anthropic") {
    return new AnthropicClient(shared);
  }

  return new OpenAiClient(shared);
}
