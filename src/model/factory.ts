// pattern: Imperative Shell

import type { ModelConfig, RetryConfig } from "../config/schema.js";
import type { ModelProvider } from "./types.js";
import { createAnthropicAdapter } from "./anthropic.js";
import { createOpenAICompatAdapter } from "./openai-compat.js";
import { DEFAULT_RETRY_POLICY } from "./retry.js";

export function createModelProvider(
  config: ModelConfig,
  retry: RetryConfig = DEFAULT_RETRY_POLICY,
): ModelProvider {
  switch (config.provider) {
    case "anthropic":
      return createAnthropicAdapter(config, retry);
    case "openai-compat":
      return createOpenAICompatAdapter(config, retry);
  }
}
