// pattern: Functional Core

export type {
  TextBlock,
  ToolUseBlock,
  ToolResultBlock,
  ContentBlock,
  ToolDefinition,
  Message,
  ModelRequest,
  CompleteOptions,
  StopReason,
  UsageStats,
  ModelResponse,
  ModelErrorCode,
} from "./types.js";

export { ModelError, type ModelProvider } from "./types.js";
export { callWithRetry, backoffDelay, DEFAULT_RETRY_POLICY, type RetryOptions } from "./retry.js";
export { createAnthropicAdapter } from "./anthropic.js";
export { createOpenAICompatAdapter } from "./openai-compat.js";
export { createModelProvider } from "./factory.js";
