// pattern: Imperative Shell

import Anthropic from "@anthropic-ai/sdk";
import type { ModelConfig, RetryConfig } from "../config/schema.js";
import type {
  CompleteOptions,
  ContentBlock,
  Message,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  StopReason,
  ToolDefinition,
  UsageStats,
} from "./types.js";
import { ModelError } from "./types.js";
import { callWithRetry, DEFAULT_RETRY_POLICY } from "./retry.js";

function isRetryableError(error: unknown): boolean {
  return error instanceof ModelError && error.retryable;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toModelError(error: unknown): unknown {
  if (error instanceof Anthropic.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof Anthropic.APIUserAbortError) {
    return new ModelError("aborted", false, "model request aborted");
  }
  if (error instanceof Anthropic.APIConnectionError || error instanceof Anthropic.InternalServerError) {
    return new ModelError("api_error", true, error.message || "api error");
  }
  if (error instanceof Anthropic.APIError) {
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

function normalizeToolDefinitions(
  tools: ReadonlyArray<ToolDefinition>
): Array<Anthropic.Messages.Tool> {
  return tools.map((tool) => {
    const input_schema: Anthropic.Messages.Tool.InputSchema = { ...tool.input_schema, type: "object" };
    return {
      name: tool.name,
      description: tool.description,
      input_schema,
    };
  });
}

export function normalizeContentBlocks(
  blocks: ReadonlyArray<Anthropic.ContentBlock>
): Array<ContentBlock> {
  const normalized: Array<ContentBlock> = [];
  for (const block of blocks) {
    if (block.type === "text") {
      normalized.push({ type: "text", text: block.text });
    } else if (block.type === "tool_use") {
      normalized.push({
        type: "tool_use",
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    }
    // thinking blocks are not part of the conversation we keep
  }
  return normalized;
}

function normalizeUsage(usage: { input_tokens: number; output_tokens: number; cache_creation_input_tokens?: number | null; cache_read_input_tokens?: number | null }): UsageStats {
  return {
    input_tokens: usage.input_tokens,
    output_tokens: usage.output_tokens,
    cache_creation_input_tokens: usage.cache_creation_input_tokens ?? null,
    cache_read_input_tokens: usage.cache_read_input_tokens ?? null,
  };
}

export function normalizeStopReason(reason: string | null): StopReason {
  switch (reason) {
    case "tool_use":
      return "tool_use";
    case "max_tokens":
      return "max_tokens";
    case "stop_sequence":
      return "stop_sequence";
    default:
      return "end_turn";
  }
}

function normalizeBlock(block: ContentBlock): Anthropic.Messages.ContentBlockParam {
  switch (block.type) {
    case "text":
      return { type: "text", text: block.text };
    case "tool_use":
      return { type: "tool_use", id: block.id, name: block.name, input: block.input };
    case "tool_result":
      return {
        type: "tool_result",
        tool_use_id: block.tool_use_id,
        content: block.content,
        ...(block.is_error !== undefined && { is_error: block.is_error }),
      };
  }
}

export function normalizeMessage(msg: Message): Anthropic.Messages.MessageParam {
  return {
    role: msg.role,
    content: typeof msg.content === "string" ? msg.content : msg.content.map(normalizeBlock),
  };
}

export function createAnthropicAdapter(
  config: ModelConfig,
  retry: RetryConfig = DEFAULT_RETRY_POLICY,
): ModelProvider {
  const apiKey = config.api_key || process.env["ANTHROPIC_API_KEY"];

  if (!apiKey) {
    throw new Error(
      "anthropic adapter requires api_key in config or ANTHROPIC_API_KEY environment variable"
    );
  }

  // retries are governed by callWithRetry
  const client = new Anthropic({
    apiKey,
    baseURL: config.base_url,
    maxRetries: 0,
  });

  return {
    async complete(request: ModelRequest, options: CompleteOptions = {}): Promise<ModelResponse> {
      const response = await callWithRetry(
        async () => {
          try {
            return await client.messages.create(
              {
                model: request.model,
                max_tokens: request.max_tokens,
                system: request.system,
                tools: request.tools ? normalizeToolDefinitions(request.tools) : undefined,
                temperature: request.temperature,
                messages: request.messages.map(normalizeMessage),
              },
              { signal: options.signal },
            );
          } catch (error) {
            throw toModelError(error);
          }
        },
        isRetryableError,
        { policy: retry, signal: options.signal },
      );

      return {
        content: normalizeContentBlocks(response.content),
        stop_reason: normalizeStopReason(response.stop_reason),
        usage: normalizeUsage(response.usage),
      };
    },
  };
}
