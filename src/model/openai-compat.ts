// pattern: Imperative Shell

import OpenAI from "openai";
import type { ModelConfig, RetryConfig } from "../config/schema.js";
import type {
  CompleteOptions,
  ContentBlock,
  Message,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  StopReason,
  TextBlock,
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
  if (error instanceof OpenAI.AuthenticationError) {
    return new ModelError("auth", false, error.message || "authentication failed");
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ModelError("rate_limit", true, error.message || "rate limit exceeded");
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelError("timeout", true, error.message || "request timed out");
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new ModelError("aborted", false, "model request aborted");
  }
  // local servers that are still starting refuse connections
  if (error instanceof OpenAI.APIConnectionError || error instanceof OpenAI.InternalServerError) {
    return new ModelError("api_error", true, error.message || "api error");
  }
  if (error instanceof OpenAI.APIError) {
    return new ModelError("api_error", false, error.message || "api error");
  }
  return error;
}

function normalizeToolDefinitions(
  tools: ReadonlyArray<ToolDefinition>
): Array<OpenAI.Chat.ChatCompletionTool> {
  return tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.input_schema,
    },
  }));
}

function parseArguments(toolCall: OpenAI.Chat.ChatCompletionMessageToolCall): Record<string, unknown> {
  const raw = toolCall.function.arguments;
  if (raw.trim() === "") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ModelError("api_error", false, `failed to parse tool call arguments: ${raw}`);
  }
  if (!isRecord(parsed)) {
    throw new ModelError("api_error", false, `tool call arguments must be a JSON object: ${raw}`);
  }
  return parsed;
}

export function normalizeContentBlocks(
  content: string | null,
  toolCalls: ReadonlyArray<OpenAI.Chat.ChatCompletionMessageToolCall> | undefined
): Array<ContentBlock> {
  const blocks: Array<ContentBlock> = [];

  if (content) {
    blocks.push({
      type: "text",
      text: content,
    });
  }

  for (const toolCall of toolCalls ?? []) {
    blocks.push({
      type: "tool_use",
      id: toolCall.id,
      name: toolCall.function.name,
      input: parseArguments(toolCall),
    });
  }

  return blocks;
}

export function normalizeStopReason(finishReason: string | null): StopReason {
  if (finishReason === "tool_calls" || finishReason === "function_call") {
    return "tool_use";
  }
  if (finishReason === "length") {
    return "max_tokens";
  }
  if (finishReason === "stop") {
    return "end_turn";
  }
  return "stop_sequence";
}

function normalizeUsage(usage: OpenAI.Completions.CompletionUsage | undefined): UsageStats {
  return {
    input_tokens: usage?.prompt_tokens ?? 0,
    output_tokens: usage?.completion_tokens ?? 0,
  };
}

function joinText(blocks: ReadonlyArray<ContentBlock>): string {
  return blocks
    .filter((b): b is TextBlock => b.type === "text")
    .map((b) => b.text)
    .join("\n");
}

/**
 * One conversation message can expand to several chat messages: tool results
 * travel as separate `tool` messages keyed by the call id.
 */
export function normalizeMessage(msg: Message): Array<OpenAI.Chat.ChatCompletionMessageParam> {
  if (typeof msg.content === "string") {
    return [{ role: msg.role, content: msg.content }];
  }

  if (msg.role === "assistant") {
    const toolCalls: Array<OpenAI.Chat.ChatCompletionMessageToolCall> = [];
    for (const block of msg.content) {
      if (block.type === "tool_use") {
        toolCalls.push({
          id: block.id,
          type: "function",
          function: { name: block.name, arguments: JSON.stringify(block.input) },
        });
      }
    }
    const text = joinText(msg.content);

    return [{
      role: "assistant",
      content: text === "" ? null : text,
      ...(toolCalls.length > 0 && { tool_calls: toolCalls }),
    }];
  }

  const messages: Array<OpenAI.Chat.ChatCompletionMessageParam> = [];
  for (const block of msg.content) {
    if (block.type === "tool_result") {
      messages.push({ role: "tool", tool_call_id: block.tool_use_id, content: block.content });
    }
  }
  const text = joinText(msg.content);
  if (text !== "") {
    messages.push({ role: "user", content: text });
  }
  return messages;
}

export function createOpenAICompatAdapter(
  config: ModelConfig,
  retry: RetryConfig = DEFAULT_RETRY_POLICY,
): ModelProvider {
  const apiKey = config.api_key || process.env["OPENAI_COMPAT_API_KEY"] || process.env["OPENAI_API_KEY"];

  if (!apiKey) {
    throw new Error(
      "OpenAI-compatible adapter requires api_key in config or OPENAI_COMPAT_API_KEY environment variable"
    );
  }

  // retries are governed by callWithRetry
  const client = new OpenAI({
    apiKey,
    baseURL: config.base_url,
    maxRetries: 0,
  });

  return {
    async complete(request: ModelRequest, options: CompleteOptions = {}): Promise<ModelResponse> {
      const messages: Array<OpenAI.Chat.ChatCompletionMessageParam> = [];
      if (request.system) {
        messages.push({
          role: "system",
          content: request.system,
        });
      }
      messages.push(...request.messages.flatMap(normalizeMessage));

      const response = await callWithRetry(
        async () => {
          try {
            return await client.chat.completions.create(
              {
                model: request.model,
                max_tokens: request.max_tokens,
                tools: request.tools && request.tools.length > 0 ? normalizeToolDefinitions(request.tools) : undefined,
                temperature: request.temperature,
                messages,
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

      const choice = response.choices[0];
      if (!choice) {
        throw new ModelError("api_error", false, "No choices in response");
      }

      return {
        content: normalizeContentBlocks(
          choice.message.content,
          choice.message.tool_calls
        ),
        stop_reason: normalizeStopReason(choice.finish_reason),
        usage: normalizeUsage(response.usage),
      };
    },
  };
}
