// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import OpenAI from "openai";
import { ModelConfigSchema } from "../config/schema.js";
import {
  createOpenAICompatAdapter,
  normalizeContentBlocks,
  normalizeMessage,
  normalizeStopReason,
  toModelError,
} from "./openai-compat.js";
import { ModelError } from "./types.js";

const ENV_KEYS = ["OPENAI_COMPAT_API_KEY", "OPENAI_API_KEY"] as const;

describe("createOpenAICompatAdapter", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved.get(key);
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("should throw if no api key is configured or in environment", () => {
    const config = ModelConfigSchema.parse({ provider: "openai-compat", name: "local-model" });

    expect(() => createOpenAICompatAdapter(config)).toThrow(/OPENAI_COMPAT_API_KEY/);
  });

  it("should accept api_key and base_url from config", () => {
    const config = ModelConfigSchema.parse({
      provider: "openai-compat",
      name: "local-model",
      api_key: "test-key",
      base_url: "http://localhost:8080/v1",
    });

    expect(() => createOpenAICompatAdapter(config)).not.toThrow();
  });

  it("should accept api_key from environment variable", () => {
    process.env["OPENAI_COMPAT_API_KEY"] = "test-env-key";
    const config = ModelConfigSchema.parse({ provider: "openai-compat", name: "local-model" });

    expect(() => createOpenAICompatAdapter(config)).not.toThrow();
  });
});

describe("normalizeMessage", () => {
  it("should pass string content through", () => {
    expect(normalizeMessage({ role: "user", content: "hi" })).toEqual([{ role: "user", content: "hi" }]);
  });

  it("should turn tool_use blocks into assistant tool_calls", () => {
    const messages = normalizeMessage({
      role: "assistant",
      content: [
        { type: "tool_use", id: "call_1", name: "read_file", input: { path: "a.txt" } },
        { type: "tool_use", id: "call_2", name: "recall_notes", input: {} },
      ],
    });

    expect(messages).toEqual([
      {
        role: "assistant",
        content: null,
        tool_calls: [
          { id: "call_1", type: "function", function: { name: "read_file", arguments: '{"path":"a.txt"}' } },
          { id: "call_2", type: "function", function: { name: "recall_notes", arguments: "{}" } },
        ],
      },
    ]);
  });

  it("should keep assistant text alongside tool calls", () => {
    const [message] = normalizeMessage({
      role: "assistant",
      content: [
        { type: "text", text: "Checking." },
        { type: "tool_use", id: "call_1", name: "x", input: { a: 1 } },
      ],
    });

    expect(message).toMatchObject({ role: "assistant", content: "Checking." });
  });

  it("should split tool results into tool messages in order", () => {
    const messages = normalizeMessage({
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "call_1", content: "A" },
        { type: "tool_result", tool_use_id: "call_2", content: "Error: boom", is_error: true },
      ],
    });

    expect(messages).toEqual([
      { role: "tool", tool_call_id: "call_1", content: "A" },
      { role: "tool", tool_call_id: "call_2", content: "Error: boom" },
    ]);
  });
});

describe("normalizeContentBlocks", () => {
  it("should combine text and parsed tool calls", () => {
    const blocks = normalizeContentBlocks("Working on it", [
      { id: "call_7", type: "function", function: { name: "write_file", arguments: '{"path":"out.md","content":"# x"}' } },
    ]);

    expect(blocks).toEqual([
      { type: "text", text: "Working on it" },
      { type: "tool_use", id: "call_7", name: "write_file", input: { path: "out.md", content: "# x" } },
    ]);
  });

  it("should treat empty arguments as no input", () => {
    const blocks = normalizeContentBlocks(null, [
      { id: "call_8", type: "function", function: { name: "recall_notes", arguments: "" } },
    ]);

    expect(blocks).toEqual([{ type: "tool_use", id: "call_8", name: "recall_notes", input: {} }]);
  });

  it("should reject arguments that are not a JSON object", () => {
    expect(() =>
      normalizeContentBlocks(null, [{ id: "c", type: "function", function: { name: "x", arguments: "{oops" } }]),
    ).toThrow(ModelError);
    expect(() =>
      normalizeContentBlocks(null, [{ id: "c", type: "function", function: { name: "x", arguments: "[1]" } }]),
    ).toThrow("tool call arguments must be a JSON object: [1]");
  });
});

describe("normalizeStopReason", () => {
  it("should map finish reasons", () => {
    expect(normalizeStopReason("tool_calls")).toBe("tool_use");
    expect(normalizeStopReason("length")).toBe("max_tokens");
    expect(normalizeStopReason("stop")).toBe("end_turn");
    expect(normalizeStopReason("content_filter")).toBe("stop_sequence");
  });
});

describe("toModelError", () => {
  it("should classify provider errors", () => {
    expect(toModelError(new OpenAI.AuthenticationError(401, undefined, "bad key", {})))
      .toMatchObject({ code: "auth", retryable: false });
    expect(toModelError(new OpenAI.RateLimitError(429, undefined, "slow down", {})))
      .toMatchObject({ code: "rate_limit", retryable: true });
    expect(toModelError(new OpenAI.APIConnectionTimeoutError()))
      .toMatchObject({ code: "timeout", retryable: true });
  });
});
