// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Anthropic from "@anthropic-ai/sdk";
import { ModelConfigSchema } from "../config/schema.js";
import {
  createAnthropicAdapter,
  normalizeContentBlocks,
  normalizeMessage,
  normalizeStopReason,
  toModelError,
} from "./anthropic.js";
import { ModelError } from "./types.js";

describe("createAnthropicAdapter", () => {
  let savedKey: string | undefined;

  beforeEach(() => {
    savedKey = process.env["ANTHROPIC_API_KEY"];
    delete process.env["ANTHROPIC_API_KEY"];
  });

  afterEach(() => {
    if (savedKey === undefined) {
      delete process.env["ANTHROPIC_API_KEY"];
    } else {
      process.env["ANTHROPIC_API_KEY"] = savedKey;
    }
  });

  describe("initialization", () => {
    it("should throw if no api key is configured or in environment", () => {
      const config = ModelConfigSchema.parse({ provider: "anthropic", name: "claude-sonnet" });

      expect(() => createAnthropicAdapter(config)).toThrow(/ANTHROPIC_API_KEY/);
    });

    it("should accept api_key from config", () => {
      const config = ModelConfigSchema.parse({ provider: "anthropic", name: "claude-sonnet", api_key: "test-key" });

      expect(() => createAnthropicAdapter(config)).not.toThrow();
    });

    it("should accept api_key from environment variable", () => {
      process.env["ANTHROPIC_API_KEY"] = "test-env-key";
      const config = ModelConfigSchema.parse({ provider: "anthropic", name: "claude-sonnet" });

      expect(() => createAnthropicAdapter(config)).not.toThrow();
    });
  });
});

describe("normalizeMessage", () => {
  it("should pass string content through", () => {
    expect(normalizeMessage({ role: "user", content: "hello" })).toEqual({ role: "user", content: "hello" });
  });

  it("should keep tool_use blocks on assistant turns", () => {
    const param = normalizeMessage({
      role: "assistant",
      content: [
        { type: "text", text: "Let me check." },
        { type: "tool_use", id: "toolu_1", name: "read_file", input: { path: "a.txt" } },
      ],
    });

    expect(param).toEqual({
      role: "assistant",
      content: [
        { type: "text", text: "Let me check." },
        { type: "tool_use", id: "toolu_1", name: "read_file", input: { path: "a.txt" } },
      ],
    });
  });

  it("should send tool results keyed by call id with the error flag", () => {
    const param = normalizeMessage({
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "toolu_1", content: "     1|hi" },
        { type: "tool_result", tool_use_id: "toolu_2", content: "Error: unknown tool: nope", is_error: true },
      ],
    });

    expect(param).toEqual({
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "toolu_1", content: "     1|hi" },
        { type: "tool_result", tool_use_id: "toolu_2", content: "Error: unknown tool: nope", is_error: true },
      ],
    });
  });
});

describe("normalizeContentBlocks", () => {
  it("should map text and tool_use blocks and drop thinking", () => {
    const blocks = normalizeContentBlocks([
      { type: "thinking", thinking: "hmm", signature: "sig" },
      { type: "text", text: "Reading now.", citations: null },
      { type: "tool_use", id: "toolu_9", name: "recall_notes", input: { category: "todo" } },
    ]);

    expect(blocks).toEqual([
      { type: "text", text: "Reading now." },
      { type: "tool_use", id: "toolu_9", name: "recall_notes", input: { category: "todo" } },
    ]);
  });

  it("should replace non-object tool input with an empty object", () => {
    const blocks = normalizeContentBlocks([{ type: "tool_use", id: "toolu_3", name: "x", input: "oops" }]);

    expect(blocks).toEqual([{ type: "tool_use", id: "toolu_3", name: "x", input: {} }]);
  });
});

describe("normalizeStopReason", () => {
  it("should map known reasons and default to end_turn", () => {
    expect(normalizeStopReason("tool_use")).toBe("tool_use");
    expect(normalizeStopReason("max_tokens")).toBe("max_tokens");
    expect(normalizeStopReason("stop_sequence")).toBe("stop_sequence");
    expect(normalizeStopReason(null)).toBe("end_turn");
  });
});

describe("toModelError", () => {
  it("should classify authentication failures as non-retryable", () => {
    const error = toModelError(new Anthropic.AuthenticationError(401, undefined, "invalid x-api-key", {}));

    expect(error).toBeInstanceOf(ModelError);
    expect(error).toMatchObject({ code: "auth", retryable: false });
  });

  it("should classify rate limits and timeouts as retryable", () => {
    expect(toModelError(new Anthropic.RateLimitError(429, undefined, "slow down", {})))
      .toMatchObject({ code: "rate_limit", retryable: true });
    expect(toModelError(new Anthropic.APIConnectionTimeoutError()))
      .toMatchObject({ code: "timeout", retryable: true });
  });

  it("should leave unrelated errors untouched", () => {
    const original = new TypeError("bad");

    expect(toModelError(original)).toBe(original);
  });
});
